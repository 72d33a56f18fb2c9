/**
 * Add Technician To Group Command
 */

import type { Command } from '@accessgrant/application';
import type { EntityRef } from '@accessgrant/domain-core';
import type { Technician } from '@accessgrant/shared-types';

export interface AddTechnicianToGroupCommand extends Command {
	readonly technician: EntityRef<Technician>;
	/** Exact group name */
	readonly group: string;
}
