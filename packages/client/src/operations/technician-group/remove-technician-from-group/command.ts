/**
 * Remove Technician From Group Command
 */

import type { Command } from '@accessgrant/application';
import type { EntityRef } from '@accessgrant/domain-core';
import type { Technician } from '@accessgrant/shared-types';

export interface RemoveTechnicianFromGroupCommand extends Command {
	readonly technician: EntityRef<Technician>;
	readonly group: string;
}
