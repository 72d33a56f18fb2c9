/**
 * Delete Technician Command
 */

import type { Command } from '@accessgrant/application';
import type { EntityRef } from '@accessgrant/domain-core';
import type { Technician } from '@accessgrant/shared-types';

export interface DeleteTechnicianCommand extends Command {
	readonly technician: EntityRef<Technician>;
}
