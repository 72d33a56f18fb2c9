/**
 * Delete Technician Group Command
 */

import type { Command } from '@accessgrant/application';

export interface DeleteTechnicianGroupCommand extends Command {
	readonly group: string;
}
