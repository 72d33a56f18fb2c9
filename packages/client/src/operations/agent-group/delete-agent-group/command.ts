/**
 * Delete Agent Group Command
 */

import type { Command } from '@accessgrant/application';

export interface DeleteAgentGroupCommand extends Command {
	readonly group: string;
}
