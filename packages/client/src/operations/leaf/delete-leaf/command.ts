/**
 * Delete Leaf Command
 */

import type { Command } from '@accessgrant/application';

export interface DeleteLeafCommand extends Command {
	readonly path: string;
}
