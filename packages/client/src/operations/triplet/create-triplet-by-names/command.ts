/**
 * Create Triplet By Names Command
 */

import type { Command } from '@accessgrant/application';

export interface CreateTripletByNamesCommand extends Command {
	readonly technicianGroup: string;
	readonly rightsGroup: string;
	readonly agentGroup: string;
	readonly name?: string;
	readonly description?: string;
	/** ISO-8601 timestamp with offset, or null for a grant that never expires */
	readonly expiresAt: string | null;
}
