/**
 * Add Agent To Group Command
 */

import type { Command } from '@accessgrant/application';
import type { AgentRef } from '@accessgrant/domain-core';
import type { Agent } from '@accessgrant/shared-types';

export interface AddAgentToGroupCommand extends Command {
	/** By name, id or GUID; a name must match exactly one agent */
	readonly agent: AgentRef<Agent>;
	readonly group: string;
}
