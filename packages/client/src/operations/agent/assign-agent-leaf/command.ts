/**
 * Assign Agent Leaf Command
 */

import type { Command } from '@accessgrant/application';
import type { AgentRef } from '@accessgrant/domain-core';
import type { Agent } from '@accessgrant/shared-types';

export interface AssignAgentLeafCommand extends Command {
	readonly agent: AgentRef<Agent>;
	/** Dotted leaf path, created when no leaf has exactly this path */
	readonly path: string;
}

export interface AgentLeafAssignment {
	readonly agentId: number;
	readonly leafId: number;
	readonly leafCreated: boolean;
	/** False when the agent already pointed at this leaf */
	readonly changed: boolean;
}
