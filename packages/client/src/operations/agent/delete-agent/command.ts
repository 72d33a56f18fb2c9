/**
 * Delete Agent Command
 */

import type { Command } from '@accessgrant/application';
import type { AgentRef } from '@accessgrant/domain-core';
import type { Agent } from '@accessgrant/shared-types';

export interface DeleteAgentCommand extends Command {
	readonly agent: AgentRef<Agent>;
}
