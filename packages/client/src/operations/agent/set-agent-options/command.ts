/**
 * Set Agent Options Command
 */

import type { Command } from '@accessgrant/application';
import type { AgentRef } from '@accessgrant/domain-core';
import type { Agent, AgentOptions } from '@accessgrant/shared-types';

export interface SetAgentOptionsCommand extends Command {
	readonly agent: AgentRef<Agent>;
	readonly options: AgentOptions;
}
