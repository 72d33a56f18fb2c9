/**
 * Remove Agent From Group Command
 */

import type { Command } from '@accessgrant/application';
import type { AgentRef } from '@accessgrant/domain-core';
import type { Agent } from '@accessgrant/shared-types';

export interface RemoveAgentFromGroupCommand extends Command {
	readonly agent: AgentRef<Agent>;
	readonly group: string;
}
