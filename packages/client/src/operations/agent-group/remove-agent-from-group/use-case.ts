/**
 * Remove Agent From Group Use Case
 */

import { err } from 'neverthrow';
import { validateRequired, type UseCase } from '@accessgrant/application';
import type { Logger } from '@accessgrant/logging';
import type { AgentGroupMember } from '@accessgrant/shared-types';
import type { AgentAccessor } from '../../../accessors/agent-accessor.js';
import type { GroupAccessor } from '../../../accessors/group-accessor.js';
import { applyMembershipChange, type MembershipChange } from '../../shared/group-membership.js';
import type { RemoveAgentFromGroupCommand } from './command.js';

export interface RemoveAgentFromGroupUseCaseDeps {
	readonly agents: AgentAccessor;
	readonly agentGroups: GroupAccessor<AgentGroupMember>;
	readonly logger: Logger;
}

export function createRemoveAgentFromGroupUseCase(
	deps: RemoveAgentFromGroupUseCaseDeps,
): UseCase<RemoveAgentFromGroupCommand, MembershipChange> {
	const { agents, agentGroups } = deps;
	const logger = deps.logger.child({ useCase: 'RemoveAgentFromGroup' });

	return {
		async execute(command) {
			const group = validateRequired(command.group, 'group', 'GROUP_NAME_REQUIRED');
			if (group.isErr()) return err(group.error);

			const agent = await agents.resolve(command.agent);
			if (agent.isErr()) return err(agent.error);

			return applyMembershipChange(agentGroups, group.value, agent.value.id, 'remove', logger);
		},
	};
}
