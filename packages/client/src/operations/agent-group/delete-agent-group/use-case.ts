/**
 * Delete Agent Group Use Case
 *
 * Evacuates the group member by member, then deletes it.
 */

import { err } from 'neverthrow';
import { commandName, validateRequired, type UseCase } from '@accessgrant/application';
import type { Logger } from '@accessgrant/logging';
import type { AgentGroupMember } from '@accessgrant/shared-types';
import type { GroupAccessor } from '../../../accessors/group-accessor.js';
import { evacuateAndDelete, type GroupDeletion } from '../../shared/group-membership.js';
import type { DeleteAgentGroupCommand } from './command.js';

export interface DeleteAgentGroupUseCaseDeps {
	readonly agentGroups: GroupAccessor<AgentGroupMember>;
	readonly logger: Logger;
}

export function createDeleteAgentGroupUseCase(
	deps: DeleteAgentGroupUseCaseDeps,
): UseCase<DeleteAgentGroupCommand, GroupDeletion> {
	const { agentGroups } = deps;
	const logger = deps.logger.child({ useCase: 'DeleteAgentGroup' });

	return {
		async execute(command) {
			const group = validateRequired(command.group, 'group', 'GROUP_NAME_REQUIRED');
			if (group.isErr()) return err(group.error);

			return evacuateAndDelete(agentGroups, group.value, commandName(command, 'DeleteAgentGroup'), logger);
		},
	};
}
