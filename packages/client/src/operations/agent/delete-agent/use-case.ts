/**
 * Delete Agent Use Case
 */

import { err, ok } from 'neverthrow';
import type { UseCase } from '@accessgrant/application';
import type { Logger } from '@accessgrant/logging';
import type { AgentAccessor } from '../../../accessors/agent-accessor.js';
import type { DeleteAgentCommand } from './command.js';

export interface DeleteAgentUseCaseDeps {
	readonly agents: AgentAccessor;
	readonly logger: Logger;
}

export function createDeleteAgentUseCase(deps: DeleteAgentUseCaseDeps): UseCase<DeleteAgentCommand, { agentId: number }> {
	const { agents } = deps;
	const logger = deps.logger.child({ useCase: 'DeleteAgent' });

	return {
		async execute(command) {
			const agent = await agents.resolve(command.agent);
			if (agent.isErr()) return err(agent.error);

			const deleted = await agents.delete(agent.value.id);
			if (deleted.isErr()) return err(deleted.error);

			logger.info({ agentId: agent.value.id }, 'Agent deleted');
			return ok({ agentId: agent.value.id });
		},
	};
}
