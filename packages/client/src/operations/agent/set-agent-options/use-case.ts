/**
 * Set Agent Options Use Case
 *
 * Options are checked against the closed agent key set before the agent
 * is looked up.
 */

import { err, ok } from 'neverthrow';
import type { UseCase } from '@accessgrant/application';
import type { Logger } from '@accessgrant/logging';
import type { AgentOptions } from '@accessgrant/shared-types';
import type { AgentAccessor } from '../../../accessors/agent-accessor.js';
import { validateOptions } from '../../../options.js';
import type { SetAgentOptionsCommand } from './command.js';

export interface SetAgentOptionsUseCaseDeps {
	readonly agents: AgentAccessor;
	readonly logger: Logger;
}

export function createSetAgentOptionsUseCase(
	deps: SetAgentOptionsUseCaseDeps,
): UseCase<SetAgentOptionsCommand, { agentId: number; options: AgentOptions }> {
	const { agents } = deps;
	const logger = deps.logger.child({ useCase: 'SetAgentOptions' });

	return {
		async execute(command) {
			const options = validateOptions('agent', command.options);
			if (options.isErr()) return err(options.error);

			const agent = await agents.resolve(command.agent);
			if (agent.isErr()) return err(agent.error);

			const updated = await agents.setOptions(agent.value.id, options.value);
			if (updated.isErr()) return err(updated.error);

			logger.info({ agentId: agent.value.id, keys: Object.keys(options.value) }, 'Agent options set');
			return ok({ agentId: agent.value.id, options: options.value });
		},
	};
}
