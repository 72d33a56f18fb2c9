/**
 * Assign Agent Leaf Use Case
 *
 * The one operation allowed to create a missing resource on the way: when
 * no leaf has the requested path it is created, then the agent is assigned
 * by its resolved id. A leaf created here is kept if the assignment fails.
 */

import { err, ok } from 'neverthrow';
import { commandName, validateWithSchema, type UseCase } from '@accessgrant/application';
import { ClientError } from '@accessgrant/domain-core';
import type { Logger } from '@accessgrant/logging';
import { LeafPathSchema, type Leaf } from '@accessgrant/shared-types';
import type { AgentAccessor } from '../../../accessors/agent-accessor.js';
import type { LeafAccessor } from '../../../accessors/leaf-accessor.js';
import type { AgentLeafAssignment, AssignAgentLeafCommand } from './command.js';

export interface AssignAgentLeafUseCaseDeps {
	readonly agents: AgentAccessor;
	readonly leafs: LeafAccessor;
	readonly logger: Logger;
}

export function createAssignAgentLeafUseCase(
	deps: AssignAgentLeafUseCaseDeps,
): UseCase<AssignAgentLeafCommand, AgentLeafAssignment> {
	const { agents, leafs } = deps;
	const logger = deps.logger.child({ useCase: 'AssignAgentLeaf' });

	return {
		async execute(command) {
			const operation = commandName(command, 'AssignAgentLeaf');

			const path = validateWithSchema(LeafPathSchema, command.path, 'path', 'INVALID_LEAF_PATH');
			if (path.isErr()) return err(path.error);

			const agent = await agents.resolve(command.agent);
			if (agent.isErr()) return err(agent.error);
			const agentId = agent.value.id;

			const existing = await leafs.findAllByPath(path.value);
			if (existing.isErr()) return err(existing.error);
			if (existing.value.length > 1) {
				return err(ClientError.ambiguous('leaf', `path "${path.value}"`, existing.value.length));
			}

			let leaf: Leaf | undefined = existing.value[0];
			let leafCreated = false;
			if (leaf === undefined) {
				const created = await leafs.create(path.value);
				if (created.isErr()) return err(created.error);

				leaf = created.value;
				leafCreated = true;
				logger.info({ leafId: leaf.id, path: path.value }, 'Leaf created');
			} else if (agent.value.accountLeaf === path.value) {
				logger.info({ agentId, leafId: leaf.id }, 'Agent already assigned to leaf');
				return ok({ agentId, leafId: leaf.id, leafCreated, changed: false });
			}

			const assigned = await agents.assignLeaf(agentId, path.value);
			if (assigned.isErr()) {
				if (!leafCreated) return err(assigned.error);

				logger.warn({ agentId, leafId: leaf.id }, 'Assignment failed after leaf creation; leaf kept');
				return err(
					ClientError.partialCompletion(
						operation,
						`assign agent ${agentId} to leaf "${path.value}"`,
						[`create leaf "${path.value}" (id ${leaf.id})`],
						[],
						assigned.error,
					),
				);
			}

			logger.info({ agentId, leafId: leaf.id, leafCreated }, 'Agent assigned to leaf');
			return ok({ agentId, leafId: leaf.id, leafCreated, changed: true });
		},
	};
}
