/**
 * Agent operations
 */

export {
	type AssignAgentLeafCommand,
	type AgentLeafAssignment,
	createAssignAgentLeafUseCase,
	type AssignAgentLeafUseCaseDeps,
} from './assign-agent-leaf/index.js';

export { type DeleteAgentCommand, createDeleteAgentUseCase, type DeleteAgentUseCaseDeps } from './delete-agent/index.js';

export {
	type SetAgentOptionsCommand,
	createSetAgentOptionsUseCase,
	type SetAgentOptionsUseCaseDeps,
} from './set-agent-options/index.js';
