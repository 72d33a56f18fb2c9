/**
 * Agent group operations
 */

export {
	type AddAgentToGroupCommand,
	createAddAgentToGroupUseCase,
	type AddAgentToGroupUseCaseDeps,
} from './add-agent-to-group/index.js';

export {
	type RemoveAgentFromGroupCommand,
	createRemoveAgentFromGroupUseCase,
	type RemoveAgentFromGroupUseCaseDeps,
} from './remove-agent-from-group/index.js';

export {
	type DeleteAgentGroupCommand,
	createDeleteAgentGroupUseCase,
	type DeleteAgentGroupUseCaseDeps,
} from './delete-agent-group/index.js';
