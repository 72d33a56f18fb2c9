export type { DeleteAgentGroupCommand } from './command.js';
export { createDeleteAgentGroupUseCase, type DeleteAgentGroupUseCaseDeps } from './use-case.js';
