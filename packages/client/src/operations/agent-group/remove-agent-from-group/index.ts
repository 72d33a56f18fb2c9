export type { RemoveAgentFromGroupCommand } from './command.js';
export { createRemoveAgentFromGroupUseCase, type RemoveAgentFromGroupUseCaseDeps } from './use-case.js';
