export type { AddAgentToGroupCommand } from './command.js';
export { createAddAgentToGroupUseCase, type AddAgentToGroupUseCaseDeps } from './use-case.js';
