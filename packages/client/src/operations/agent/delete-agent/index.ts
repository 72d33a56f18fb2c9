export type { DeleteAgentCommand } from './command.js';
export { createDeleteAgentUseCase, type DeleteAgentUseCaseDeps } from './use-case.js';
