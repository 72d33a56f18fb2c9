export type { SetAgentOptionsCommand } from './command.js';
export { createSetAgentOptionsUseCase, type SetAgentOptionsUseCaseDeps } from './use-case.js';
