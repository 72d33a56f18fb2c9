export type { DeleteLeafCommand } from './command.js';
export { createDeleteLeafUseCase, type DeleteLeafUseCaseDeps } from './use-case.js';
