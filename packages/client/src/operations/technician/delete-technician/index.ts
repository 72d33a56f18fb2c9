export type { DeleteTechnicianCommand } from './command.js';
export { createDeleteTechnicianUseCase, type DeleteTechnicianUseCaseDeps } from './use-case.js';
