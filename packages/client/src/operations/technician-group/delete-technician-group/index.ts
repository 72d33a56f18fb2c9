export type { DeleteTechnicianGroupCommand } from './command.js';
export { createDeleteTechnicianGroupUseCase, type DeleteTechnicianGroupUseCaseDeps } from './use-case.js';
