export type { RemoveTechnicianFromGroupCommand } from './command.js';
export { createRemoveTechnicianFromGroupUseCase, type RemoveTechnicianFromGroupUseCaseDeps } from './use-case.js';
