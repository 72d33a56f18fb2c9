export type { AddTechnicianToGroupCommand } from './command.js';
export { createAddTechnicianToGroupUseCase, type AddTechnicianToGroupUseCaseDeps } from './use-case.js';
