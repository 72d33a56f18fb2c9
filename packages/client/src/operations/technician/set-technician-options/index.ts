export type { SetTechnicianOptionsCommand } from './command.js';
export { createSetTechnicianOptionsUseCase, type SetTechnicianOptionsUseCaseDeps } from './use-case.js';
