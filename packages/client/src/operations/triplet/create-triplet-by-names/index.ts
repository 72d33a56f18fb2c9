export type { CreateTripletByNamesCommand } from './command.js';
export { createCreateTripletByNamesUseCase, type CreateTripletByNamesUseCaseDeps } from './use-case.js';
