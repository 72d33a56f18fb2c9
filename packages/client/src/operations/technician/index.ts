/**
 * Technician operations
 */

export {
	type DeleteTechnicianCommand,
	createDeleteTechnicianUseCase,
	type DeleteTechnicianUseCaseDeps,
} from './delete-technician/index.js';

export {
	type SetTechnicianOptionsCommand,
	createSetTechnicianOptionsUseCase,
	type SetTechnicianOptionsUseCaseDeps,
} from './set-technician-options/index.js';
