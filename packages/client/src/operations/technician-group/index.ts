/**
 * Technician group operations
 */

export {
	type AddTechnicianToGroupCommand,
	createAddTechnicianToGroupUseCase,
	type AddTechnicianToGroupUseCaseDeps,
} from './add-technician-to-group/index.js';

export {
	type RemoveTechnicianFromGroupCommand,
	createRemoveTechnicianFromGroupUseCase,
	type RemoveTechnicianFromGroupUseCaseDeps,
} from './remove-technician-from-group/index.js';

export {
	type DeleteTechnicianGroupCommand,
	createDeleteTechnicianGroupUseCase,
	type DeleteTechnicianGroupUseCaseDeps,
} from './delete-technician-group/index.js';
