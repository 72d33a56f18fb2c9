/**
 * Triplet operations
 */

export {
	type CreateTripletByNamesCommand,
	createCreateTripletByNamesUseCase,
	type CreateTripletByNamesUseCaseDeps,
} from './create-triplet-by-names/index.js';
