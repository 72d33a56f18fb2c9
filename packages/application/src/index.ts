/**
 * @accessgrant/application
 *
 * Application layer patterns for the client's mutating operations:
 * - Command types for operation inputs
 * - UseCase interface returning neverthrow results
 * - Validation utilities that run before any network call
 */

// Command types
export { type Command, commandName } from './command.js';

// UseCase interface
export { type UseCase } from './use-case.js';

// Validation utilities
export {
	validateRequired,
	validateMaxLength,
	validateId,
	validateWithSchema,
	validateAll,
} from './validation.js';
