/**
 * Leaf operations
 */

export { type DeleteLeafCommand, createDeleteLeafUseCase, type DeleteLeafUseCaseDeps } from './delete-leaf/index.js';
