/**
 * UseCase Interface
 *
 * UseCases encapsulate one mutating operation against the service. Each use case:
 * - Takes a command (input data)
 * - Validates input before any network call
 * - Resolves every referenced record to exactly one id
 * - Short-circuits when the desired end state already holds
 * - Issues the mutating call(s) using ids, never names
 *
 * Failures are returned, never thrown, and any failure stops the sequence.
 * No compensating rollback is attempted.
 *
 * @example
 * ```typescript
 * function createDeleteLeafUseCase(deps: { leafs: LeafAccessor }): UseCase<DeleteLeafCommand, { leafId: number }> {
 *     return {
 *         async execute(command) {
 *             const leaf = await deps.leafs.findByPath(command.path);
 *             if (leaf.isErr()) return err(leaf.error);
 *
 *             const deleted = await deps.leafs.delete(leaf.value.id);
 *             if (deleted.isErr()) return err(deleted.error);
 *
 *             return ok({ leafId: leaf.value.id });
 *         },
 *     };
 * }
 * ```
 */

import type { ClientResult } from '@accessgrant/domain-core';
import type { Command } from './command.js';

/**
 * UseCase interface for mutating operations.
 *
 * @typeParam TCommand - The command type (input data)
 * @typeParam TOutput - What the operation reports on success
 */
export interface UseCase<TCommand extends Command, TOutput> {
	/**
	 * Execute the use case.
	 *
	 * @param command - The input command with operation data
	 * @returns Ok with the operation output, or Err with the first failure
	 */
	execute(command: TCommand): Promise<ClientResult<TOutput>>;
}
