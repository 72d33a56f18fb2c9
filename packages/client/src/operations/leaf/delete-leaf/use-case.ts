/**
 * Delete Leaf Use Case
 *
 * The path must match exactly one leaf; the delete goes by id.
 */

import { err, ok } from 'neverthrow';
import type { UseCase } from '@accessgrant/application';
import type { Logger } from '@accessgrant/logging';
import type { LeafAccessor } from '../../../accessors/leaf-accessor.js';
import type { DeleteLeafCommand } from './command.js';

export interface DeleteLeafUseCaseDeps {
	readonly leafs: LeafAccessor;
	readonly logger: Logger;
}

export function createDeleteLeafUseCase(deps: DeleteLeafUseCaseDeps): UseCase<DeleteLeafCommand, { leafId: number }> {
	const { leafs } = deps;
	const logger = deps.logger.child({ useCase: 'DeleteLeaf' });

	return {
		async execute(command) {
			const leaf = await leafs.findByPath(command.path);
			if (leaf.isErr()) return err(leaf.error);

			const deleted = await leafs.delete(leaf.value.id);
			if (deleted.isErr()) return err(deleted.error);

			logger.info({ leafId: leaf.value.id, path: leaf.value.path }, 'Leaf deleted');
			return ok({ leafId: leaf.value.id });
		},
	};
}
