/**
 * Delete Technician Group Use Case
 *
 * The service refuses to delete a non-empty group, so every member is
 * removed first. Nothing is rolled back on failure.
 */

import { err } from 'neverthrow';
import { commandName, validateRequired, type UseCase } from '@accessgrant/application';
import type { Logger } from '@accessgrant/logging';
import type { TechnicianGroupMember } from '@accessgrant/shared-types';
import type { GroupAccessor } from '../../../accessors/group-accessor.js';
import { evacuateAndDelete, type GroupDeletion } from '../../shared/group-membership.js';
import type { DeleteTechnicianGroupCommand } from './command.js';

export interface DeleteTechnicianGroupUseCaseDeps {
	readonly technicianGroups: GroupAccessor<TechnicianGroupMember>;
	readonly logger: Logger;
}

export function createDeleteTechnicianGroupUseCase(
	deps: DeleteTechnicianGroupUseCaseDeps,
): UseCase<DeleteTechnicianGroupCommand, GroupDeletion> {
	const { technicianGroups } = deps;
	const logger = deps.logger.child({ useCase: 'DeleteTechnicianGroup' });

	return {
		async execute(command) {
			const group = validateRequired(command.group, 'group', 'GROUP_NAME_REQUIRED');
			if (group.isErr()) return err(group.error);

			return evacuateAndDelete(technicianGroups, group.value, commandName(command, 'DeleteTechnicianGroup'), logger);
		},
	};
}
