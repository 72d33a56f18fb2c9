/**
 * Add Technician To Group Use Case
 *
 * Resolves the technician and the group, then adds the membership edge
 * unless the technician is already listed.
 */

import { err } from 'neverthrow';
import { validateRequired, type UseCase } from '@accessgrant/application';
import type { Logger } from '@accessgrant/logging';
import type { TechnicianGroupMember } from '@accessgrant/shared-types';
import type { GroupAccessor } from '../../../accessors/group-accessor.js';
import type { TechnicianAccessor } from '../../../accessors/technician-accessor.js';
import { applyMembershipChange, type MembershipChange } from '../../shared/group-membership.js';
import type { AddTechnicianToGroupCommand } from './command.js';

export interface AddTechnicianToGroupUseCaseDeps {
	readonly technicians: TechnicianAccessor;
	readonly technicianGroups: GroupAccessor<TechnicianGroupMember>;
	readonly logger: Logger;
}

export function createAddTechnicianToGroupUseCase(
	deps: AddTechnicianToGroupUseCaseDeps,
): UseCase<AddTechnicianToGroupCommand, MembershipChange> {
	const { technicians, technicianGroups } = deps;
	const logger = deps.logger.child({ useCase: 'AddTechnicianToGroup' });

	return {
		async execute(command) {
			const group = validateRequired(command.group, 'group', 'GROUP_NAME_REQUIRED');
			if (group.isErr()) return err(group.error);

			const technician = await technicians.get(command.technician);
			if (technician.isErr()) return err(technician.error);

			return applyMembershipChange(technicianGroups, group.value, technician.value.id, 'add', logger);
		},
	};
}
