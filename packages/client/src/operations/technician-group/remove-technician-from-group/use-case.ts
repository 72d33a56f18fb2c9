/**
 * Remove Technician From Group Use Case
 *
 * A technician that is not a member is a successful no-op.
 */

import { err } from 'neverthrow';
import { validateRequired, type UseCase } from '@accessgrant/application';
import type { Logger } from '@accessgrant/logging';
import type { TechnicianGroupMember } from '@accessgrant/shared-types';
import type { GroupAccessor } from '../../../accessors/group-accessor.js';
import type { TechnicianAccessor } from '../../../accessors/technician-accessor.js';
import { applyMembershipChange, type MembershipChange } from '../../shared/group-membership.js';
import type { RemoveTechnicianFromGroupCommand } from './command.js';

export interface RemoveTechnicianFromGroupUseCaseDeps {
	readonly technicians: TechnicianAccessor;
	readonly technicianGroups: GroupAccessor<TechnicianGroupMember>;
	readonly logger: Logger;
}

export function createRemoveTechnicianFromGroupUseCase(
	deps: RemoveTechnicianFromGroupUseCaseDeps,
): UseCase<RemoveTechnicianFromGroupCommand, MembershipChange> {
	const { technicians, technicianGroups } = deps;
	const logger = deps.logger.child({ useCase: 'RemoveTechnicianFromGroup' });

	return {
		async execute(command) {
			const group = validateRequired(command.group, 'group', 'GROUP_NAME_REQUIRED');
			if (group.isErr()) return err(group.error);

			const technician = await technicians.get(command.technician);
			if (technician.isErr()) return err(technician.error);

			return applyMembershipChange(technicianGroups, group.value, technician.value.id, 'remove', logger);
		},
	};
}
