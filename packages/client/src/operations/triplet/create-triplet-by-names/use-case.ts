/**
 * Create Triplet By Names Use Case
 *
 * Resolves the three group names to ids (technician group, rights group,
 * agent group, in that order), then issues one create call.
 */

import { err, ok } from 'neverthrow';
import { validateAll, validateRequired, validateWithSchema, type UseCase } from '@accessgrant/application';
import type { Logger } from '@accessgrant/logging';
import { TripletInputSchema, type AgentGroupMember, type TechnicianGroupMember, type Triplet } from '@accessgrant/shared-types';
import type { GroupAccessor } from '../../../accessors/group-accessor.js';
import type { RightsGroupAccessor } from '../../../accessors/rights-group-accessor.js';
import type { TripletAccessor } from '../../../accessors/triplet-accessor.js';
import type { CreateTripletByNamesCommand } from './command.js';

export interface CreateTripletByNamesUseCaseDeps {
	readonly technicianGroups: GroupAccessor<TechnicianGroupMember>;
	readonly rightsGroups: RightsGroupAccessor;
	readonly agentGroups: GroupAccessor<AgentGroupMember>;
	readonly triplets: TripletAccessor;
	readonly logger: Logger;
}

export function createCreateTripletByNamesUseCase(
	deps: CreateTripletByNamesUseCaseDeps,
): UseCase<CreateTripletByNamesCommand, Triplet> {
	const { technicianGroups, rightsGroups, agentGroups, triplets } = deps;
	const logger = deps.logger.child({ useCase: 'CreateTripletByNames' });

	return {
		async execute(command) {
			const valid = validateAll(
				() => validateRequired(command.technicianGroup, 'technicianGroup', 'GROUP_NAME_REQUIRED'),
				() => validateRequired(command.rightsGroup, 'rightsGroup', 'RIGHTS_GROUP_NAME_REQUIRED'),
				() => validateRequired(command.agentGroup, 'agentGroup', 'GROUP_NAME_REQUIRED'),
				() => validateWithSchema(TripletInputSchema.shape.name, command.name, 'name', 'INVALID_TRIPLET_NAME'),
				() =>
					validateWithSchema(
						TripletInputSchema.shape.description,
						command.description,
						'description',
						'INVALID_TRIPLET_DESCRIPTION',
					),
				() => validateWithSchema(TripletInputSchema.shape.expiresAt, command.expiresAt, 'expiresAt', 'INVALID_EXPIRATION'),
			);
			if (valid.isErr()) return err(valid.error);

			const technicianGroup = await technicianGroups.getSummaryByName(command.technicianGroup);
			if (technicianGroup.isErr()) return err(technicianGroup.error);

			const rightsGroup = await rightsGroups.getByName(command.rightsGroup);
			if (rightsGroup.isErr()) return err(rightsGroup.error);

			const agentGroup = await agentGroups.getSummaryByName(command.agentGroup);
			if (agentGroup.isErr()) return err(agentGroup.error);

			const created = await triplets.create({
				name: command.name,
				description: command.description,
				technicianGroupId: technicianGroup.value.id,
				rightsGroupId: rightsGroup.value.id,
				agentGroupId: agentGroup.value.id,
				expiresAt: command.expiresAt,
			});
			if (created.isErr()) return err(created.error);

			logger.info(
				{
					tripletId: created.value.id,
					technicianGroupId: technicianGroup.value.id,
					rightsGroupId: rightsGroup.value.id,
					agentGroupId: agentGroup.value.id,
				},
				'Triplet created',
			);
			return ok(created.value);
		},
	};
}
