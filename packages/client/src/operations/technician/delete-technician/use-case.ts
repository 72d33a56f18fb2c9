/**
 * Delete Technician Use Case
 */

import { err, ok } from 'neverthrow';
import type { UseCase } from '@accessgrant/application';
import type { Logger } from '@accessgrant/logging';
import type { TechnicianAccessor } from '../../../accessors/technician-accessor.js';
import type { DeleteTechnicianCommand } from './command.js';

export interface DeleteTechnicianUseCaseDeps {
	readonly technicians: TechnicianAccessor;
	readonly logger: Logger;
}

export function createDeleteTechnicianUseCase(
	deps: DeleteTechnicianUseCaseDeps,
): UseCase<DeleteTechnicianCommand, { technicianId: number }> {
	const { technicians } = deps;
	const logger = deps.logger.child({ useCase: 'DeleteTechnician' });

	return {
		async execute(command) {
			const technician = await technicians.get(command.technician);
			if (technician.isErr()) return err(technician.error);

			const deleted = await technicians.delete(technician.value.id);
			if (deleted.isErr()) return err(deleted.error);

			logger.info({ technicianId: technician.value.id }, 'Technician deleted');
			return ok({ technicianId: technician.value.id });
		},
	};
}
