/**
 * Set Technician Options Use Case
 */

import { err, ok } from 'neverthrow';
import type { UseCase } from '@accessgrant/application';
import type { Logger } from '@accessgrant/logging';
import type { TechnicianOptions } from '@accessgrant/shared-types';
import type { TechnicianAccessor } from '../../../accessors/technician-accessor.js';
import { validateOptions } from '../../../options.js';
import type { SetTechnicianOptionsCommand } from './command.js';

export interface SetTechnicianOptionsUseCaseDeps {
	readonly technicians: TechnicianAccessor;
	readonly logger: Logger;
}

export function createSetTechnicianOptionsUseCase(
	deps: SetTechnicianOptionsUseCaseDeps,
): UseCase<SetTechnicianOptionsCommand, { technicianId: number; options: TechnicianOptions }> {
	const { technicians } = deps;
	const logger = deps.logger.child({ useCase: 'SetTechnicianOptions' });

	return {
		async execute(command) {
			const options = validateOptions('technician', command.options);
			if (options.isErr()) return err(options.error);

			const technician = await technicians.get(command.technician);
			if (technician.isErr()) return err(technician.error);

			const updated = await technicians.setOptions(technician.value.id, options.value);
			if (updated.isErr()) return err(updated.error);

			logger.info({ technicianId: technician.value.id, keys: Object.keys(options.value) }, 'Technician options set');
			return ok({ technicianId: technician.value.id, options: options.value });
		},
	};
}
