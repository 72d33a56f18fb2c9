/**
 * Set Technician Options Command
 */

import type { Command } from '@accessgrant/application';
import type { EntityRef } from '@accessgrant/domain-core';
import type { Technician, TechnicianOptions } from '@accessgrant/shared-types';

export interface SetTechnicianOptionsCommand extends Command {
	readonly technician: EntityRef<Technician>;
	readonly options: TechnicianOptions;
}
