import { validateWithSchema } from '@accessgrant/application';
import type { ClientResult } from '@accessgrant/domain-core';
import {
	AgentOptionsSchema,
	TechnicianOptionsSchema,
	type AgentOptions,
	type TechnicianOptions,
} from '@accessgrant/shared-types';

export type OptionKind = 'technician' | 'agent';

/**
 * Check an option set against the closed key set of its resource kind.
 * Unknown keys, out-of-range values and empty sets are validation errors.
 */
export function validateOptions(kind: 'technician', input: unknown): ClientResult<TechnicianOptions>;
export function validateOptions(kind: 'agent', input: unknown): ClientResult<AgentOptions>;
export function validateOptions(kind: OptionKind, input: unknown): ClientResult<TechnicianOptions | AgentOptions> {
	if (kind === 'technician') {
		return validateWithSchema(TechnicianOptionsSchema, input, 'options', 'INVALID_TECHNICIAN_OPTIONS');
	}
	return validateWithSchema(AgentOptionsSchema, input, 'options', 'INVALID_AGENT_OPTIONS');
}
