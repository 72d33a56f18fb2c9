import { z } from 'zod';

/**
 * Recognized agent option keys. Unknown keys are rejected.
 */
export const AgentOptionsSchema = z
	.object({
		autoUpdate: z.boolean().optional(),
		logLevel: z.number().int().min(0).max(5).optional(),
		maintenanceWindow: z.enum(['none', 'nightly', 'weekly']).optional(),
		description: z.string().max(256).optional(),
	})
	.strict()
	.refine((options) => Object.keys(options).length > 0, { message: 'At least one option is required' });

export type AgentOptions = z.infer<typeof AgentOptionsSchema>;

/**
 * GET api/agent - one element of the agent (domain) collection.
 * `name` is often `HOST\Account` and is not guaranteed unique.
 */
export const AgentSchema = z
	.object({
		id: z.number().int(),
		guid: z.string(),
		name: z.string(),
		accountLeaf: z.string().nullish(),
		options: z.record(z.unknown()).nullish(),
	})
	.passthrough();

export type Agent = z.infer<typeof AgentSchema>;

export const AgentListSchema = z.array(AgentSchema);

/**
 * GET api/agent/info?guid= - detail-info lookup
 */
export const AgentInfoSchema = AgentSchema.extend({
	operatingSystem: z.string().nullish(),
	lastSeenAt: z.string().nullish(),
	version: z.string().nullish(),
});

export type AgentInfo = z.infer<typeof AgentInfoSchema>;
