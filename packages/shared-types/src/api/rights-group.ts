import { z } from 'zod';

export const RightsEntrySchema = z
	.object({
		id: z.number().int(),
		name: z.string(),
		description: z.string().nullish(),
	})
	.passthrough();

export type RightsEntry = z.infer<typeof RightsEntrySchema>;

/**
 * GET api/rightsgroup - read-only rights group collection
 */
export const RightsGroupSchema = z
	.object({
		id: z.number().int(),
		name: z.string(),
		rights: z.array(RightsEntrySchema).default([]),
	})
	.passthrough();

export type RightsGroup = z.infer<typeof RightsGroupSchema>;

export const RightsGroupListSchema = z.array(RightsGroupSchema);
