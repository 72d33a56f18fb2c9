import { z } from 'zod';

/**
 * Access grant binding a technician group, a rights group and an agent group.
 * `expiresAt: null` means the grant never expires.
 */
export const TripletSchema = z
	.object({
		id: z.number().int(),
		name: z.string().nullish(),
		description: z.string().nullish(),
		technicianGroupId: z.number().int(),
		rightsGroupId: z.number().int(),
		agentGroupId: z.number().int(),
		expiresAt: z.string().nullable().default(null),
	})
	.passthrough();

export type Triplet = z.infer<typeof TripletSchema>;

export const TripletListSchema = z.array(TripletSchema);

/**
 * POST api/triplet and PUT api/triplet/{id} body
 */
export const TripletInputSchema = z
	.object({
		name: z.string().max(128).optional(),
		description: z.string().max(512).optional(),
		technicianGroupId: z.number().int().positive(),
		rightsGroupId: z.number().int().positive(),
		agentGroupId: z.number().int().positive(),
		expiresAt: z.string().datetime({ offset: true }).nullable(),
	})
	.strict();

export type TripletInput = z.infer<typeof TripletInputSchema>;
