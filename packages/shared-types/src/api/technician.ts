import { z } from 'zod';

/**
 * Account state of a technician
 */
export const TechnicianStatusSchema = z.enum(['active', 'disabled', 'locked']);

export type TechnicianStatus = z.infer<typeof TechnicianStatusSchema>;

/**
 * Recognized technician option keys. Unknown keys are rejected.
 */
export const TechnicianOptionsSchema = z
	.object({
		language: z.enum(['en', 'de', 'fr', 'nl']).optional(),
		sessionTimeoutMinutes: z.number().int().min(5).max(1440).optional(),
		requireMfa: z.boolean().optional(),
		note: z.string().max(256).optional(),
	})
	.strict()
	.refine((options) => Object.keys(options).length > 0, { message: 'At least one option is required' });

export type TechnicianOptions = z.infer<typeof TechnicianOptionsSchema>;

/**
 * GET api/technician - one element of the technician collection
 */
export const TechnicianSchema = z
	.object({
		id: z.number().int(),
		name: z.string(),
		firstName: z.string().nullish(),
		lastName: z.string().nullish(),
		email: z.string().nullish(),
		phone: z.string().nullish(),
		status: z.string().nullish(),
		options: z.record(z.unknown()).nullish(),
	})
	.passthrough();

export type Technician = z.infer<typeof TechnicianSchema>;

export const TechnicianListSchema = z.array(TechnicianSchema);

/**
 * POST api/technician - create body
 */
export const TechnicianCreateSchema = z
	.object({
		name: z.string().trim().min(1),
		firstName: z.string().min(1),
		lastName: z.string().min(1),
		email: z.string().email(),
		phone: z.string().optional(),
		status: TechnicianStatusSchema.optional(),
	})
	.strict();

export type TechnicianCreate = z.infer<typeof TechnicianCreateSchema>;

/**
 * PUT api/technician/{id} - update body, only the supplied fields change
 */
export const TechnicianUpdateSchema = TechnicianCreateSchema.partial()
	.strict()
	.refine((update) => Object.keys(update).length > 0, { message: 'At least one field is required' });

export type TechnicianUpdate = z.infer<typeof TechnicianUpdateSchema>;
