import { z } from 'zod';

/**
 * GET api/apikey - API keys issued for the tenant (metadata only)
 */
export const ApiKeySchema = z
	.object({
		id: z.number().int(),
		name: z.string(),
		createdAt: z.string().nullish(),
		expiresAt: z.string().nullish(),
	})
	.passthrough();

export type ApiKey = z.infer<typeof ApiKeySchema>;

export const ApiKeyListSchema = z.array(ApiKeySchema);
