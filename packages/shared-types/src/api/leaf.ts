import { z } from 'zod';

/**
 * Dot-separated leaf path, e.g. `Company.Customer.Site`. Empty segments are
 * not allowed.
 */
export const LeafPathSchema = z
	.string()
	.trim()
	.min(1)
	.max(512)
	.regex(/^[^.]+(\.[^.]+)*$/, 'Leaf path segments must be non-empty and separated by single dots');

/**
 * GET api/accountleaf - one element of the leaf collection
 */
export const LeafSchema = z
	.object({
		id: z.number().int(),
		path: z.string(),
	})
	.passthrough();

export type Leaf = z.infer<typeof LeafSchema>;

export const LeafListSchema = z.array(LeafSchema);
