import 'dotenv/config';
import { z } from 'zod/v4';

/**
 * Parse environment variables with Zod schema validation.
 * Throws a descriptive error if validation fails.
 */
export function parseEnv<T extends z.ZodRawShape>(
	schema: z.ZodObject<T>,
	env: Record<string, string | undefined> = process.env,
): z.infer<z.ZodObject<T>> {
	const result = schema.safeParse(env);

	if (!result.success) {
		throw new Error(`Environment validation failed:\n${formatIssues(result.error).join('\n')}`);
	}

	return result.data;
}

function formatIssues(error: z.ZodError): string[] {
	const tree = z.treeifyError(error);
	const errors: string[] = [];

	if ('properties' in tree && tree.properties) {
		for (const [key, sub] of Object.entries(tree.properties)) {
			const node = sub as { errors?: string[] };
			if (node.errors?.length) {
				errors.push(`  ${key}: ${node.errors.join(', ')}`);
			}
		}
	}

	return errors;
}

/**
 * Common environment variable schemas for reuse.
 *
 * Note: In zod v4, .default() on a transformed schema expects the OUTPUT type.
 * Use .prefault() to provide an INPUT default (applied before parsing).
 */
export const CommonEnvSchemas = {
	/** Log level enum */
	logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

	/** Boolean from string */
	boolean: z
		.string()
		.transform((v) => v === 'true' || v === '1')
		.prefault('false'),

	/** Optional URL */
	optionalUrl: z.url().optional(),

	/** Duration in milliseconds from string */
	durationMs: z
		.string()
		.transform((v) => Number.parseInt(v, 10))
		.pipe(z.number().int().min(0)),
};

/**
 * How listing endpoints that the service documents as GET-with-form-body are
 * called. `legacy-form` sends credentials in the body; `standard` uses the
 * same query-string convention as every other endpoint.
 */
export const ListingMode = {
	LEGACY_FORM: 'legacy-form',
	STANDARD: 'standard',
} as const;

export type ListingMode = (typeof ListingMode)[keyof typeof ListingMode];

/**
 * Client configuration threaded through every component.
 */
export interface ClientConfig {
	/** Per-request timeout in milliseconds */
	readonly timeoutMs: number;
	/** Log every constructed request (redacted) at debug level */
	readonly trace: boolean;
	readonly listingMode: ListingMode;
	readonly logLevel: z.infer<typeof CommonEnvSchemas.logLevel>;
}

export const DEFAULT_TIMEOUT_MS = 30_000;

const ClientConfigSchema = z.object({
	timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
	trace: z.boolean().default(false),
	listingMode: z.enum([ListingMode.LEGACY_FORM, ListingMode.STANDARD]).default(ListingMode.LEGACY_FORM),
	logLevel: CommonEnvSchemas.logLevel,
});

export type ClientConfigInput = z.input<typeof ClientConfigSchema>;

/**
 * Build a ClientConfig from code, applying defaults.
 * Throws if a setting is out of range.
 */
export function createClientConfig(input: ClientConfigInput = {}): ClientConfig {
	const result = ClientConfigSchema.safeParse(input);
	if (!result.success) {
		throw new Error(`Invalid client configuration:\n${formatIssues(result.error).join('\n')}`);
	}
	return result.data;
}

/**
 * Normalize a service base URL: trailing slashes removed.
 */
export function normalizeHost(host: string): string {
	return host.replace(/\/+$/, '');
}

/**
 * Environment schema for the client. The host is optional because it
 * normally comes from the persisted host record; when set it overrides it.
 */
export const ClientEnvSchema = z.object({
	ACCESSGRANT_HOST: CommonEnvSchemas.optionalUrl,
	ACCESSGRANT_TIMEOUT_MS: CommonEnvSchemas.durationMs.prefault(String(DEFAULT_TIMEOUT_MS)),
	ACCESSGRANT_TRACE: CommonEnvSchemas.boolean,
	ACCESSGRANT_LISTING_MODE: z.enum([ListingMode.LEGACY_FORM, ListingMode.STANDARD]).default(ListingMode.LEGACY_FORM),
	ACCESSGRANT_LOG_LEVEL: CommonEnvSchemas.logLevel,
	ACCESSGRANT_STORE_DIR: z.string().optional(),
	ACCESSGRANT_STORE_KEY: z.string().optional(),
});

export type ClientEnv = z.infer<typeof ClientEnvSchema>;

/**
 * Read client settings from the environment.
 */
export function loadClientEnv(env: Record<string, string | undefined> = process.env): ClientEnv {
	return parseEnv(ClientEnvSchema, env);
}

/**
 * Build the ClientConfig described by the environment.
 */
export function loadClientConfig(env: Record<string, string | undefined> = process.env): ClientConfig {
	const parsed = loadClientEnv(env);

	return createClientConfig({
		timeoutMs: parsed.ACCESSGRANT_TIMEOUT_MS,
		trace: parsed.ACCESSGRANT_TRACE,
		listingMode: parsed.ACCESSGRANT_LISTING_MODE,
		logLevel: parsed.ACCESSGRANT_LOG_LEVEL,
	});
}
