/**
 * Client Error Types
 *
 * Sealed error hierarchy for every failure the client can report. Each
 * variant carries a machine-readable `code`, a human-readable `message` and
 * the structured details a caller needs to act on it. Messages never contain
 * the API key.
 *
 * Errors travel as the error side of a neverthrow `Result`; callers that
 * prefer exceptions convert with `ClientError.toException()`.
 */

/**
 * Base interface for all client errors.
 */
export interface ClientErrorBase {
	readonly type: string;
	readonly code: string;
	readonly message: string;
}

/**
 * No credential could be resolved and none was supplied.
 */
export interface AuthResolutionError extends ClientErrorBase {
	readonly type: 'auth_resolution';
}

/**
 * Non-2xx response or transport failure.
 * `statusCode` is null when no HTTP response was received.
 */
export interface ApiError extends ClientErrorBase {
	readonly type: 'api';
	readonly statusCode: number | null;
	readonly method: string;
	readonly endpoint: string;
}

/**
 * A 2xx response whose body does not have the expected shape.
 */
export interface InvalidResponseError extends ClientErrorBase {
	readonly type: 'invalid_response';
	readonly endpoint: string;
	readonly issues: readonly string[];
}

/**
 * A lookup matched zero records.
 */
export interface NotFoundError extends ClientErrorBase {
	readonly type: 'not_found';
	readonly resource: string;
	readonly criteria: string;
}

/**
 * A lookup that required exactly one record matched several.
 */
export interface AmbiguousMatchError extends ClientErrorBase {
	readonly type: 'ambiguous_match';
	readonly resource: string;
	readonly criteria: string;
	readonly matches: number;
}

/**
 * Caller-supplied input outside its accepted domain. Raised before any
 * network call.
 */
export interface ValidationError extends ClientErrorBase {
	readonly type: 'validation';
	readonly field: string;
	readonly details: Record<string, unknown>;
}

/**
 * A multi-step operation stopped after some of its side effects were applied.
 */
export interface PartialCompletionError extends ClientErrorBase {
	readonly type: 'partial_completion';
	readonly operation: string;
	readonly failedStep: string;
	readonly completedSteps: readonly string[];
	readonly pendingSteps: readonly string[];
	readonly cause: ClientError;
}

/**
 * Union type for all client errors.
 */
export type ClientError =
	| AuthResolutionError
	| ApiError
	| InvalidResponseError
	| NotFoundError
	| AmbiguousMatchError
	| ValidationError
	| PartialCompletionError;

export type ClientErrorType = ClientError['type'];

/**
 * Exception wrapper for callers that work with thrown errors.
 */
export class ClientException extends Error {
	readonly error: ClientError;

	constructor(error: ClientError) {
		super(error.message);
		this.name = 'ClientException';
		this.error = error;
		Object.setPrototypeOf(this, new.target.prototype);
	}

	get type(): ClientErrorType {
		return this.error.type;
	}

	get code(): string {
		return this.error.code;
	}
}

const ERROR_TYPES: ReadonlySet<string> = new Set<ClientErrorType>([
	'auth_resolution',
	'api',
	'invalid_response',
	'not_found',
	'ambiguous_match',
	'validation',
	'partial_completion',
]);

/**
 * Factory functions for creating errors.
 */
export const ClientError = {
	authResolution(message: string, code = 'CREDENTIAL_UNAVAILABLE'): AuthResolutionError {
		return { type: 'auth_resolution', code, message };
	},

	/**
	 * Create an API error.
	 *
	 * @example
	 * ```typescript
	 * ClientError.api(404, 'GET', 'api/technician/12', 'Technician does not exist')
	 * ```
	 */
	api(statusCode: number | null, method: string, endpoint: string, detail: string): ApiError {
		const status = statusCode === null ? 'transport failure' : `HTTP ${statusCode}`;
		return {
			type: 'api',
			code: statusCode === null ? 'TRANSPORT_FAILURE' : `HTTP_${statusCode}`,
			message: `${method} ${endpoint} failed (${status}): ${detail}`,
			statusCode,
			method,
			endpoint,
		};
	},

	invalidResponse(endpoint: string, issues: readonly string[]): InvalidResponseError {
		return {
			type: 'invalid_response',
			code: 'INVALID_RESPONSE',
			message: `Unexpected response shape from ${endpoint}: ${issues.join('; ')}`,
			endpoint,
			issues,
		};
	},

	/**
	 * Create a not found error.
	 *
	 * @example
	 * ```typescript
	 * ClientError.notFound('technician', 'name "jdoe"')
	 * ```
	 */
	notFound(resource: string, criteria: string): NotFoundError {
		return {
			type: 'not_found',
			code: `${resource.toUpperCase().replace(/[^A-Z0-9]+/g, '_')}_NOT_FOUND`,
			message: `No ${resource} matches ${criteria}`,
			resource,
			criteria,
		};
	},

	ambiguous(resource: string, criteria: string, matches: number): AmbiguousMatchError {
		return {
			type: 'ambiguous_match',
			code: 'AMBIGUOUS_MATCH',
			message: `${matches} records of type ${resource} match ${criteria}; exactly one is required`,
			resource,
			criteria,
			matches,
		};
	},

	/**
	 * Create a validation error.
	 *
	 * @example
	 * ```typescript
	 * ClientError.validation('logLevel', 'INVALID_OPTION', 'logLevel must be between 0 and 5', { value: 9 })
	 * ```
	 */
	validation(
		field: string,
		code: string,
		message: string,
		details: Record<string, unknown> = {},
	): ValidationError {
		return { type: 'validation', code, message, field, details };
	},

	partialCompletion(
		operation: string,
		failedStep: string,
		completedSteps: readonly string[],
		pendingSteps: readonly string[],
		cause: ClientError,
	): PartialCompletionError {
		const done = completedSteps.length;
		const total = done + pendingSteps.length + 1;
		return {
			type: 'partial_completion',
			code: 'PARTIAL_COMPLETION',
			message:
				`${operation} stopped at "${failedStep}" after ${done} of ${total} steps; ` +
				`not attempted: ${pendingSteps.length === 0 ? 'none' : pendingSteps.join(', ')}. Cause: ${cause.message}`,
			operation,
			failedStep,
			completedSteps,
			pendingSteps,
			cause,
		};
	},

	/**
	 * One-line rendering, `<code>: <message>`.
	 */
	describe(error: ClientError): string {
		return `${error.code}: ${error.message}`;
	},

	toException(error: ClientError): ClientException {
		return new ClientException(error);
	},

	/**
	 * Check if an unknown value is a ClientError.
	 */
	isClientError(value: unknown): value is ClientError {
		if (typeof value !== 'object' || value === null) return false;
		const obj = value as Record<string, unknown>;
		return (
			typeof obj['type'] === 'string' &&
			ERROR_TYPES.has(obj['type']) &&
			typeof obj['code'] === 'string' &&
			typeof obj['message'] === 'string'
		);
	},
};
