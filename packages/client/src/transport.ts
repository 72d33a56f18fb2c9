import type { ClientResult } from '@accessgrant/domain-core';

/**
 * How a request carries its credentials.
 *
 * - `standard`: `Email` and `authenticationmethod` in the query string, JSON body
 * - `legacy-form`: GET with the same two fields as a form-encoded body
 */
export const TransportMode = {
	STANDARD: 'standard',
	LEGACY_FORM: 'legacy-form',
} as const;

export type TransportMode = (typeof TransportMode)[keyof typeof TransportMode];

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type QueryParams = Readonly<Record<string, string | number | boolean>>;

/**
 * One call against the service, relative to the credential's host.
 */
export interface ApiRequest {
	/** Path below the host, without a leading slash, e.g. `api/technician/12` */
	readonly endpoint: string;
	readonly method: HttpMethod;
	/** JSON body; ignored in legacy-form mode */
	readonly body?: unknown;
	/** Endpoint-specific query parameters, merged after the auth parameters */
	readonly query?: QueryParams;
	/** Defaults to standard */
	readonly mode?: TransportMode;
}

/**
 * The seam every accessor depends on. The executor is the production
 * implementation; tests substitute an in-process fake.
 *
 * Resolves to the parsed JSON body, or null for an empty 2xx response.
 */
export interface ApiTransport {
	send(request: ApiRequest): Promise<ClientResult<unknown>>;
}

/**
 * A fully constructed request as handed to observers. The API key is
 * replaced with the redaction token.
 */
export interface RequestTrace {
	readonly method: HttpMethod;
	readonly url: string;
	readonly mode: TransportMode;
	readonly headers: Readonly<Record<string, string>>;
	readonly body?: string;
}

export type RequestObserver = (trace: RequestTrace) => void;
