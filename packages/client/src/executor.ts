import { STATUS_CODES } from 'node:http';
import { request, Agent } from 'undici';
import type { Dispatcher } from 'undici';
import { err, ok } from 'neverthrow';
import { ListingMode, type ClientConfig } from '@accessgrant/config';
import type { Credential, CredentialProvider } from '@accessgrant/credentials';
import { ClientError, type ClientResult } from '@accessgrant/domain-core';
import { REDACTED, type Logger } from '@accessgrant/logging';
import {
	TransportMode,
	type ApiRequest,
	type ApiTransport,
	type HttpMethod,
	type RequestObserver,
	type RequestTrace,
} from './transport.js';

const AUTHENTICATION_METHOD = 'local';

export interface ApiExecutorOptions {
	readonly config: ClientConfig;
	readonly credentials: CredentialProvider;
	readonly logger: Logger;
	/** Replaces the executor's own connection pool, e.g. with a MockAgent */
	readonly dispatcher?: Dispatcher | undefined;
	/** Receives every constructed request, redacted, before dispatch */
	readonly onRequest?: RequestObserver | undefined;
}

interface PreparedRequest {
	readonly method: HttpMethod;
	readonly mode: TransportMode;
	readonly url: string;
	readonly headers: Record<string, string>;
	readonly body: string | undefined;
}

/**
 * API Request Executor
 *
 * Builds the authenticated request for an ApiRequest, dispatches it with
 * undici and maps the outcome onto a ClientResult:
 * - 2xx with a body: the parsed JSON
 * - 2xx without a body: null
 * - any other status: `api` error carrying the service's message
 * - no response at all: `api` error with a null status
 *
 * Nothing is retried.
 */
export class ApiExecutor implements ApiTransport {
	private readonly config: ClientConfig;
	private readonly credentials: CredentialProvider;
	private readonly logger: Logger;
	private readonly dispatcher: Dispatcher;
	private readonly ownsDispatcher: boolean;
	private readonly onRequest: RequestObserver | undefined;

	constructor(options: ApiExecutorOptions) {
		this.config = options.config;
		this.credentials = options.credentials;
		this.logger = options.logger.child({ component: 'ApiExecutor' });
		this.onRequest = options.onRequest;

		if (options.dispatcher) {
			this.dispatcher = options.dispatcher;
			this.ownsDispatcher = false;
		} else {
			this.dispatcher = new Agent({
				connect: {
					timeout: options.config.timeoutMs,
				},
				headersTimeout: options.config.timeoutMs,
				bodyTimeout: options.config.timeoutMs,
			});
			this.ownsDispatcher = true;
		}
	}

	async send(apiRequest: ApiRequest): Promise<ClientResult<unknown>> {
		const credential = await this.credentials.resolve();
		if (credential.isErr()) {
			return err(credential.error);
		}

		const prepared = this.prepare(apiRequest, credential.value);
		this.observe(prepared);

		const { method } = prepared;
		const { endpoint } = apiRequest;
		const startTime = Date.now();

		let statusCode: number;
		let text: string;
		try {
			const response = await request(prepared.url, {
				method,
				headers: prepared.headers,
				body: prepared.body,
				dispatcher: this.dispatcher,
				headersTimeout: this.config.timeoutMs,
				bodyTimeout: this.config.timeoutMs,
			});
			statusCode = response.statusCode;
			text = await response.body.text();
		} catch (error) {
			this.logger.warn({ err: error, method, endpoint }, 'Request failed without a response');
			return err(ClientError.api(null, method, endpoint, describeTransportFailure(error, this.config.timeoutMs)));
		}

		const durationMs = Date.now() - startTime;

		if (statusCode < 200 || statusCode >= 300) {
			const detail = extractServiceMessage(text) ?? STATUS_CODES[statusCode] ?? 'Unexpected status';
			this.logger.warn({ method, endpoint, statusCode, durationMs, detail }, 'Service rejected request');
			return err(ClientError.api(statusCode, method, endpoint, detail));
		}

		this.logger.debug({ method, endpoint, statusCode, durationMs }, 'Request completed');

		if (text.trim() === '') {
			return ok(null);
		}

		try {
			const parsed: unknown = JSON.parse(text);
			return ok(parsed);
		} catch {
			return err(ClientError.invalidResponse(endpoint, ['body is not valid JSON']));
		}
	}

	/**
	 * Release pooled connections. A dispatcher passed in by the caller is
	 * left open.
	 */
	async close(): Promise<void> {
		if (this.ownsDispatcher) {
			await this.dispatcher.close();
		}
	}

	private prepare(apiRequest: ApiRequest, credential: Credential): PreparedRequest {
		const requested = apiRequest.mode ?? TransportMode.STANDARD;
		const mode =
			requested === TransportMode.LEGACY_FORM && this.config.listingMode === ListingMode.STANDARD
				? TransportMode.STANDARD
				: requested;

		const headers: Record<string, string> = {
			Authorization: `APIKey ${credential.secret}`,
			Accept: 'application/json',
		};
		const auth = { Email: credential.principal, authenticationmethod: AUTHENTICATION_METHOD };

		if (mode === TransportMode.LEGACY_FORM) {
			headers['Content-Type'] = 'application/x-www-form-urlencoded';
			return {
				method: 'GET',
				mode,
				url: buildUrl(credential.host, apiRequest.endpoint, new URLSearchParams(toEntries(apiRequest.query))),
				headers,
				body: new URLSearchParams(auth).toString(),
			};
		}

		const params = new URLSearchParams(auth);
		for (const [key, value] of toEntries(apiRequest.query)) {
			params.set(key, value);
		}

		let body: string | undefined;
		if (apiRequest.body !== undefined) {
			headers['Content-Type'] = 'application/json';
			body = JSON.stringify(apiRequest.body);
		}

		return {
			method: apiRequest.method,
			mode,
			url: buildUrl(credential.host, apiRequest.endpoint, params),
			headers,
			body,
		};
	}

	private observe(prepared: PreparedRequest): void {
		if (!this.onRequest && !this.config.trace) {
			return;
		}

		const trace: RequestTrace = {
			method: prepared.method,
			url: prepared.url,
			mode: prepared.mode,
			headers: { ...prepared.headers, Authorization: `APIKey ${REDACTED}` },
			...(prepared.body === undefined ? {} : { body: prepared.body }),
		};

		if (this.config.trace) {
			this.logger.debug({ trace }, 'Sending request');
		}

		if (this.onRequest) {
			try {
				this.onRequest(trace);
			} catch (error) {
				this.logger.warn({ err: error }, 'Request observer threw; ignoring');
			}
		}
	}
}

function toEntries(query: ApiRequest['query']): Array<[string, string]> {
	if (!query) {
		return [];
	}
	return Object.entries(query).map(([key, value]): [string, string] => [key, String(value)]);
}

function buildUrl(host: string, endpoint: string, params: URLSearchParams): string {
	const search = params.toString();
	const path = `${host}/${endpoint.replace(/^\/+/, '')}`;
	return search === '' ? path : `${path}?${search}`;
}

/**
 * The service reports failures as `{ message }` or `{ error }`.
 */
function extractServiceMessage(text: string): string | undefined {
	if (text.trim() === '') {
		return undefined;
	}
	try {
		const body: unknown = JSON.parse(text);
		if (typeof body === 'object' && body !== null) {
			for (const key of ['message', 'error']) {
				const value: unknown = Reflect.get(body, key);
				if (typeof value === 'string' && value.trim() !== '') {
					return value;
				}
			}
		}
		return undefined;
	} catch {
		return undefined;
	}
}

function describeTransportFailure(error: unknown, timeoutMs: number): string {
	if (!(error instanceof Error)) {
		return String(error);
	}
	if (
		error.name === 'ConnectTimeoutError' ||
		error.name === 'HeadersTimeoutError' ||
		error.name === 'BodyTimeoutError'
	) {
		return `No response within ${timeoutMs}ms`;
	}
	return error.message;
}
