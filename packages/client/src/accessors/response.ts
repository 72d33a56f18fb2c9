import { err, ok } from 'neverthrow';
import type { z } from 'zod';
import { ClientError, type ClientResult } from '@accessgrant/domain-core';
import type { ApiRequest, ApiTransport } from '../transport.js';

export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Validate a response body against the record schema it should match.
 */
export function parseResponse<T>(schema: Schema<T>, endpoint: string, body: unknown): ClientResult<T> {
	const parsed = schema.safeParse(body);
	if (!parsed.success) {
		return err(
			ClientError.invalidResponse(
				endpoint,
				parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
			),
		);
	}
	return ok(parsed.data);
}

/**
 * Send a request and validate its body.
 */
export async function fetchParsed<T>(
	transport: ApiTransport,
	request: ApiRequest,
	schema: Schema<T>,
): Promise<ClientResult<T>> {
	const body = await transport.send(request);
	if (body.isErr()) return err(body.error);

	return parseResponse(schema, request.endpoint, body.value);
}

/**
 * Send a request whose response body, if any, carries nothing the caller needs.
 */
export async function sendDiscarding(transport: ApiTransport, request: ApiRequest): Promise<ClientResult<void>> {
	const body = await transport.send(request);
	if (body.isErr()) return err(body.error);

	return ok(undefined);
}
