/**
 * Result helpers
 *
 * Every fallible client operation returns `Promise<ClientResult<T>>`, a
 * neverthrow Result whose error side is always a ClientError.
 *
 * Usage in a caller that prefers exceptions:
 * ```typescript
 * const technicians = unwrapOrThrow(await client.technicians.list());
 * ```
 */

import type { Result } from 'neverthrow';
import { ClientError } from './errors.js';

export type ClientResult<T> = Result<T, ClientError>;

/**
 * Get the value from an Ok result, or throw the error as a ClientException.
 */
export function unwrapOrThrow<T>(result: ClientResult<T>): T {
	if (result.isErr()) {
		throw ClientError.toException(result.error);
	}
	return result.value;
}
