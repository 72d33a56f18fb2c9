/**
 * @accessgrant/domain-core
 *
 * Core types shared by every client package:
 * - ClientError taxonomy (neverthrow error side)
 * - Entity references as a tagged union, and the exactly-one lookup gate
 * - Glob name filters
 *
 * @example
 * ```typescript
 * import { Ref, selectExactlyOne, filterByName } from '@accessgrant/domain-core';
 *
 * const matches = filterByName(technicians, (t) => t.name, { pattern: 'ops-*' });
 * const single = selectExactlyOne('technician', Ref.describe(Ref.byName('ops-*')), matches);
 * ```
 */

// Error types
export {
	ClientError,
	ClientException,
	type ClientErrorBase,
	type ClientErrorType,
	type AuthResolutionError,
	type ApiError,
	type InvalidResponseError,
	type NotFoundError,
	type AmbiguousMatchError,
	type ValidationError,
	type PartialCompletionError,
} from './errors.js';

// Result helpers
export { unwrapOrThrow, type ClientResult } from './result.js';

// References
export {
	Ref,
	selectExactlyOne,
	type EntityRef,
	type AgentRef,
	type ByName,
	type ById,
	type ByGuid,
	type Resolved,
} from './reference.js';

// Name filters
export { globToRegExp, matchesGlob, filterByName, type NameFilter } from './glob.js';
