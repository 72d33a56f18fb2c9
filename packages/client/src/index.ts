/**
 * @accessgrant/client
 *
 * Typed client for the remote-access administration service:
 * - ApiExecutor: authenticated requests over undici, in either transport mode
 * - Resource accessors for technicians, agents, groups, leafs, triplets,
 *   rights groups and API keys
 * - MembershipResolver: reverse lookup from a member name to its groups
 * - Mutating operations as use cases with idempotence checks
 *
 * @example
 * ```typescript
 * import { createAccessClient } from '@accessgrant/client';
 *
 * const client = createAccessClient({ config, credentials, logger });
 * const groups = await client.membership('agent').groupsOf('HOST\\Admin');
 * ```
 */

// Facade
export {
	createAccessClient,
	createAccessClientFromEnvironment,
	type AccessClient,
	type AccessClientOptions,
	type AccessOperations,
	type GroupKindName,
} from './client.js';

// Transport
export { ApiExecutor, type ApiExecutorOptions } from './executor.js';
export {
	TransportMode,
	type ApiRequest,
	type ApiTransport,
	type HttpMethod,
	type QueryParams,
	type RequestObserver,
	type RequestTrace,
} from './transport.js';
export { Endpoints, type GroupEndpoints } from './endpoints.js';

// Accessors
export * from './accessors/index.js';
export { validateOptions, type OptionKind } from './options.js';

// Membership
export { MembershipResolver, MembershipMode, type MembershipResolverOptions } from './membership/membership-resolver.js';

// Operations
export * from './operations/index.js';
