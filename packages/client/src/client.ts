import type { Dispatcher } from 'undici';
import { loadClientConfig, type ClientConfig } from '@accessgrant/config';
import { createStoredCredentialProvider, type CredentialProvider } from '@accessgrant/credentials';
import { createLogger, type Logger } from '@accessgrant/logging';
import type { AgentGroupMember, TechnicianGroupMember } from '@accessgrant/shared-types';
import { AgentAccessor } from './accessors/agent-accessor.js';
import { ApiKeyAccessor } from './accessors/api-key-accessor.js';
import { AGENT_GROUPS, GroupAccessor, TECHNICIAN_GROUPS } from './accessors/group-accessor.js';
import { LeafAccessor } from './accessors/leaf-accessor.js';
import { RightsGroupAccessor } from './accessors/rights-group-accessor.js';
import { TechnicianAccessor } from './accessors/technician-accessor.js';
import { TripletAccessor } from './accessors/triplet-accessor.js';
import { ApiExecutor } from './executor.js';
import { MembershipResolver, type MembershipMode } from './membership/membership-resolver.js';
import {
	createAddAgentToGroupUseCase,
	createAddTechnicianToGroupUseCase,
	createAssignAgentLeafUseCase,
	createCreateTripletByNamesUseCase,
	createDeleteAgentGroupUseCase,
	createDeleteAgentUseCase,
	createDeleteLeafUseCase,
	createDeleteTechnicianGroupUseCase,
	createDeleteTechnicianUseCase,
	createRemoveAgentFromGroupUseCase,
	createRemoveTechnicianFromGroupUseCase,
	createSetAgentOptionsUseCase,
	createSetTechnicianOptionsUseCase,
} from './operations/index.js';
import type { ApiTransport, RequestObserver } from './transport.js';

export interface AccessClientOptions {
	readonly config: ClientConfig;
	readonly credentials: CredentialProvider;
	readonly logger: Logger;
	/** Replaces the executor entirely; dispatcher and onRequest are then unused */
	readonly transport?: ApiTransport | undefined;
	readonly dispatcher?: Dispatcher | undefined;
	readonly onRequest?: RequestObserver | undefined;
}

export type GroupKindName = 'technician' | 'agent';

/**
 * Everything the client offers, wired to one transport.
 */
export interface AccessClient {
	readonly technicians: TechnicianAccessor;
	readonly agents: AgentAccessor;
	readonly technicianGroups: GroupAccessor<TechnicianGroupMember>;
	readonly agentGroups: GroupAccessor<AgentGroupMember>;
	readonly leafs: LeafAccessor;
	readonly triplets: TripletAccessor;
	readonly rightsGroups: RightsGroupAccessor;
	readonly apiKeys: ApiKeyAccessor;
	readonly operations: AccessOperations;
	/**
	 * A new membership resolver. Each resolver owns its own cache.
	 */
	membership(kind: 'technician', mode?: MembershipMode): MembershipResolver<TechnicianGroupMember>;
	membership(kind: 'agent', mode?: MembershipMode): MembershipResolver<AgentGroupMember>;
	/** Release the executor's connection pool */
	close(): Promise<void>;
}

export type AccessOperations = ReturnType<typeof createOperations>;

interface OperationDeps {
	readonly technicians: TechnicianAccessor;
	readonly agents: AgentAccessor;
	readonly technicianGroups: GroupAccessor<TechnicianGroupMember>;
	readonly agentGroups: GroupAccessor<AgentGroupMember>;
	readonly leafs: LeafAccessor;
	readonly triplets: TripletAccessor;
	readonly rightsGroups: RightsGroupAccessor;
	readonly logger: Logger;
}

function createOperations(deps: OperationDeps) {
	return {
		addTechnicianToGroup: createAddTechnicianToGroupUseCase(deps),
		removeTechnicianFromGroup: createRemoveTechnicianFromGroupUseCase(deps),
		deleteTechnicianGroup: createDeleteTechnicianGroupUseCase(deps),
		deleteTechnician: createDeleteTechnicianUseCase(deps),
		setTechnicianOptions: createSetTechnicianOptionsUseCase(deps),
		addAgentToGroup: createAddAgentToGroupUseCase(deps),
		removeAgentFromGroup: createRemoveAgentFromGroupUseCase(deps),
		deleteAgentGroup: createDeleteAgentGroupUseCase(deps),
		deleteAgent: createDeleteAgentUseCase(deps),
		setAgentOptions: createSetAgentOptionsUseCase(deps),
		assignAgentLeaf: createAssignAgentLeafUseCase(deps),
		deleteLeaf: createDeleteLeafUseCase(deps),
		createTripletByNames: createCreateTripletByNamesUseCase(deps),
	};
}

/**
 * Create a client. Every accessor and operation shares one transport;
 * unless a transport is supplied, that is an ApiExecutor built from the
 * given config and credentials.
 *
 * @example
 * ```typescript
 * const client = createAccessClient({
 *     config: createClientConfig(),
 *     credentials: new StaticCredentialProvider({ principal, secret, host }),
 *     logger,
 * });
 * const result = await client.operations.addAgentToGroup.execute({
 *     agent: Ref.byGuid(guid),
 *     group: 'Servers',
 * });
 * ```
 */
export function createAccessClient(options: AccessClientOptions): AccessClient {
	const logger = options.logger;
	let transport: ApiTransport;
	let executor: ApiExecutor | undefined;
	if (options.transport) {
		transport = options.transport;
	} else {
		executor = new ApiExecutor({
			config: options.config,
			credentials: options.credentials,
			logger,
			dispatcher: options.dispatcher,
			onRequest: options.onRequest,
		});
		transport = executor;
	}

	const technicianGroups = new GroupAccessor(transport, TECHNICIAN_GROUPS);
	const agentGroups = new GroupAccessor(transport, AGENT_GROUPS);
	const accessors = {
		technicians: new TechnicianAccessor(transport),
		agents: new AgentAccessor(transport),
		technicianGroups,
		agentGroups,
		leafs: new LeafAccessor(transport),
		triplets: new TripletAccessor(transport),
		rightsGroups: new RightsGroupAccessor(transport),
		apiKeys: new ApiKeyAccessor(transport),
	};

	function membership(kind: 'technician', mode?: MembershipMode): MembershipResolver<TechnicianGroupMember>;
	function membership(kind: 'agent', mode?: MembershipMode): MembershipResolver<AgentGroupMember>;
	function membership(
		kind: GroupKindName,
		mode?: MembershipMode,
	): MembershipResolver<TechnicianGroupMember> | MembershipResolver<AgentGroupMember> {
		if (kind === 'technician') {
			return new MembershipResolver(technicianGroups, { logger, mode });
		}
		return new MembershipResolver(agentGroups, { logger, mode });
	}

	return {
		...accessors,
		operations: createOperations({ ...accessors, logger }),
		membership,
		async close() {
			if (executor) {
				await executor.close();
			}
		},
	};
}

/**
 * Client configured entirely from the environment: settings from
 * `ACCESSGRANT_*` variables, credentials from the local store.
 * Throws if the environment is invalid.
 */
export function createAccessClientFromEnvironment(
	env: Record<string, string | undefined> = process.env,
	principal?: string,
): AccessClient {
	const config = loadClientConfig(env);
	const logger = createLogger({ level: config.logLevel, serviceName: 'accessgrant-client' });

	return createAccessClient({
		config,
		credentials: createStoredCredentialProvider(env, principal),
		logger,
	});
}
