import { err, ok } from 'neverthrow';
import { validateId, validateRequired, validateWithSchema } from '@accessgrant/application';
import {
	Ref,
	filterByName,
	selectExactlyOne,
	type AgentRef,
	type ClientResult,
	type NameFilter,
} from '@accessgrant/domain-core';
import {
	AgentInfoSchema,
	AgentListSchema,
	LeafPathSchema,
	type Agent,
	type AgentInfo,
	type AgentOptions,
} from '@accessgrant/shared-types';
import { Endpoints } from '../endpoints.js';
import { validateOptions } from '../options.js';
import type { ApiTransport } from '../transport.js';
import { fetchParsed, sendDiscarding } from './response.js';

const RESOURCE = 'agent';

/**
 * Agents (domain accounts). An agent has two identifiers, the service id
 * used by mutating calls and a stable GUID; names such as `HOST\Admin`
 * are not unique.
 */
export class AgentAccessor {
	constructor(private readonly transport: ApiTransport) {}

	async list(filter?: NameFilter): Promise<ClientResult<Agent[]>> {
		const agents = await fetchParsed(this.transport, Endpoints.agent.list, AgentListSchema);
		if (agents.isErr()) return err(agents.error);

		return ok(filterByName(agents.value, (a) => a.name, filter));
	}

	/**
	 * Detail-info lookup by GUID.
	 */
	async getInfo(guid: string): Promise<ClientResult<AgentInfo>> {
		const validGuid = validateRequired(guid, 'guid', 'GUID_REQUIRED');
		if (validGuid.isErr()) return err(validGuid.error);

		return fetchParsed(
			this.transport,
			{ endpoint: Endpoints.agent.info, method: 'GET', query: { guid: validGuid.value } },
			AgentInfoSchema,
		);
	}

	/**
	 * Exactly one agent by name, id or GUID. All three look through the same
	 * collection, so an id and the GUID of one record resolve identically.
	 */
	async resolve(ref: AgentRef<Agent>): Promise<ClientResult<Agent>> {
		if (ref.kind === 'resolved') {
			return ok(ref.record);
		}

		const valid: ClientResult<unknown> =
			ref.kind === 'id'
				? validateId(ref.id, 'agent', 'INVALID_AGENT_ID')
				: ref.kind === 'guid'
					? validateRequired(ref.guid, 'agent', 'AGENT_GUID_REQUIRED')
					: validateRequired(ref.name, 'agent', 'AGENT_NAME_REQUIRED');
		if (valid.isErr()) return err(valid.error);

		const agents = await this.list();
		if (agents.isErr()) return err(agents.error);

		const matches = agents.value.filter((agent) => {
			switch (ref.kind) {
				case 'name':
					return agent.name === ref.name;
				case 'id':
					return agent.id === ref.id;
				case 'guid':
					return agent.guid.toLowerCase() === ref.guid.toLowerCase();
			}
		});

		return selectExactlyOne(RESOURCE, Ref.describe(ref), matches);
	}

	async setOptions(id: number, options: AgentOptions): Promise<ClientResult<void>> {
		const validId = validateId(id, 'id', 'INVALID_AGENT_ID');
		if (validId.isErr()) return err(validId.error);

		const validOptions = validateOptions('agent', options);
		if (validOptions.isErr()) return err(validOptions.error);

		return sendDiscarding(this.transport, {
			endpoint: Endpoints.agent.options(validId.value),
			method: 'PUT',
			body: validOptions.value,
		});
	}

	/**
	 * Point the agent at an account leaf. The path is URI-encoded into the
	 * endpoint; the leaf must already exist.
	 */
	async assignLeaf(id: number, path: string): Promise<ClientResult<void>> {
		const validId = validateId(id, 'id', 'INVALID_AGENT_ID');
		if (validId.isErr()) return err(validId.error);

		const validPath = validateWithSchema(LeafPathSchema, path, 'path', 'INVALID_LEAF_PATH');
		if (validPath.isErr()) return err(validPath.error);

		return sendDiscarding(this.transport, {
			endpoint: Endpoints.agent.accountLeaf(validId.value, validPath.value),
			method: 'PUT',
		});
	}

	async delete(id: number): Promise<ClientResult<void>> {
		const validId = validateId(id, 'id', 'INVALID_AGENT_ID');
		if (validId.isErr()) return err(validId.error);

		return sendDiscarding(this.transport, { endpoint: Endpoints.agent.item(validId.value), method: 'DELETE' });
	}
}
