import { err, ok } from 'neverthrow';
import { validateId, validateWithSchema } from '@accessgrant/application';
import { filterByName, selectExactlyOne, type ClientResult, type NameFilter } from '@accessgrant/domain-core';
import { LeafListSchema, LeafPathSchema, LeafSchema, type Leaf } from '@accessgrant/shared-types';
import { Endpoints } from '../endpoints.js';
import type { ApiTransport } from '../transport.js';
import { fetchParsed, sendDiscarding } from './response.js';

/**
 * Account leafs: nodes of the organizational tree, addressed by a dotted
 * path such as `Company.Customer.Site`. The path is the leaf's name.
 */
export class LeafAccessor {
	constructor(private readonly transport: ApiTransport) {}

	async list(filter?: NameFilter): Promise<ClientResult<Leaf[]>> {
		const leafs = await fetchParsed(this.transport, Endpoints.leaf.list, LeafListSchema);
		if (leafs.isErr()) return err(leafs.error);

		return ok(filterByName(leafs.value, (l) => l.path, filter));
	}

	async get(id: number): Promise<ClientResult<Leaf>> {
		const validId = validateId(id, 'id', 'INVALID_LEAF_ID');
		if (validId.isErr()) return err(validId.error);

		return fetchParsed(this.transport, { endpoint: Endpoints.leaf.item(validId.value), method: 'GET' }, LeafSchema);
	}

	async create(path: string): Promise<ClientResult<Leaf>> {
		const validPath = validateWithSchema(LeafPathSchema, path, 'path', 'INVALID_LEAF_PATH');
		if (validPath.isErr()) return err(validPath.error);

		return fetchParsed(
			this.transport,
			{ endpoint: Endpoints.leaf.collection, method: 'POST', body: { path: validPath.value } },
			LeafSchema,
		);
	}

	async delete(id: number): Promise<ClientResult<void>> {
		const validId = validateId(id, 'id', 'INVALID_LEAF_ID');
		if (validId.isErr()) return err(validId.error);

		return sendDiscarding(this.transport, { endpoint: Endpoints.leaf.item(validId.value), method: 'DELETE' });
	}

	/**
	 * The one leaf whose path equals `path` exactly. The service does not
	 * enforce unique paths, so two matches is an error.
	 */
	async findByPath(path: string): Promise<ClientResult<Leaf>> {
		const matches = await this.findAllByPath(path);
		if (matches.isErr()) return err(matches.error);

		return selectExactlyOne('leaf', `path "${path.trim()}"`, matches.value);
	}

	/**
	 * Every leaf whose path equals `path` exactly.
	 */
	async findAllByPath(path: string): Promise<ClientResult<Leaf[]>> {
		const validPath = validateWithSchema(LeafPathSchema, path, 'path', 'INVALID_LEAF_PATH');
		if (validPath.isErr()) return err(validPath.error);

		const leafs = await this.list();
		if (leafs.isErr()) return err(leafs.error);

		return ok(leafs.value.filter((l) => l.path === validPath.value));
	}
}
