import { err, ok } from 'neverthrow';
import { filterByName, type ClientResult, type NameFilter } from '@accessgrant/domain-core';
import { ApiKeyListSchema, type ApiKey } from '@accessgrant/shared-types';
import { Endpoints } from '../endpoints.js';
import type { ApiTransport } from '../transport.js';
import { fetchParsed } from './response.js';

export class ApiKeyAccessor {
	constructor(private readonly transport: ApiTransport) {}

	async list(filter?: NameFilter): Promise<ClientResult<ApiKey[]>> {
		const keys = await fetchParsed(this.transport, Endpoints.apiKey.list, ApiKeyListSchema);
		if (keys.isErr()) return err(keys.error);

		return ok(filterByName(keys.value, (k) => k.name, filter));
	}
}
