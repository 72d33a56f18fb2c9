import { err, ok } from 'neverthrow';
import { validateRequired } from '@accessgrant/application';
import { filterByName, selectExactlyOne, type ClientResult, type NameFilter } from '@accessgrant/domain-core';
import { RightsGroupListSchema, type RightsGroup } from '@accessgrant/shared-types';
import { Endpoints } from '../endpoints.js';
import type { ApiTransport } from '../transport.js';
import { fetchParsed } from './response.js';

/**
 * Rights groups are read-only through this client.
 */
export class RightsGroupAccessor {
	constructor(private readonly transport: ApiTransport) {}

	async list(filter?: NameFilter): Promise<ClientResult<RightsGroup[]>> {
		const groups = await fetchParsed(
			this.transport,
			{ endpoint: Endpoints.rightsGroup.collection, method: 'GET' },
			RightsGroupListSchema,
		);
		if (groups.isErr()) return err(groups.error);

		return ok(filterByName(groups.value, (g) => g.name, filter));
	}

	async getByName(name: string): Promise<ClientResult<RightsGroup>> {
		const validName = validateRequired(name, 'rightsGroup', 'RIGHTS_GROUP_NAME_REQUIRED');
		if (validName.isErr()) return err(validName.error);

		const groups = await this.list();
		if (groups.isErr()) return err(groups.error);

		return selectExactlyOne(
			'rights group',
			`name "${name}"`,
			groups.value.filter((g) => g.name === name),
		);
	}
}
