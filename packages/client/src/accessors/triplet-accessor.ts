import { err } from 'neverthrow';
import { validateId, validateWithSchema } from '@accessgrant/application';
import type { ClientResult } from '@accessgrant/domain-core';
import {
	TripletInputSchema,
	TripletListSchema,
	TripletSchema,
	type Triplet,
	type TripletInput,
} from '@accessgrant/shared-types';
import { Endpoints } from '../endpoints.js';
import type { ApiTransport } from '../transport.js';
import { fetchParsed, sendDiscarding } from './response.js';

/**
 * Triplets: standing access grants. Members of the technician group get
 * the rights of the rights group on members of the agent group, until
 * `expiresAt` (null: never).
 */
export class TripletAccessor {
	constructor(private readonly transport: ApiTransport) {}

	list(): Promise<ClientResult<Triplet[]>> {
		return fetchParsed(this.transport, { endpoint: Endpoints.triplet.collection, method: 'GET' }, TripletListSchema);
	}

	async get(id: number): Promise<ClientResult<Triplet>> {
		const validId = validateId(id, 'id', 'INVALID_TRIPLET_ID');
		if (validId.isErr()) return err(validId.error);

		return fetchParsed(this.transport, { endpoint: Endpoints.triplet.item(validId.value), method: 'GET' }, TripletSchema);
	}

	async create(input: TripletInput): Promise<ClientResult<Triplet>> {
		const body = validateWithSchema(TripletInputSchema, input, 'triplet', 'INVALID_TRIPLET');
		if (body.isErr()) return err(body.error);

		return fetchParsed(
			this.transport,
			{ endpoint: Endpoints.triplet.collection, method: 'POST', body: body.value },
			TripletSchema,
		);
	}

	async update(id: number, input: TripletInput): Promise<ClientResult<Triplet>> {
		const validId = validateId(id, 'id', 'INVALID_TRIPLET_ID');
		if (validId.isErr()) return err(validId.error);

		const body = validateWithSchema(TripletInputSchema, input, 'triplet', 'INVALID_TRIPLET');
		if (body.isErr()) return err(body.error);

		return fetchParsed(
			this.transport,
			{ endpoint: Endpoints.triplet.item(validId.value), method: 'PUT', body: body.value },
			TripletSchema,
		);
	}

	async delete(id: number): Promise<ClientResult<void>> {
		const validId = validateId(id, 'id', 'INVALID_TRIPLET_ID');
		if (validId.isErr()) return err(validId.error);

		return sendDiscarding(this.transport, { endpoint: Endpoints.triplet.item(validId.value), method: 'DELETE' });
	}
}
