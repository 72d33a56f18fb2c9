import { err, ok } from 'neverthrow';
import { validateId, validateRequired, validateWithSchema } from '@accessgrant/application';
import {
	Ref,
	filterByName,
	selectExactlyOne,
	type ClientResult,
	type EntityRef,
	type NameFilter,
} from '@accessgrant/domain-core';
import {
	TechnicianCreateSchema,
	TechnicianListSchema,
	TechnicianSchema,
	TechnicianStatusSchema,
	TechnicianUpdateSchema,
	type Technician,
	type TechnicianCreate,
	type TechnicianOptions,
	type TechnicianStatus,
	type TechnicianUpdate,
} from '@accessgrant/shared-types';
import { Endpoints } from '../endpoints.js';
import { validateOptions } from '../options.js';
import type { ApiTransport } from '../transport.js';
import { fetchParsed, sendDiscarding } from './response.js';

const RESOURCE = 'technician';

export class TechnicianAccessor {
	constructor(private readonly transport: ApiTransport) {}

	/**
	 * Every technician, optionally narrowed by a glob on `name`.
	 */
	async list(filter?: NameFilter): Promise<ClientResult<Technician[]>> {
		const technicians = await fetchParsed(this.transport, Endpoints.technician.list, TechnicianListSchema);
		if (technicians.isErr()) return err(technicians.error);

		return ok(filterByName(technicians.value, (t) => t.name, filter));
	}

	/**
	 * Exactly one technician. A name must match exactly one record.
	 */
	async get(ref: EntityRef<Technician>): Promise<ClientResult<Technician>> {
		switch (ref.kind) {
			case 'resolved':
				return ok(ref.record);
			case 'id': {
				const id = validateId(ref.id, 'technician', 'INVALID_TECHNICIAN_ID');
				if (id.isErr()) return err(id.error);

				return fetchParsed(
					this.transport,
					{ endpoint: Endpoints.technician.item(id.value), method: 'GET' },
					TechnicianSchema,
				);
			}
			case 'name': {
				const name = validateRequired(ref.name, 'technician', 'TECHNICIAN_NAME_REQUIRED');
				if (name.isErr()) return err(name.error);

				const technicians = await this.list();
				if (technicians.isErr()) return err(technicians.error);

				return selectExactlyOne(
					RESOURCE,
					Ref.describe(ref),
					technicians.value.filter((t) => t.name === ref.name),
				);
			}
		}
	}

	async create(input: TechnicianCreate): Promise<ClientResult<Technician>> {
		const body = validateWithSchema(TechnicianCreateSchema, input, 'technician', 'INVALID_TECHNICIAN');
		if (body.isErr()) return err(body.error);

		return fetchParsed(
			this.transport,
			{ endpoint: Endpoints.technician.collection, method: 'POST', body: body.value },
			TechnicianSchema,
		);
	}

	/**
	 * Change the supplied fields only.
	 */
	async update(id: number, input: TechnicianUpdate): Promise<ClientResult<Technician>> {
		const validId = validateId(id, 'id', 'INVALID_TECHNICIAN_ID');
		if (validId.isErr()) return err(validId.error);

		const body = validateWithSchema(TechnicianUpdateSchema, input, 'technician', 'INVALID_TECHNICIAN');
		if (body.isErr()) return err(body.error);

		return fetchParsed(
			this.transport,
			{ endpoint: Endpoints.technician.item(validId.value), method: 'PUT', body: body.value },
			TechnicianSchema,
		);
	}

	async delete(id: number): Promise<ClientResult<void>> {
		const validId = validateId(id, 'id', 'INVALID_TECHNICIAN_ID');
		if (validId.isErr()) return err(validId.error);

		return sendDiscarding(this.transport, { endpoint: Endpoints.technician.item(validId.value), method: 'DELETE' });
	}

	async setStatus(id: number, status: TechnicianStatus): Promise<ClientResult<void>> {
		const validId = validateId(id, 'id', 'INVALID_TECHNICIAN_ID');
		if (validId.isErr()) return err(validId.error);

		const validStatus = validateWithSchema(TechnicianStatusSchema, status, 'status', 'INVALID_TECHNICIAN_STATUS');
		if (validStatus.isErr()) return err(validStatus.error);

		return sendDiscarding(this.transport, {
			endpoint: Endpoints.technician.status,
			method: 'PUT',
			body: { id: validId.value, status: validStatus.value },
		});
	}

	/**
	 * Replace the given option keys. The technician id travels in the query.
	 */
	async setOptions(id: number, options: TechnicianOptions): Promise<ClientResult<void>> {
		const validId = validateId(id, 'id', 'INVALID_TECHNICIAN_ID');
		if (validId.isErr()) return err(validId.error);

		const validOptions = validateOptions('technician', options);
		if (validOptions.isErr()) return err(validOptions.error);

		return sendDiscarding(this.transport, {
			endpoint: Endpoints.technician.options,
			method: 'PUT',
			query: { id: validId.value },
			body: validOptions.value,
		});
	}
}
