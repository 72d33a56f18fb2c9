/**
 * Group accessor
 *
 * Technician groups and agent groups share one API shape: a cheap summary
 * listing (name and member count), a more expensive detail fetch with the
 * member list, and membership edges addressed by both ids. One generic
 * implementation serves both kinds.
 */

import { err, ok } from 'neverthrow';
import { validateId, validateMaxLength, validateRequired } from '@accessgrant/application';
import { filterByName, selectExactlyOne, type ClientResult, type NameFilter } from '@accessgrant/domain-core';
import {
	AgentGroupSchema,
	GroupSummaryListSchema,
	TechnicianGroupSchema,
	type AgentGroupMember,
	type GroupDetail,
	type GroupMember,
	type GroupSummary,
	type TechnicianGroupMember,
} from '@accessgrant/shared-types';
import { Endpoints, type GroupEndpoints } from '../endpoints.js';
import type { ApiTransport } from '../transport.js';
import { fetchParsed, sendDiscarding, type Schema } from './response.js';

const MAX_GROUP_NAME_LENGTH = 128;

export interface GroupKind<TMember extends GroupMember> {
	/** Resource name used in error messages, e.g. `technician group` */
	readonly resource: string;
	readonly endpoints: GroupEndpoints;
	readonly detailSchema: Schema<GroupDetail<TMember>>;
}

export const TECHNICIAN_GROUPS: GroupKind<TechnicianGroupMember> = {
	resource: 'technician group',
	endpoints: Endpoints.technicianGroup,
	detailSchema: TechnicianGroupSchema,
};

export const AGENT_GROUPS: GroupKind<AgentGroupMember> = {
	resource: 'agent group',
	endpoints: Endpoints.agentGroup,
	detailSchema: AgentGroupSchema,
};

export class GroupAccessor<TMember extends GroupMember> {
	constructor(
		private readonly transport: ApiTransport,
		readonly kind: GroupKind<TMember>,
	) {}

	/**
	 * Summary listing in service order, optionally narrowed by a glob on `name`.
	 */
	async listSummaries(filter?: NameFilter): Promise<ClientResult<GroupSummary[]>> {
		const summaries = await fetchParsed(this.transport, this.kind.endpoints.summaries, GroupSummaryListSchema);
		if (summaries.isErr()) return err(summaries.error);

		return ok(filterByName(summaries.value, (g) => g.name, filter));
	}

	/**
	 * Exactly one summary whose name equals `name`.
	 */
	async getSummaryByName(name: string): Promise<ClientResult<GroupSummary>> {
		const validName = validateRequired(name, 'group', 'GROUP_NAME_REQUIRED');
		if (validName.isErr()) return err(validName.error);

		const summaries = await this.listSummaries();
		if (summaries.isErr()) return err(summaries.error);

		return selectExactlyOne(
			this.kind.resource,
			`name "${name}"`,
			summaries.value.filter((g) => g.name === name),
		);
	}

	async getDetail(id: number): Promise<ClientResult<GroupDetail<TMember>>> {
		const validId = validateId(id, 'id', 'INVALID_GROUP_ID');
		if (validId.isErr()) return err(validId.error);

		return fetchParsed(this.transport, this.kind.endpoints.detail(validId.value), this.kind.detailSchema);
	}

	/**
	 * Resolves the name through the summary listing first; the detail fetch
	 * only happens with a resolved id.
	 */
	async getDetailByName(name: string): Promise<ClientResult<GroupDetail<TMember>>> {
		const summary = await this.getSummaryByName(name);
		if (summary.isErr()) return err(summary.error);

		return this.getDetail(summary.value.id);
	}

	async create(name: string): Promise<ClientResult<GroupDetail<TMember>>> {
		const validName = this.validateName(name);
		if (validName.isErr()) return err(validName.error);

		return fetchParsed(
			this.transport,
			{ endpoint: this.kind.endpoints.collection, method: 'POST', body: { name: validName.value } },
			this.kind.detailSchema,
		);
	}

	async rename(id: number, name: string): Promise<ClientResult<GroupDetail<TMember>>> {
		const validId = validateId(id, 'id', 'INVALID_GROUP_ID');
		if (validId.isErr()) return err(validId.error);

		const validName = this.validateName(name);
		if (validName.isErr()) return err(validName.error);

		return fetchParsed(
			this.transport,
			{ endpoint: this.kind.endpoints.item(validId.value), method: 'PUT', body: { name: validName.value } },
			this.kind.detailSchema,
		);
	}

	/**
	 * The service rejects deleting a group that still has members.
	 */
	async delete(id: number): Promise<ClientResult<void>> {
		const validId = validateId(id, 'id', 'INVALID_GROUP_ID');
		if (validId.isErr()) return err(validId.error);

		return sendDiscarding(this.transport, { endpoint: this.kind.endpoints.item(validId.value), method: 'DELETE' });
	}

	async addMember(groupId: number, memberId: number): Promise<ClientResult<void>> {
		const ids = this.validateEdge(groupId, memberId);
		if (ids.isErr()) return err(ids.error);

		return sendDiscarding(this.transport, { endpoint: this.kind.endpoints.member(groupId, memberId), method: 'POST' });
	}

	async removeMember(groupId: number, memberId: number): Promise<ClientResult<void>> {
		const ids = this.validateEdge(groupId, memberId);
		if (ids.isErr()) return err(ids.error);

		return sendDiscarding(this.transport, {
			endpoint: this.kind.endpoints.member(groupId, memberId),
			method: 'DELETE',
		});
	}

	private validateName(name: string): ClientResult<string> {
		const required = validateRequired(name, 'name', 'GROUP_NAME_REQUIRED');
		if (required.isErr()) return err(required.error);

		return validateMaxLength(required.value.trim(), MAX_GROUP_NAME_LENGTH, 'name', 'GROUP_NAME_TOO_LONG');
	}

	private validateEdge(groupId: number, memberId: number): ClientResult<void> {
		const group = validateId(groupId, 'groupId', 'INVALID_GROUP_ID');
		if (group.isErr()) return err(group.error);

		const member = validateId(memberId, 'memberId', 'INVALID_MEMBER_ID');
		if (member.isErr()) return err(member.error);

		return ok(undefined);
	}
}
