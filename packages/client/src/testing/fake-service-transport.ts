/**
 * FakeServiceTransport: an ApiTransport backed by in-memory collections.
 *
 * Serves the same endpoints as the real service, validates bodies with the
 * shared record schemas and records every call so tests can assert the
 * exact sequence of mutating requests. Deleting a group that still has
 * members is rejected with 409, as the service does.
 */

import { err, ok } from 'neverthrow';
import { z } from 'zod';
import { ClientError, type ClientResult } from '@accessgrant/domain-core';
import {
	AgentOptionsSchema,
	AgentSchema,
	LeafSchema,
	TechnicianCreateSchema,
	TechnicianOptionsSchema,
	TechnicianSchema,
	TechnicianStatusSchema,
	TechnicianUpdateSchema,
	TripletInputSchema,
	TripletSchema,
	type Agent,
	type ApiKey,
	type Leaf,
	type RightsGroup,
	type Technician,
	type Triplet,
} from '@accessgrant/shared-types';
import { TransportMode, type ApiRequest, type ApiTransport, type HttpMethod, type QueryParams } from '../transport.js';

export interface RecordedCall {
	readonly method: HttpMethod;
	readonly endpoint: string;
	readonly mode: TransportMode;
	readonly query: QueryParams | undefined;
	readonly body: unknown;
}

export interface FakeGroupMember {
	readonly id: number;
	readonly name: string;
	readonly guid?: string;
}

export interface FakeGroup {
	readonly id: number;
	name: string;
	members: FakeGroupMember[];
}

export interface FakeGroupSeed {
	readonly id: number;
	readonly name: string;
	readonly members?: readonly FakeGroupMember[];
}

export interface FakeServiceSeed {
	readonly technicians?: readonly Technician[];
	readonly agents?: readonly Agent[];
	readonly technicianGroups?: readonly FakeGroupSeed[];
	readonly agentGroups?: readonly FakeGroupSeed[];
	readonly leafs?: readonly Leaf[];
	readonly triplets?: readonly Triplet[];
	readonly rightsGroups?: readonly RightsGroup[];
	readonly apiKeys?: readonly ApiKey[];
}

export interface InjectedFailure {
	/** null simulates a request that never got a response */
	readonly statusCode: number | null;
	readonly message: string;
}

interface PendingFailure extends InjectedFailure {
	readonly method: HttpMethod;
	readonly endpoint: string | RegExp;
	remaining: number;
}

type Handler = (match: RegExpExecArray, request: ApiRequest) => ClientResult<unknown>;

interface Route {
	readonly method: HttpMethod;
	readonly pattern: RegExp;
	readonly handler: Handler;
}

const IdBodySchema = z.object({ id: z.number().int(), status: TechnicianStatusSchema });
const NameBodySchema = z.object({ name: z.string().min(1) });
const PathBodySchema = z.object({ path: z.string().min(1) });

export class FakeServiceTransport implements ApiTransport {
	readonly calls: RecordedCall[] = [];

	readonly technicians: Technician[];
	readonly agents: Agent[];
	readonly technicianGroups: FakeGroup[];
	readonly agentGroups: FakeGroup[];
	readonly leafs: Leaf[];
	readonly triplets: Triplet[];
	readonly rightsGroups: RightsGroup[];
	readonly apiKeys: ApiKey[];

	private readonly failures: PendingFailure[] = [];
	private readonly routes: Route[];
	private nextId = 1000;

	constructor(seed: FakeServiceSeed = {}) {
		this.technicians = [...(seed.technicians ?? [])].map((t) => ({ ...t }));
		this.agents = [...(seed.agents ?? [])].map((a) => ({ ...a }));
		this.technicianGroups = (seed.technicianGroups ?? []).map(toGroup);
		this.agentGroups = (seed.agentGroups ?? []).map(toGroup);
		this.leafs = [...(seed.leafs ?? [])].map((l) => ({ ...l }));
		this.triplets = [...(seed.triplets ?? [])].map((t) => ({ ...t }));
		this.rightsGroups = [...(seed.rightsGroups ?? [])];
		this.apiKeys = [...(seed.apiKeys ?? [])];

		this.routes = [
			...this.technicianRoutes(),
			...this.agentRoutes(),
			...this.groupRoutes('api/techniciangroup', 'tech', this.technicianGroups, (id) => this.memberFromTechnician(id)),
			...this.groupRoutes('api/agentgroup', 'agent', this.agentGroups, (id) => this.memberFromAgent(id)),
			...this.leafRoutes(),
			...this.tripletRoutes(),
			route('GET', /^api\/rightsgroup$/, () => ok(clone(this.rightsGroups))),
			route('GET', /^api\/apikey$/, () => ok(clone(this.apiKeys))),
		];
	}

	async send(request: ApiRequest): Promise<ClientResult<unknown>> {
		this.calls.push({
			method: request.method,
			endpoint: request.endpoint,
			mode: request.mode ?? TransportMode.STANDARD,
			query: request.query,
			body: request.body,
		});

		const failure = this.takeFailure(request);
		if (failure) {
			return err(ClientError.api(failure.statusCode, request.method, request.endpoint, failure.message));
		}

		for (const candidate of this.routes) {
			if (candidate.method !== request.method) continue;
			const match = candidate.pattern.exec(request.endpoint);
			if (match) {
				return candidate.handler(match, request);
			}
		}
		return reject(request, 404, 'No such endpoint');
	}

	/**
	 * Make the next `times` matching requests fail before reaching the
	 * collections.
	 */
	failOn(method: HttpMethod, endpoint: string | RegExp, failure: InjectedFailure, times = 1): void {
		this.failures.push({ method, endpoint, ...failure, remaining: times });
	}

	/** Every call that was not a GET, in order */
	mutatingCalls(): RecordedCall[] {
		return this.calls.filter((call) => call.method !== 'GET');
	}

	/** `METHOD endpoint` lines, convenient for sequence assertions */
	callLines(calls: readonly RecordedCall[] = this.calls): string[] {
		return calls.map((call) => `${call.method} ${call.endpoint}`);
	}

	countCalls(method: HttpMethod, endpoint: string | RegExp): number {
		return this.calls.filter((call) => call.method === method && matchesEndpoint(endpoint, call.endpoint)).length;
	}

	resetCalls(): void {
		this.calls.length = 0;
	}

	private takeFailure(request: ApiRequest): PendingFailure | undefined {
		const failure = this.failures.find(
			(f) => f.remaining > 0 && f.method === request.method && matchesEndpoint(f.endpoint, request.endpoint),
		);
		if (failure) {
			failure.remaining--;
		}
		return failure;
	}

	private allocateId(): number {
		return this.nextId++;
	}

	private technicianRoutes(): Route[] {
		return [
			route('GET', /^api\/technician$/, () => ok(clone(this.technicians))),
			route('GET', /^api\/technician\/(\d+)$/, (match, request) => {
				const technician = this.technicians.find((t) => t.id === Number(match[1]));
				return technician ? ok(clone(technician)) : reject(request, 404, 'Technician does not exist');
			}),
			route('POST', /^api\/technician$/, (_match, request) => {
				const input = TechnicianCreateSchema.safeParse(request.body);
				if (!input.success) return reject(request, 400, 'Invalid technician');

				const technician = TechnicianSchema.parse({ ...input.data, id: this.allocateId() });
				this.technicians.push(technician);
				return ok(clone(technician));
			}),
			route('PUT', /^api\/technician\/status$/, (_match, request) => {
				const input = IdBodySchema.safeParse(request.body);
				if (!input.success) return reject(request, 400, 'Invalid status change');

				const technician = this.technicians.find((t) => t.id === input.data.id);
				if (!technician) return reject(request, 404, 'Technician does not exist');
				technician.status = input.data.status;
				return ok(null);
			}),
			route('PUT', /^api\/technician\/options$/, (_match, request) => {
				const technician = this.technicians.find((t) => t.id === Number(request.query?.['id']));
				if (!technician) return reject(request, 404, 'Technician does not exist');

				const options = TechnicianOptionsSchema.safeParse(request.body);
				if (!options.success) return reject(request, 400, 'Unknown option');
				technician.options = { ...technician.options, ...options.data };
				return ok(null);
			}),
			route('PUT', /^api\/technician\/(\d+)$/, (match, request) => {
				const index = this.technicians.findIndex((t) => t.id === Number(match[1]));
				const existing = this.technicians[index];
				if (!existing) return reject(request, 404, 'Technician does not exist');

				const update = TechnicianUpdateSchema.safeParse(request.body);
				if (!update.success) return reject(request, 400, 'Invalid technician');

				const technician = TechnicianSchema.parse({ ...existing, ...update.data });
				this.technicians[index] = technician;
				return ok(clone(technician));
			}),
			route('DELETE', /^api\/technician\/(\d+)$/, (match, request) => {
				const id = Number(match[1]);
				if (!removeWhere(this.technicians, (t) => t.id === id)) {
					return reject(request, 404, 'Technician does not exist');
				}
				for (const group of this.technicianGroups) {
					group.members = group.members.filter((m) => m.id !== id);
				}
				return ok(null);
			}),
		];
	}

	private agentRoutes(): Route[] {
		return [
			route('GET', /^api\/agent$/, () => ok(clone(this.agents))),
			route('GET', /^api\/agent\/info$/, (_match, request) => {
				const guid = String(request.query?.['guid'] ?? '').toLowerCase();
				const agent = this.agents.find((a) => a.guid.toLowerCase() === guid);
				return agent ? ok(clone(agent)) : reject(request, 404, 'Agent does not exist');
			}),
			route('PUT', /^api\/agent\/(\d+)\/options$/, (match, request) => {
				const agent = this.agents.find((a) => a.id === Number(match[1]));
				if (!agent) return reject(request, 404, 'Agent does not exist');

				const options = AgentOptionsSchema.safeParse(request.body);
				if (!options.success) return reject(request, 400, 'Unknown option');
				agent.options = { ...agent.options, ...options.data };
				return ok(null);
			}),
			route('PUT', /^api\/agent\/(\d+)\/accountleaf\/([^/]+)$/, (match, request) => {
				const agent = this.agents.find((a) => a.id === Number(match[1]));
				if (!agent) return reject(request, 404, 'Agent does not exist');

				const path = decodeURIComponent(match[2] ?? '');
				if (!this.leafs.some((l) => l.path === path)) {
					return reject(request, 404, 'Leaf does not exist');
				}
				agent.accountLeaf = path;
				return ok(null);
			}),
			route('DELETE', /^api\/agent\/(\d+)$/, (match, request) => {
				const id = Number(match[1]);
				if (!removeWhere(this.agents, (a) => a.id === id)) {
					return reject(request, 404, 'Agent does not exist');
				}
				for (const group of this.agentGroups) {
					group.members = group.members.filter((m) => m.id !== id);
				}
				return ok(null);
			}),
		];
	}

	private groupRoutes(
		collection: string,
		memberSegment: string,
		groups: FakeGroup[],
		memberById: (id: number) => FakeGroupMember | undefined,
	): Route[] {
		const base = collection;
		const find = (id: string | undefined): FakeGroup | undefined => groups.find((g) => g.id === Number(id));

		return [
			route('GET', new RegExp(`^${base}$`), () =>
				ok(groups.map((g) => ({ id: g.id, name: g.name, memberCount: g.members.length }))),
			),
			route('GET', new RegExp(`^${base}/(\\d+)$`), (match, request) => {
				const group = find(match[1]);
				return group ? ok(clone(group)) : reject(request, 404, 'Group does not exist');
			}),
			route('POST', new RegExp(`^${base}$`), (_match, request) => {
				const input = NameBodySchema.safeParse(request.body);
				if (!input.success) return reject(request, 400, 'Group name is required');

				const group: FakeGroup = { id: this.allocateId(), name: input.data.name, members: [] };
				groups.push(group);
				return ok(clone(group));
			}),
			route('PUT', new RegExp(`^${base}/(\\d+)$`), (match, request) => {
				const group = find(match[1]);
				if (!group) return reject(request, 404, 'Group does not exist');

				const input = NameBodySchema.safeParse(request.body);
				if (!input.success) return reject(request, 400, 'Group name is required');
				group.name = input.data.name;
				return ok(clone(group));
			}),
			route('DELETE', new RegExp(`^${base}/(\\d+)$`), (match, request) => {
				const group = find(match[1]);
				if (!group) return reject(request, 404, 'Group does not exist');
				if (group.members.length > 0) return reject(request, 409, 'Group still has members');

				removeWhere(groups, (g) => g === group);
				return ok(null);
			}),
			route('POST', new RegExp(`^${base}/(\\d+)/${memberSegment}/(\\d+)$`), (match, request) => {
				const group = find(match[1]);
				if (!group) return reject(request, 404, 'Group does not exist');

				const member = memberById(Number(match[2]));
				if (!member) return reject(request, 404, 'Member does not exist');
				if (group.members.some((m) => m.id === member.id)) return reject(request, 409, 'Already a member');

				group.members.push(member);
				return ok(null);
			}),
			route('DELETE', new RegExp(`^${base}/(\\d+)/${memberSegment}/(\\d+)$`), (match, request) => {
				const group = find(match[1]);
				if (!group) return reject(request, 404, 'Group does not exist');

				const memberId = Number(match[2]);
				if (!removeWhere(group.members, (m) => m.id === memberId)) {
					return reject(request, 404, 'Not a member');
				}
				return ok(null);
			}),
		];
	}

	private leafRoutes(): Route[] {
		return [
			route('GET', /^api\/accountleaf$/, () => ok(clone(this.leafs))),
			route('GET', /^api\/accountleaf\/(\d+)$/, (match, request) => {
				const leaf = this.leafs.find((l) => l.id === Number(match[1]));
				return leaf ? ok(clone(leaf)) : reject(request, 404, 'Leaf does not exist');
			}),
			route('POST', /^api\/accountleaf$/, (_match, request) => {
				const input = PathBodySchema.safeParse(request.body);
				if (!input.success) return reject(request, 400, 'Leaf path is required');

				const leaf = LeafSchema.parse({ id: this.allocateId(), path: input.data.path });
				this.leafs.push(leaf);
				return ok(clone(leaf));
			}),
			route('DELETE', /^api\/accountleaf\/(\d+)$/, (match, request) => {
				const id = Number(match[1]);
				return removeWhere(this.leafs, (l) => l.id === id) ? ok(null) : reject(request, 404, 'Leaf does not exist');
			}),
		];
	}

	private tripletRoutes(): Route[] {
		return [
			route('GET', /^api\/triplet$/, () => ok(clone(this.triplets))),
			route('GET', /^api\/triplet\/(\d+)$/, (match, request) => {
				const triplet = this.triplets.find((t) => t.id === Number(match[1]));
				return triplet ? ok(clone(triplet)) : reject(request, 404, 'Triplet does not exist');
			}),
			route('POST', /^api\/triplet$/, (_match, request) => {
				const input = TripletInputSchema.safeParse(request.body);
				if (!input.success) return reject(request, 400, 'Invalid triplet');

				const triplet = TripletSchema.parse({ ...input.data, id: this.allocateId() });
				this.triplets.push(triplet);
				return ok(clone(triplet));
			}),
			route('PUT', /^api\/triplet\/(\d+)$/, (match, request) => {
				const index = this.triplets.findIndex((t) => t.id === Number(match[1]));
				const existing = this.triplets[index];
				if (!existing) return reject(request, 404, 'Triplet does not exist');

				const input = TripletInputSchema.safeParse(request.body);
				if (!input.success) return reject(request, 400, 'Invalid triplet');

				const triplet = TripletSchema.parse({ ...input.data, id: existing.id });
				this.triplets[index] = triplet;
				return ok(clone(triplet));
			}),
			route('DELETE', /^api\/triplet\/(\d+)$/, (match, request) => {
				const id = Number(match[1]);
				return removeWhere(this.triplets, (t) => t.id === id)
					? ok(null)
					: reject(request, 404, 'Triplet does not exist');
			}),
		];
	}

	private memberFromTechnician(id: number): FakeGroupMember | undefined {
		const technician = this.technicians.find((t) => t.id === id);
		return technician ? { id: technician.id, name: technician.name } : undefined;
	}

	private memberFromAgent(id: number): FakeGroupMember | undefined {
		const agent = this.agents.find((a) => a.id === id);
		return agent ? { id: agent.id, name: agent.name, guid: agent.guid } : undefined;
	}
}

/**
 * Minimal technician record for seeding.
 */
export function technician(id: number, name: string): Technician {
	return TechnicianSchema.parse({ id, name });
}

/**
 * Minimal agent record for seeding.
 */
export function agent(id: number, name: string, guid: string, accountLeaf?: string): Agent {
	return AgentSchema.parse({ id, name, guid, accountLeaf });
}

function route(method: HttpMethod, pattern: RegExp, handler: Handler): Route {
	return { method, pattern, handler };
}

function reject(request: ApiRequest, statusCode: number, message: string): ClientResult<unknown> {
	return err(ClientError.api(statusCode, request.method, request.endpoint, message));
}

function matchesEndpoint(expected: string | RegExp, endpoint: string): boolean {
	return typeof expected === 'string' ? expected === endpoint : expected.test(endpoint);
}

function removeWhere<T>(items: T[], predicate: (item: T) => boolean): boolean {
	const index = items.findIndex(predicate);
	if (index === -1) {
		return false;
	}
	items.splice(index, 1);
	return true;
}

function toGroup(seed: FakeGroupSeed): FakeGroup {
	return { id: seed.id, name: seed.name, members: [...(seed.members ?? [])] };
}

function clone<T>(value: T): T {
	return structuredClone(value);
}
