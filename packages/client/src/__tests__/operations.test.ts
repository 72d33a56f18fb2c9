import { beforeEach, describe, expect, it } from 'vitest';
import { createClientConfig } from '@accessgrant/config';
import { StaticCredentialProvider } from '@accessgrant/credentials';
import { Ref } from '@accessgrant/domain-core';
import { createLoggerToStream, createSilentLogger, type Logger } from '@accessgrant/logging';
import { createAccessClient, type AccessClient } from '../client.js';
import { FakeServiceTransport, agent, technician, type FakeServiceSeed } from '../testing/index.js';

const AGENT_GUID = '3F2504E0-4F89-11D3-9A0C-0305E82C3301';

function clientFor(service: FakeServiceTransport, logger: Logger = createSilentLogger()): AccessClient {
	return createAccessClient({
		config: createClientConfig(),
		credentials: new StaticCredentialProvider({
			principal: 'ops@example.com',
			secret: 'test-secret',
			host: 'https://tenant.example.com',
		}),
		logger,
		transport: service,
	});
}

const seed: FakeServiceSeed = {
	technicians: [technician(1, 'jdoe'), technician(2, 'asmith'), technician(3, 'dup'), technician(4, 'dup')],
	agents: [
		agent(10, 'HOST\\Admin', AGENT_GUID),
		agent(11, 'HOST\\Admin', 'b7e1c3a0-0000-4000-8000-000000000011'),
		agent(12, 'WEB01\\svc', 'b7e1c3a0-0000-4000-8000-000000000012', 'Acme.Web'),
	],
	technicianGroups: [
		{ id: 40, name: 'Ops', members: [{ id: 1, name: 'jdoe' }] },
		{
			id: 41,
			name: 'Legacy',
			members: [
				{ id: 1, name: 'jdoe' },
				{ id: 2, name: 'asmith' },
				{ id: 3, name: 'dup' },
			],
		},
	],
	agentGroups: [{ id: 50, name: 'Servers', members: [{ id: 12, name: 'WEB01\\svc' }] }],
	leafs: [{ id: 70, path: 'Acme.Web' }],
	rightsGroups: [{ id: 80, name: 'Helpdesk', rights: [] }],
};

describe('mutating operations', () => {
	let service: FakeServiceTransport;
	let client: AccessClient;

	beforeEach(() => {
		service = new FakeServiceTransport(seed);
		client = clientFor(service);
	});

	describe('AddTechnicianToGroup', () => {
		it('should issue no mutating call when the technician is already a member', async () => {
			const result = await client.operations.addTechnicianToGroup.execute({
				technician: Ref.byName('jdoe'),
				group: 'Ops',
			});

			expect(result._unsafeUnwrap()).toEqual({ groupId: 40, memberId: 1, changed: false });
			expect(service.mutatingCalls()).toEqual([]);
		});

		it('should add the membership edge by id', async () => {
			const result = await client.operations.addTechnicianToGroup.execute({
				technician: Ref.byName('asmith'),
				group: 'Ops',
			});

			expect(result._unsafeUnwrap()).toEqual({ groupId: 40, memberId: 2, changed: true });
			expect(service.callLines(service.mutatingCalls())).toEqual(['POST api/techniciangroup/40/tech/2']);
		});

		it('should stop on an ambiguous technician name without mutating', async () => {
			const error = (
				await client.operations.addTechnicianToGroup.execute({ technician: Ref.byName('dup'), group: 'Ops' })
			)._unsafeUnwrapErr();

			expect(error).toMatchObject({ type: 'ambiguous_match', resource: 'technician', matches: 2 });
			expect(service.mutatingCalls()).toEqual([]);
		});

		it('should report a missing group', async () => {
			const error = (
				await client.operations.addTechnicianToGroup.execute({ technician: Ref.byName('asmith'), group: 'ops' })
			)._unsafeUnwrapErr();

			expect(error).toMatchObject({ type: 'not_found', resource: 'technician group', criteria: 'name "ops"' });
		});
	});

	describe('RemoveTechnicianFromGroup', () => {
		it('should be a no-op for a technician outside the group', async () => {
			const result = await client.operations.removeTechnicianFromGroup.execute({
				technician: Ref.byId(2),
				group: 'Ops',
			});

			expect(result._unsafeUnwrap().changed).toBe(false);
			expect(service.mutatingCalls()).toEqual([]);
		});

		it('should remove an existing member', async () => {
			const result = await client.operations.removeTechnicianFromGroup.execute({
				technician: Ref.byName('jdoe'),
				group: 'Ops',
			});

			expect(result._unsafeUnwrap().changed).toBe(true);
			expect(service.callLines(service.mutatingCalls())).toEqual(['DELETE api/techniciangroup/40/tech/1']);
		});
	});

	describe('AddAgentToGroup', () => {
		it('should refuse the duplicated agent name', async () => {
			const error = (
				await client.operations.addAgentToGroup.execute({ agent: Ref.byName('HOST\\Admin'), group: 'Servers' })
			)._unsafeUnwrapErr();

			expect(error).toMatchObject({ type: 'ambiguous_match', resource: 'agent', criteria: 'name "HOST\\Admin"' });
			expect(service.mutatingCalls()).toEqual([]);
		});

		it('should add the agent addressed by GUID', async () => {
			const result = await client.operations.addAgentToGroup.execute({
				agent: Ref.byGuid(AGENT_GUID),
				group: 'Servers',
			});

			expect(result._unsafeUnwrap()).toEqual({ groupId: 50, memberId: 10, changed: true });
			expect(service.callLines(service.mutatingCalls())).toEqual(['POST api/agentgroup/50/agent/10']);
		});
	});

	describe('DeleteTechnicianGroup', () => {
		it('should remove every member in order before deleting the group', async () => {
			const result = await client.operations.deleteTechnicianGroup.execute({ group: 'Legacy' });

			expect(result._unsafeUnwrap()).toEqual({ groupId: 41, removedMembers: ['jdoe', 'asmith', 'dup'] });
			expect(service.callLines(service.mutatingCalls())).toEqual([
				'DELETE api/techniciangroup/41/tech/1',
				'DELETE api/techniciangroup/41/tech/2',
				'DELETE api/techniciangroup/41/tech/3',
				'DELETE api/techniciangroup/41',
			]);
			expect(service.technicianGroups.map((g) => g.name)).toEqual(['Ops']);
		});

		it('should stop at the first failed removal and report partial completion', async () => {
			service.failOn('DELETE', 'api/techniciangroup/41/tech/2', { statusCode: 500, message: 'boom' });

			const error = (await client.operations.deleteTechnicianGroup.execute({ group: 'Legacy' }))._unsafeUnwrapErr();

			expect(error).toMatchObject({
				type: 'partial_completion',
				operation: 'DeleteTechnicianGroup',
				failedStep: 'remove member "asmith" (id 2)',
				completedSteps: ['remove member "jdoe" (id 1)'],
				pendingSteps: ['remove member "dup" (id 3)', 'delete technician group "Legacy" (id 41)'],
			});
			expect(error.message).toBe(
				'DeleteTechnicianGroup stopped at "remove member "asmith" (id 2)" after 1 of 4 steps; ' +
					'not attempted: remove member "dup" (id 3), delete technician group "Legacy" (id 41). ' +
					'Cause: DELETE api/techniciangroup/41/tech/2 failed (HTTP 500): boom',
			);
			expect(service.callLines(service.mutatingCalls())).toEqual([
				'DELETE api/techniciangroup/41/tech/1',
				'DELETE api/techniciangroup/41/tech/2',
			]);
		});

		it('should return the plain error when nothing was removed yet', async () => {
			service.failOn('DELETE', 'api/techniciangroup/41/tech/1', { statusCode: null, message: 'socket hang up' });

			const error = (await client.operations.deleteTechnicianGroup.execute({ group: 'Legacy' }))._unsafeUnwrapErr();

			expect(error).toMatchObject({ type: 'api', statusCode: null });
		});

		it('should use the command name in the report', async () => {
			service.failOn('DELETE', 'api/techniciangroup/41', { statusCode: 409, message: 'locked' });

			const error = (
				await client.operations.deleteTechnicianGroup.execute({ _type: 'RetireLegacy', group: 'Legacy' })
			)._unsafeUnwrapErr();

			expect(error).toMatchObject({
				type: 'partial_completion',
				operation: 'RetireLegacy',
				failedStep: 'delete technician group "Legacy" (id 41)',
				pendingSteps: [],
			});
		});
	});

	describe('DeleteAgentGroup', () => {
		it('should evacuate and delete', async () => {
			const result = await client.operations.deleteAgentGroup.execute({ group: 'Servers' });

			expect(result._unsafeUnwrap()).toEqual({ groupId: 50, removedMembers: ['WEB01\\svc'] });
			expect(service.callLines(service.mutatingCalls())).toEqual([
				'DELETE api/agentgroup/50/agent/12',
				'DELETE api/agentgroup/50',
			]);
		});
	});

	describe('AssignAgentLeaf', () => {
		it('should create a missing leaf and assign it by the resolved id', async () => {
			const result = await client.operations.assignAgentLeaf.execute({ agent: Ref.byGuid(AGENT_GUID), path: 'X.Y' });

			expect(result._unsafeUnwrap()).toEqual({ agentId: 10, leafId: 1000, leafCreated: true, changed: true });
			expect(service.callLines()).toEqual([
				'GET api/agent',
				'GET api/accountleaf',
				'POST api/accountleaf',
				'PUT api/agent/10/accountleaf/X.Y',
			]);
			expect(service.agents[0]?.accountLeaf).toBe('X.Y');
		});

		it('should change nothing when the agent already points at the leaf', async () => {
			const result = await client.operations.assignAgentLeaf.execute({ agent: Ref.byId(12), path: 'Acme.Web' });

			expect(result._unsafeUnwrap()).toEqual({ agentId: 12, leafId: 70, leafCreated: false, changed: false });
			expect(service.mutatingCalls()).toEqual([]);
		});

		it('should report the created leaf when the assignment fails', async () => {
			service.failOn('PUT', /^api\/agent\/10\/accountleaf\//, { statusCode: 500, message: 'boom' });

			const error = (
				await client.operations.assignAgentLeaf.execute({ agent: Ref.byId(10), path: 'X.Y' })
			)._unsafeUnwrapErr();

			expect(error).toMatchObject({
				type: 'partial_completion',
				operation: 'AssignAgentLeaf',
				completedSteps: ['create leaf "X.Y" (id 1000)'],
				pendingSteps: [],
			});
			expect(service.leafs.map((l) => l.path)).toEqual(['Acme.Web', 'X.Y']);
		});

		it('should validate the path before resolving anything', async () => {
			const error = (
				await client.operations.assignAgentLeaf.execute({ agent: Ref.byId(10), path: '.X' })
			)._unsafeUnwrapErr();

			expect(error).toMatchObject({ type: 'validation', code: 'INVALID_LEAF_PATH' });
			expect(service.calls).toEqual([]);
		});
	});

	describe('options', () => {
		it('should set technician options after resolving by name', async () => {
			const result = await client.operations.setTechnicianOptions.execute({
				technician: Ref.byName('asmith'),
				options: { requireMfa: true },
			});

			expect(result._unsafeUnwrap()).toEqual({ technicianId: 2, options: { requireMfa: true } });
			expect(service.technicians[1]?.options).toEqual({ requireMfa: true });
		});

		it('should reject an out-of-range agent option before any call', async () => {
			const error = (
				await client.operations.setAgentOptions.execute({ agent: Ref.byId(12), options: { logLevel: 9 } })
			)._unsafeUnwrapErr();

			expect(error).toMatchObject({ type: 'validation', code: 'INVALID_AGENT_OPTIONS', field: 'options.logLevel' });
			expect(service.calls).toEqual([]);
		});
	});

	describe('deletes', () => {
		it('should delete a technician by id', async () => {
			const result = await client.operations.deleteTechnician.execute({ technician: Ref.byName('asmith') });

			expect(result._unsafeUnwrap()).toEqual({ technicianId: 2 });
			expect(service.callLines(service.mutatingCalls())).toEqual(['DELETE api/technician/2']);
		});

		it('should delete an agent addressed by GUID', async () => {
			const result = await client.operations.deleteAgent.execute({ agent: Ref.byGuid(AGENT_GUID.toLowerCase()) });

			expect(result._unsafeUnwrap()).toEqual({ agentId: 10 });
			expect(service.callLines(service.mutatingCalls())).toEqual(['DELETE api/agent/10']);
		});

		it('should round-trip a leaf through create, list and delete', async () => {
			const created = (await client.leafs.create('Acme.Berlin'))._unsafeUnwrap();

			const deleted = await client.operations.deleteLeaf.execute({ path: 'Acme.Berlin' });

			expect(deleted._unsafeUnwrap()).toEqual({ leafId: created.id });
			expect((await client.leafs.list({ pattern: 'Acme.Berlin' }))._unsafeUnwrap()).toEqual([]);
		});
	});

	describe('CreateTripletByNames', () => {
		it('should resolve the three names and create one triplet', async () => {
			const result = await client.operations.createTripletByNames.execute({
				technicianGroup: 'Ops',
				rightsGroup: 'Helpdesk',
				agentGroup: 'Servers',
				expiresAt: '2027-06-30T18:00:00+02:00',
			});

			expect(result._unsafeUnwrap()).toMatchObject({
				technicianGroupId: 40,
				rightsGroupId: 80,
				agentGroupId: 50,
				expiresAt: '2027-06-30T18:00:00+02:00',
			});
			expect(service.callLines()).toEqual([
				'GET api/techniciangroup',
				'GET api/rightsgroup',
				'GET api/agentgroup',
				'POST api/triplet',
			]);
		});

		it('should reject a malformed expiration before any call', async () => {
			const error = (
				await client.operations.createTripletByNames.execute({
					technicianGroup: 'Ops',
					rightsGroup: 'Helpdesk',
					agentGroup: 'Servers',
					expiresAt: 'next tuesday',
				})
			)._unsafeUnwrapErr();

			expect(error).toMatchObject({ type: 'validation', code: 'INVALID_EXPIRATION', field: 'expiresAt' });
			expect(service.calls).toEqual([]);
		});

		it('should reject an over-long name or description before any call', async () => {
			const names = { technicianGroup: 'Ops', rightsGroup: 'Helpdesk', agentGroup: 'Servers', expiresAt: null };

			const longName = (
				await client.operations.createTripletByNames.execute({ ...names, name: 'x'.repeat(200) })
			)._unsafeUnwrapErr();
			const longDescription = (
				await client.operations.createTripletByNames.execute({ ...names, description: 'x'.repeat(513) })
			)._unsafeUnwrapErr();

			expect(longName).toMatchObject({ type: 'validation', code: 'INVALID_TRIPLET_NAME', field: 'name' });
			expect(longDescription).toMatchObject({
				type: 'validation',
				code: 'INVALID_TRIPLET_DESCRIPTION',
				field: 'description',
			});
			expect(service.calls).toEqual([]);
		});
	});

	describe('membership through the client', () => {
		it('should build a resolver for the requested group kind', async () => {
			const resolver = client.membership('agent', 'live');

			expect((await resolver.groupsOf('WEB01\\svc'))._unsafeUnwrap()).toEqual(['Servers']);
			expect(resolver.mode).toBe('live');
		});
	});
});

describe('operation step logging', () => {
	let service: FakeServiceTransport;
	let client: AccessClient;
	let records: Array<Record<string, unknown>>;

	beforeEach(() => {
		records = [];
		service = new FakeServiceTransport(seed);
		const logger = createLoggerToStream(
			{ level: 'info', serviceName: 'test' },
			{
				write(chunk: string) {
					records.push(JSON.parse(chunk) as Record<string, unknown>);
				},
			},
		);
		client = clientFor(service, logger);
	});

	function stepLog(): Array<Record<string, unknown>> {
		return records.map(({ useCase, msg }) => ({ useCase, msg }));
	}

	it('should log the mutating call and the no-op of a membership change', async () => {
		await client.operations.addTechnicianToGroup.execute({ technician: Ref.byName('asmith'), group: 'Ops' });
		await client.operations.addTechnicianToGroup.execute({ technician: Ref.byName('asmith'), group: 'Ops' });

		expect(stepLog()).toEqual([
			{ useCase: 'AddTechnicianToGroup', msg: 'Member added' },
			{ useCase: 'AddTechnicianToGroup', msg: 'Membership already in requested state' },
		]);
		expect(records[0]).toMatchObject({ level: 'info', groupId: 40, memberId: 2, change: 'add' });
	});

	it('should log every removal and the delete of an evacuated group', async () => {
		await client.operations.deleteAgentGroup.execute({ group: 'Servers' });

		expect(stepLog()).toEqual([
			{ useCase: 'DeleteAgentGroup', msg: 'Member removed' },
			{ useCase: 'DeleteAgentGroup', msg: 'Group deleted' },
		]);
	});

	it('should log single-call mutations with the affected id', async () => {
		await client.operations.deleteTechnician.execute({ technician: Ref.byName('asmith') });
		await client.operations.setAgentOptions.execute({ agent: Ref.byId(12), options: { autoUpdate: true } });
		await client.operations.deleteLeaf.execute({ path: 'Acme.Web' });

		expect(stepLog()).toEqual([
			{ useCase: 'DeleteTechnician', msg: 'Technician deleted' },
			{ useCase: 'SetAgentOptions', msg: 'Agent options set' },
			{ useCase: 'DeleteLeaf', msg: 'Leaf deleted' },
		]);
		expect(records[0]).toMatchObject({ technicianId: 2 });
		expect(records[1]).toMatchObject({ agentId: 12, keys: ['autoUpdate'] });
		expect(records[2]).toMatchObject({ leafId: 70, path: 'Acme.Web' });
	});

	it('should log a triplet created from names', async () => {
		await client.operations.createTripletByNames.execute({
			technicianGroup: 'Ops',
			rightsGroup: 'Helpdesk',
			agentGroup: 'Servers',
			expiresAt: null,
		});

		expect(stepLog()).toEqual([{ useCase: 'CreateTripletByNames', msg: 'Triplet created' }]);
		expect(records[0]).toMatchObject({ technicianGroupId: 40, rightsGroupId: 80, agentGroupId: 50 });
	});
});
