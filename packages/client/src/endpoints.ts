/**
 * Endpoint catalog.
 *
 * The listing endpoints below are documented by the service as GET with a
 * form body. They are flagged here, once; the executor decides how the flag
 * is honoured (see `ClientConfig.listingMode`), so a corrected service only
 * needs a configuration change.
 */

import { TransportMode, type ApiRequest } from './transport.js';

function listing(endpoint: string): ApiRequest {
	return { endpoint, method: 'GET', mode: TransportMode.LEGACY_FORM };
}

function item(collection: string) {
	return (id: number): string => `${collection}/${id}`;
}

export const Endpoints = {
	technician: {
		list: listing('api/technician'),
		collection: 'api/technician',
		item: item('api/technician'),
		status: 'api/technician/status',
		/** Technician id travels as the `id` query parameter */
		options: 'api/technician/options',
	},

	technicianGroup: {
		summaries: listing('api/techniciangroup'),
		detail: (id: number): ApiRequest => listing(`api/techniciangroup/${id}`),
		collection: 'api/techniciangroup',
		item: item('api/techniciangroup'),
		member: (groupId: number, technicianId: number): string => `api/techniciangroup/${groupId}/tech/${technicianId}`,
	},

	agent: {
		list: listing('api/agent'),
		/** GUID travels as the `guid` query parameter */
		info: 'api/agent/info',
		item: item('api/agent'),
		options: (id: number): string => `api/agent/${id}/options`,
		accountLeaf: (id: number, path: string): string => `api/agent/${id}/accountleaf/${encodeURIComponent(path)}`,
	},

	agentGroup: {
		summaries: listing('api/agentgroup'),
		detail: (id: number): ApiRequest => listing(`api/agentgroup/${id}`),
		collection: 'api/agentgroup',
		item: item('api/agentgroup'),
		member: (groupId: number, agentId: number): string => `api/agentgroup/${groupId}/agent/${agentId}`,
	},

	leaf: {
		list: listing('api/accountleaf'),
		collection: 'api/accountleaf',
		item: item('api/accountleaf'),
	},

	triplet: {
		collection: 'api/triplet',
		item: item('api/triplet'),
	},

	rightsGroup: {
		collection: 'api/rightsgroup',
	},

	apiKey: {
		list: listing('api/apikey'),
	},
} as const;

/**
 * Endpoints shared by both group kinds.
 */
export interface GroupEndpoints {
	readonly summaries: ApiRequest;
	detail(id: number): ApiRequest;
	readonly collection: string;
	item(id: number): string;
	member(groupId: number, memberId: number): string;
}
