/**
 * Entity references
 *
 * Operations address a record either by its human name, its service id, its
 * GUID (agents only) or with a record the caller already holds. Accessors
 * switch on `kind` instead of probing the argument's shape.
 */

import { err, ok } from 'neverthrow';
import { ClientError } from './errors.js';
import type { ClientResult } from './result.js';

export interface ByName {
	readonly kind: 'name';
	readonly name: string;
}

export interface ById {
	readonly kind: 'id';
	readonly id: number;
}

export interface ByGuid {
	readonly kind: 'guid';
	readonly guid: string;
}

export interface Resolved<T> {
	readonly kind: 'resolved';
	readonly record: T;
}

/**
 * Reference to a record that has a name and an id.
 */
export type EntityRef<T> = ByName | ById | Resolved<T>;

/**
 * Reference to an agent, which may also be addressed by GUID.
 */
export type AgentRef<T> = EntityRef<T> | ByGuid;

export const Ref = {
	byName(name: string): ByName {
		return { kind: 'name', name };
	},

	byId(id: number): ById {
		return { kind: 'id', id };
	},

	byGuid(guid: string): ByGuid {
		return { kind: 'guid', guid };
	},

	resolved<T>(record: T): Resolved<T> {
		return { kind: 'resolved', record };
	},

	/**
	 * Human-readable criteria for error messages.
	 */
	describe(ref: ByName | ById | ByGuid | Resolved<unknown>): string {
		switch (ref.kind) {
			case 'name':
				return `name "${ref.name}"`;
			case 'id':
				return `id ${ref.id}`;
			case 'guid':
				return `guid ${ref.guid}`;
			case 'resolved':
				return 'supplied record';
		}
	},
};

/**
 * The single gate every "exactly one" lookup goes through: zero matches is
 * not_found, more than one is ambiguous_match.
 */
export function selectExactlyOne<T>(resource: string, criteria: string, matches: readonly T[]): ClientResult<T> {
	const [first] = matches;
	if (first === undefined) {
		return err(ClientError.notFound(resource, criteria));
	}
	if (matches.length > 1) {
		return err(ClientError.ambiguous(resource, criteria, matches.length));
	}
	return ok(first);
}
