/**
 * Membership Resolver
 *
 * Answers "which groups contain the member named X" for one group kind.
 *
 * - cached (default): the first query fetches the summary listing, then the
 *   detail of every group with at least one member, in summary order; the
 *   result is kept for the life of the resolver and every later query scans
 *   it in memory
 * - live: every query repeats the same fetches
 *
 * Results follow summary order. Member names compare exactly. A member in
 * no group yields an empty list.
 */

import { err, ok } from 'neverthrow';
import type { ClientResult } from '@accessgrant/domain-core';
import type { Logger } from '@accessgrant/logging';
import type { GroupDetail, GroupMember } from '@accessgrant/shared-types';
import type { GroupAccessor } from '../accessors/group-accessor.js';

export const MembershipMode = {
	CACHED: 'cached',
	LIVE: 'live',
} as const;

export type MembershipMode = (typeof MembershipMode)[keyof typeof MembershipMode];

export interface MembershipResolverOptions {
	readonly logger: Logger;
	/** Defaults to cached */
	readonly mode?: MembershipMode | undefined;
}

type Snapshot<TMember extends GroupMember> = ReadonlyArray<GroupDetail<TMember>>;

export class MembershipResolver<TMember extends GroupMember> {
	readonly mode: MembershipMode;
	private readonly logger: Logger;
	private cache: Promise<ClientResult<Snapshot<TMember>>> | null = null;

	constructor(
		private readonly groups: GroupAccessor<TMember>,
		options: MembershipResolverOptions,
	) {
		this.mode = options.mode ?? MembershipMode.CACHED;
		this.logger = options.logger.child({ component: 'MembershipResolver', resource: groups.kind.resource });
	}

	/**
	 * Names of the groups containing a member named `memberName`.
	 */
	async groupsOf(memberName: string): Promise<ClientResult<string[]>> {
		const snapshot = await this.snapshot();
		if (snapshot.isErr()) return err(snapshot.error);

		return ok(scan(snapshot.value, memberName));
	}

	/**
	 * Membership for several names at once, keyed in input order. In live
	 * mode the batch counts as one query.
	 */
	async groupsOfMany(memberNames: readonly string[]): Promise<ClientResult<Map<string, string[]>>> {
		const snapshot = await this.snapshot();
		if (snapshot.isErr()) return err(snapshot.error);

		const result = new Map<string, string[]>();
		for (const name of memberNames) {
			result.set(name, scan(snapshot.value, name));
		}
		return ok(result);
	}

	/**
	 * Drop the cached snapshot; the next query rebuilds it.
	 */
	invalidate(): void {
		this.cache = null;
	}

	private snapshot(): Promise<ClientResult<Snapshot<TMember>>> {
		if (this.mode === MembershipMode.LIVE) {
			return this.fetchSnapshot();
		}

		if (this.cache === null) {
			// Concurrent first queries share this build. A failed build is
			// never kept.
			const build: Promise<ClientResult<Snapshot<TMember>>> = this.fetchSnapshot().then((result) => {
				if (result.isErr() && this.cache === build) {
					this.cache = null;
				}
				return result;
			});
			this.cache = build;
		}
		return this.cache;
	}

	private async fetchSnapshot(): Promise<ClientResult<Snapshot<TMember>>> {
		const summaries = await this.groups.listSummaries();
		if (summaries.isErr()) return err(summaries.error);

		const details: GroupDetail<TMember>[] = [];
		let skipped = 0;
		for (const summary of summaries.value) {
			if (summary.memberCount === 0) {
				skipped++;
				continue;
			}
			const detail = await this.groups.getDetail(summary.id);
			if (detail.isErr()) {
				this.logger.warn(
					{ groupId: summary.id, fetched: details.length, err: detail.error },
					'Group detail fetch failed; discarding membership snapshot',
				);
				return err(detail.error);
			}
			details.push(detail.value);
		}

		this.logger.debug({ mode: this.mode, groups: details.length, skipped }, 'Membership snapshot built');
		return ok(details);
	}
}

function scan<TMember extends GroupMember>(snapshot: Snapshot<TMember>, memberName: string): string[] {
	const names: string[] = [];
	for (const group of snapshot) {
		if (group.members.some((member) => member.name === memberName)) {
			names.push(group.name);
		}
	}
	return names;
}
