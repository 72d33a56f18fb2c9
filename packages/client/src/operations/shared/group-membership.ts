/**
 * Steps shared by the technician-group and agent-group operations.
 */

import { err, ok } from 'neverthrow';
import { ClientError, type ClientResult } from '@accessgrant/domain-core';
import type { Logger } from '@accessgrant/logging';
import type { GroupMember } from '@accessgrant/shared-types';
import type { GroupAccessor } from '../../accessors/group-accessor.js';

export interface MembershipChange {
	readonly groupId: number;
	readonly memberId: number;
	/** False when the group was already in the requested state */
	readonly changed: boolean;
}

export interface GroupDeletion {
	readonly groupId: number;
	/** Names of the members removed before the delete, in removal order */
	readonly removedMembers: readonly string[];
}

/**
 * Fetch the group fresh, then add or remove the member unless the member
 * list already reflects the requested state.
 */
export async function applyMembershipChange<TMember extends GroupMember>(
	groups: GroupAccessor<TMember>,
	groupName: string,
	memberId: number,
	change: 'add' | 'remove',
	logger: Logger,
): Promise<ClientResult<MembershipChange>> {
	const group = await groups.getDetailByName(groupName);
	if (group.isErr()) return err(group.error);

	const groupId = group.value.id;
	const present = group.value.members.some((member) => member.id === memberId);
	if (present === (change === 'add')) {
		logger.info({ groupId, memberId, change }, 'Membership already in requested state');
		return ok({ groupId, memberId, changed: false });
	}

	const result =
		change === 'add' ? await groups.addMember(groupId, memberId) : await groups.removeMember(groupId, memberId);
	if (result.isErr()) return err(result.error);

	logger.info({ groupId, memberId, change }, change === 'add' ? 'Member added' : 'Member removed');
	return ok({ groupId, memberId, changed: true });
}

/**
 * Remove every member one by one, in member-list order, then delete the
 * group. The first failure stops the sequence; once anything was removed
 * the failure is reported as a partial completion.
 */
export async function evacuateAndDelete<TMember extends GroupMember>(
	groups: GroupAccessor<TMember>,
	groupName: string,
	operation: string,
	logger: Logger,
): Promise<ClientResult<GroupDeletion>> {
	const group = await groups.getDetailByName(groupName);
	if (group.isErr()) return err(group.error);

	const { id: groupId, members } = group.value;
	const removeStep = (member: TMember): string => `remove member "${member.name}" (id ${member.id})`;
	const deleteStep = `delete ${groups.kind.resource} "${group.value.name}" (id ${groupId})`;
	const completed: string[] = [];

	for (const [index, member] of members.entries()) {
		const removed = await groups.removeMember(groupId, member.id);
		if (removed.isErr()) {
			if (completed.length === 0) return err(removed.error);

			const pending = [...members.slice(index + 1).map(removeStep), deleteStep];
			logger.warn(
				{ operation, groupId, removed: completed.length, remaining: members.length - completed.length },
				'Member removal failed; group not deleted',
			);
			return err(ClientError.partialCompletion(operation, removeStep(member), completed, pending, removed.error));
		}
		completed.push(removeStep(member));
		logger.info({ operation, groupId, memberId: member.id }, 'Member removed');
	}

	const deleted = await groups.delete(groupId);
	if (deleted.isErr()) {
		if (completed.length === 0) return err(deleted.error);

		logger.warn({ operation, groupId, removed: completed.length }, 'Group evacuated but delete failed');
		return err(ClientError.partialCompletion(operation, deleteStep, completed, [], deleted.error));
	}

	logger.info({ operation, groupId, removed: completed.length }, 'Group deleted');
	return ok({ groupId, removedMembers: members.map((member) => member.name) });
}
