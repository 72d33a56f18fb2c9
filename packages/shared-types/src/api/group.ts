import { z } from 'zod';

/**
 * Summary view of a technician or agent group (no members)
 */
export const GroupSummarySchema = z
	.object({
		id: z.number().int(),
		name: z.string(),
		memberCount: z.number().int().min(0),
	})
	.passthrough();

export type GroupSummary = z.infer<typeof GroupSummarySchema>;

export const GroupSummaryListSchema = z.array(GroupSummarySchema);

/**
 * Member entry of a technician group
 */
export const TechnicianGroupMemberSchema = z
	.object({
		id: z.number().int(),
		name: z.string(),
	})
	.passthrough();

export type TechnicianGroupMember = z.infer<typeof TechnicianGroupMemberSchema>;

/**
 * Member entry of an agent group
 */
export const AgentGroupMemberSchema = TechnicianGroupMemberSchema.extend({
	guid: z.string().nullish(),
});

export type AgentGroupMember = z.infer<typeof AgentGroupMemberSchema>;

/**
 * Minimum a member entry carries, whatever the group kind
 */
export interface GroupMember {
	readonly id: number;
	readonly name: string;
}

/**
 * Detail view of a group: summary fields plus the member list
 */
export interface GroupDetail<TMember extends GroupMember> {
	readonly id: number;
	readonly name: string;
	readonly members: readonly TMember[];
}

export const TechnicianGroupSchema = z
	.object({
		id: z.number().int(),
		name: z.string(),
		members: z.array(TechnicianGroupMemberSchema).default([]),
	})
	.passthrough();

export type TechnicianGroup = z.infer<typeof TechnicianGroupSchema>;

export const AgentGroupSchema = z
	.object({
		id: z.number().int(),
		name: z.string(),
		members: z.array(AgentGroupMemberSchema).default([]),
	})
	.passthrough();

export type AgentGroup = z.infer<typeof AgentGroupSchema>;
