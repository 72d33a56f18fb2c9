/**
 * Mutating operations
 *
 * Each operation resolves its targets to exactly one record, checks whether
 * the requested state already holds, and only then issues mutating calls
 * by id. Any failure stops the sequence.
 */

export * from './technician/index.js';
export * from './technician-group/index.js';
export * from './agent/index.js';
export * from './agent-group/index.js';
export * from './leaf/index.js';
export * from './triplet/index.js';
export type { MembershipChange, GroupDeletion } from './shared/group-membership.js';
