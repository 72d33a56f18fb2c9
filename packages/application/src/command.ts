/**
 * Command Types
 *
 * Commands are the input to mutating operations. They are plain, immutable
 * data objects that name their targets by reference (name, id, GUID or an
 * already-fetched record); resolution to ids happens inside the use case.
 *
 * Conventions:
 * - Commands are named in imperative form: AddAgentToGroup, DeleteTechnicianGroup
 * - Commands are immutable (readonly properties)
 * - Commands do not contain validation logic (validation is in use cases)
 *
 * @example
 * ```typescript
 * interface AssignAgentLeafCommand extends Command {
 *     readonly agent: AgentRef<Agent>;
 *     readonly path: string;
 * }
 * ```
 */

/**
 * Base marker interface for commands.
 */
export interface Command {
	/**
	 * Optional operation name used in log lines and partial-completion errors.
	 * If not provided, the use case's own name is used.
	 */
	readonly _type?: string;
}

/**
 * Operation name for a command, falling back to the use case default.
 */
export function commandName(command: Command, fallback: string): string {
	return command._type ?? fallback;
}
