export type { AssignAgentLeafCommand, AgentLeafAssignment } from './command.js';
export { createAssignAgentLeafUseCase, type AssignAgentLeafUseCaseDeps } from './use-case.js';
