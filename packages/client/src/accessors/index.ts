export { TechnicianAccessor } from './technician-accessor.js';
export { AgentAccessor } from './agent-accessor.js';
export { GroupAccessor, TECHNICIAN_GROUPS, AGENT_GROUPS, type GroupKind } from './group-accessor.js';
export { LeafAccessor } from './leaf-accessor.js';
export { TripletAccessor } from './triplet-accessor.js';
export { RightsGroupAccessor } from './rights-group-accessor.js';
export { ApiKeyAccessor } from './api-key-accessor.js';
export { parseResponse, fetchParsed, type Schema } from './response.js';
