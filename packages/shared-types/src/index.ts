// Service record schemas
export * from './api/technician.js';
export * from './api/agent.js';
export * from './api/group.js';
export * from './api/leaf.js';
export * from './api/triplet.js';
export * from './api/rights-group.js';
export * from './api/api-key.js';
