// Types
export * from './types/deployment.js';

// Schemas
export * from './schemas/deployment.js';

// Deployment model
export * from './deployment/errors.js';
export * from './deployment/validator.js';
export * from './deployment/stats.js';
export * from './deployment/deployment.js';
export * from './deployment/view.js';
export * from './deployment/query.js';
