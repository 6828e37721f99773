// Errors
export * from './errors/index.js';

// Observability
export * from './observability/index.js';

// Input Validation
export * from './validation/index.js';

// Cache Store & Eviction
export * from './cache/index.js';

// Resilience
export * from './resilience/index.js';

// Utilities
export * from './utils/index.js';

// Query
export * from './query/index.js';

// Network
export * from './network/index.js';

// Mutations & Offline Queue
export * from './mutation/index.js';

// Client
export * from './client/index.js';
