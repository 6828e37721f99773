export {
  assertQueryKey,
  describeNonJson,
  validateQueryKey,
  type InputValidationResult,
} from './key-validation.js';

export {
  circuitBreakerConfigSchema,
  formatIssues,
  infiniteQueryOptionsSchema,
  mutationOptionsSchema,
  offlineQueueConfigSchema,
  queryClientConfigSchema,
  queryOptionsSchema,
  serializedQueueEntrySchema,
  serializedQueueSchema,
  validateConfig,
  type SerializedQueue,
  type SerializedQueueEntry,
} from './schemas.js';
