export { computeBackoffDelay, sleep } from './backoff.js';
