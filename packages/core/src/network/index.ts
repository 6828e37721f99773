export { NetworkStatus } from './network-status.js';
