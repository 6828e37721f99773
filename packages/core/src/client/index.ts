export {
  QueryClient,
  type PrefetchConfig,
  type QueryClientConfig,
  type QueryClientEvent,
} from './query-client.js';
