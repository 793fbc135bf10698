export {
  ReferenceFetchClient,
  getFetchClient,
  validateUrl,
  type FetchClientConfig,
  type FetchResult,
  type FetchOptions,
  type URLValidation,
} from './fetch-client.js';
