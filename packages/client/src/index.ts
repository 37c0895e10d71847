/**
 * Client for the 24fire KVM REST API.
 *
 * @example
 * ```ts
 * import { AsyncFireApiClient, loadConfigFromEnv } from '@fire-kvm/client';
 *
 * const client = new AsyncFireApiClient(loadConfigFromEnv({ envFile: '.env' }));
 * const status = await client.vm.getStatus();
 * ```
 */

export * from './kvm/index.js';
export {
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  loadConfigFromEnv,
  resolveConfig,
} from './config.js';
export type { ClientConfig, ClientConfigInput, LoadConfigOptions } from './config.js';
export {
  ApiAuthenticationError,
  ApiRequestError,
  FireApiError,
  getReadableErrorMessage,
  isFireApiError,
} from './errors.js';
export type { AuthenticationFailure, FireApiErrorKind } from './errors.js';
export {
  API_KEY_HEADER,
  AsyncRequestExecutor,
  BlockingRequestExecutor,
  interpretResponse,
  joinUrl,
  prepareRequest,
} from './executor.js';
export type { ClientLogger } from './executor.js';
export { FetchTransport } from './transport/FetchTransport.js';
export type { FetchLike } from './transport/FetchTransport.js';
export { WorkerTransport } from './transport/WorkerTransport.js';
export type { WorkerTransportOptions } from './transport/WorkerTransport.js';
export { TransportError } from './transport/types.js';
export type { AsyncTransport, BlockingTransport, PreparedRequest, RawResponse } from './transport/types.js';
export * from '@fire-kvm/shared';
