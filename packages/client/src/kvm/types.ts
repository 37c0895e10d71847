import type { ClientConfigInput } from '../config.js';
import type { ClientLogger } from '../executor.js';

/** Constructor options shared by both clients; `T` is the transport kind. */
export interface FireClientOptions<T> extends ClientConfigInput {
  /** Replaces the default transport (tests, proxies). */
  transport?: T;
  /** Failure log sink. Default: console. */
  logger?: ClientLogger;
}
