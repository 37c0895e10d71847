import type { EndpointRequest, FireEnvelope } from '@fire-kvm/shared';
import type { ClientConfig } from './config.js';
import { ApiAuthenticationError, ApiRequestError, FireApiError, getReadableErrorMessage } from './errors.js';
import { TransportError } from './transport/types.js';
import type { AsyncTransport, BlockingTransport, PreparedRequest, RawResponse } from './transport/types.js';

export const API_KEY_HEADER = 'X-FIRE-APIKEY';

export type ClientLogger = Pick<Console, 'error'>;

/** Base URL and path joined by exactly one slash. */
export function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

export function prepareRequest(config: ClientConfig, endpoint: EndpointRequest): PreparedRequest {
  const headers: Record<string, string> = { [API_KEY_HEADER]: config.apiKey };
  const request: PreparedRequest = {
    method: endpoint.method,
    url: joinUrl(config.baseUrl, endpoint.path),
    headers,
    timeoutMs: config.timeoutMs,
  };
  if (endpoint.body !== undefined) {
    headers['Content-Type'] = 'application/json';
    request.body = JSON.stringify(endpoint.body);
  }
  return request;
}

/**
 * Classify a response by status code only: 401, then 403, then any other
 * non-2xx; a 2xx body must be JSON. The envelope content is never inspected.
 */
export function interpretResponse<T>(response: RawResponse): FireEnvelope<T> {
  const { status, body } = response;
  if (status === 401 || status === 403) {
    throw new ApiAuthenticationError(status);
  }
  if (status < 200 || status > 299) {
    throw new ApiRequestError(`API request failed with status code ${status}: ${body}`, status, body);
  }
  try {
    const envelope: FireEnvelope<T> = JSON.parse(body);
    return envelope;
  } catch (err) {
    throw new FireApiError(`Invalid JSON in response: ${getReadableErrorMessage(err)}`, { cause: err });
  }
}

/** Map anything thrown by a transport onto the error taxonomy. */
export function toClientError(err: unknown, request: PreparedRequest): FireApiError {
  if (err instanceof FireApiError) return err;
  if (err instanceof TransportError && err.timedOut) {
    return new ApiRequestError(`API request timed out after ${request.timeoutMs} ms`, null, '', { cause: err });
  }
  return new FireApiError(`API request failed: ${getReadableErrorMessage(err)}`, { cause: err });
}

interface ExecutorOptions {
  config: ClientConfig;
  logger: ClientLogger;
  /** Log prefix, e.g. the owning client's class name. */
  source: string;
}

function logFailure(options: ExecutorOptions, request: PreparedRequest, err: FireApiError): void {
  options.logger.error(`[${options.source}] ${request.method} ${request.url} failed:`, err.message);
}

/** One blocking round trip per call. */
export class BlockingRequestExecutor {
  constructor(
    private readonly transport: BlockingTransport,
    private readonly options: ExecutorOptions
  ) {}

  execute<T>(endpoint: EndpointRequest): FireEnvelope<T> {
    const request = prepareRequest(this.options.config, endpoint);
    try {
      return interpretResponse<T>(this.transport.send(request));
    } catch (err) {
      const error = toClientError(err, request);
      logFailure(this.options, request, error);
      throw error;
    }
  }
}

/** One awaited round trip per call; other tasks keep running meanwhile. */
export class AsyncRequestExecutor {
  constructor(
    private readonly transport: AsyncTransport,
    private readonly options: ExecutorOptions
  ) {}

  async execute<T>(endpoint: EndpointRequest): Promise<FireEnvelope<T>> {
    const request = prepareRequest(this.options.config, endpoint);
    try {
      return interpretResponse<T>(await this.transport.send(request));
    } catch (err) {
      const error = toClientError(err, request);
      logFailure(this.options, request, error);
      throw error;
    }
  }
}
