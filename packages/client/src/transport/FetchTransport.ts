import { getReadableErrorMessage } from '../errors.js';
import { TransportError, isTimeoutError } from './types.js';
import type { AsyncTransport, PreparedRequest, RawResponse } from './types.js';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

/** Non-blocking transport on Node's global fetch. */
export class FetchTransport implements AsyncTransport {
  private readonly fetchImpl: FetchLike;

  constructor(fetchImpl: FetchLike = fetch) {
    this.fetchImpl = fetchImpl;
  }

  async send(request: PreparedRequest): Promise<RawResponse> {
    try {
      const res = await this.fetchImpl(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: AbortSignal.timeout(request.timeoutMs),
      });
      // Reading the body to the end releases the connection.
      const body = await res.text();
      return { status: res.status, body };
    } catch (err) {
      throw new TransportError(getReadableErrorMessage(err), isTimeoutError(err), { cause: err });
    }
  }
}
