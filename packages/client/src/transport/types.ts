import type { HttpMethod } from '@fire-kvm/shared';

/** Fully built request, identical for both execution modes. */
export interface PreparedRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
  timeoutMs: number;
}

export interface RawResponse {
  status: number;
  body: string;
}

/** Sends a request on the calling thread and returns once the body is read. */
export interface BlockingTransport {
  send(request: PreparedRequest): RawResponse;
}

export interface AsyncTransport {
  send(request: PreparedRequest): Promise<RawResponse>;
}

/** The request never produced a response (timeout, DNS, refused, bad URL). */
export class TransportError extends Error {
  readonly timedOut: boolean;

  constructor(message: string, timedOut: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
    this.timedOut = timedOut;
  }
}

export function isTimeoutError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'name' in err && err.name === 'TimeoutError';
}
