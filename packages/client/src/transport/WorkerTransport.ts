import { MessageChannel, Worker, receiveMessageOnPort } from 'worker_threads';
import type { ClientLogger } from '../executor.js';
import { TransportError } from './types.js';
import type { BlockingTransport, PreparedRequest, RawResponse } from './types.js';

/** Extra wait beyond the request timeout before the worker is killed. */
const WORKER_GRACE_MS = 1000;

export interface WorkerTransportOptions {
  /** Default: console. */
  logger?: ClientLogger;
  /** Ms to wait past `timeoutMs` for the worker's own abort. Default 1000. */
  graceMs?: number;
}

/*
 * Runs in the worker. Same fetch call as FetchTransport; posts the outcome
 * on the port, then flips the shared flag so the waiting thread wakes.
 */
const WORKER_SOURCE = `
const { workerData } = require('worker_threads');
const { request, flag, port } = workerData;
const state = new Int32Array(flag);
function reply(message) {
  port.postMessage(message);
  port.close();
  Atomics.store(state, 0, 1);
  Atomics.notify(state, 0);
}
fetch(request.url, {
  method: request.method,
  headers: request.headers,
  body: request.body,
  signal: AbortSignal.timeout(request.timeoutMs),
})
  .then(async (res) => reply({ ok: true, status: res.status, body: await res.text() }))
  .catch((err) => reply({
    ok: false,
    name: err && err.name ? String(err.name) : 'Error',
    message: err && err.message ? String(err.message) : String(err),
  }));
`;

type WorkerReply =
  | { ok: true; status: number; body: string }
  | { ok: false; name: string; message: string };

function isWorkerReply(value: unknown): value is WorkerReply {
  if (typeof value !== 'object' || value === null || !('ok' in value)) return false;
  if (value.ok === true) {
    return 'status' in value && typeof value.status === 'number' && 'body' in value && typeof value.body === 'string';
  }
  return 'name' in value && typeof value.name === 'string' && 'message' in value && typeof value.message === 'string';
}

/**
 * Blocking transport: one worker thread per request while the calling
 * thread sleeps on Atomics.wait.
 */
export class WorkerTransport implements BlockingTransport {
  private readonly logger: ClientLogger;
  private readonly graceMs: number;

  constructor(options: WorkerTransportOptions = {}) {
    const { logger = console, graceMs = WORKER_GRACE_MS } = options;
    if (!Number.isFinite(graceMs) || graceMs < 0) {
      throw new TypeError(`Invalid grace period: ${graceMs}`);
    }
    this.logger = logger;
    this.graceMs = graceMs;
  }

  send(request: PreparedRequest): RawResponse {
    const flag = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT);
    const state = new Int32Array(flag);
    const { port1, port2 } = new MessageChannel();
    const worker = new Worker(WORKER_SOURCE, {
      eval: true,
      workerData: { request, flag, port: port2 },
      transferList: [port2],
    });
    worker.unref();

    try {
      const waited = Atomics.wait(state, 0, 0, request.timeoutMs + this.graceMs);
      const received = receiveMessageOnPort(port1);
      if (waited === 'timed-out' && !received) {
        this.logger.error(`[WorkerTransport] ${request.method} ${request.url}: no reply from worker, terminating`);
        throw new TransportError(`No response within ${request.timeoutMs} ms`, true);
      }
      const reply: unknown = received?.message;
      if (!isWorkerReply(reply)) {
        throw new TransportError('Request worker exited without a reply', false);
      }
      if (!reply.ok) {
        throw new TransportError(`${reply.name}: ${reply.message}`, reply.name === 'TimeoutError');
      }
      return { status: reply.status, body: reply.body };
    } finally {
      port1.close();
      worker.terminate().catch((err: unknown) => {
        this.logger.error('[WorkerTransport] worker terminate failed:', err);
      });
    }
  }
}
