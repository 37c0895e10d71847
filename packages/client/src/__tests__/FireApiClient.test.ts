import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { endpoints } from '@fire-kvm/shared';
import { FireApiClient } from '../kvm/FireApiClient.js';
import { ApiAuthenticationError, ApiRequestError, FireApiError } from '../errors.js';
import { TransportError } from '../transport/types.js';
import { FakeBlockingTransport, ok, reply, silentLogger } from './fakeTransports.js';
import type { Responder } from './fakeTransports.js';
import { operationCases } from './operationTable.js';
import { startHangingServer } from './hangingServer.js';
import type { HangingServer } from './hangingServer.js';

const BASE = 'https://api.24fire.de/kvm';

function makeClient(respond: Responder) {
  const transport = new FakeBlockingTransport(respond);
  const logger = silentLogger();
  const client = new FireApiClient({ apiKey: 'test-key', transport, logger });
  return { client, transport, logger };
}

describe('FireApiClient', () => {
  describe('request construction', () => {
    it('covers every operation in the endpoint table', () => {
      expect(operationCases<'blocking'>().map((c) => c.name).sort()).toEqual(Object.keys(endpoints).sort());
    });

    it.each(operationCases<'blocking'>())('$name sends $method $path', ({ call, method, path, body }) => {
      const { client, transport } = makeClient(ok({ status: 'success' }));

      expect(call(client)).toEqual({ status: 'success' });
      expect(transport.requests).toHaveLength(1);
      const [request] = transport.requests;
      expect(request.method).toBe(method);
      expect(request.url).toBe(`${BASE}/${path}`);
      expect(request.headers['X-FIRE-APIKEY']).toBe('test-key');
      expect(request.body).toBe(body);
      expect(request.timeoutMs).toBe(5000);
    });

    it('routes grouped accessors to the same requests', () => {
      const { client, transport } = makeClient(ok({ status: 'success' }));

      client.vm.restartServer();
      client.backup.createBackup('weekly');
      client.monitoring.getMonitoringIncidences();

      expect(transport.requests.map((r) => `${r.method} ${r.url}`)).toEqual([
        `POST ${BASE}/status/restart`,
        `POST ${BASE}/backup/create`,
        `GET ${BASE}/monitoring/incidences`,
      ]);
      expect(transport.requests[1].body).toBe('{"description":"weekly"}');
    });
  });

  describe('scenarios', () => {
    it('returns the decoded config envelope', () => {
      const { client } = makeClient(reply(200, '{"status":"success","data":{"cores":4}}'));

      const config = client.getConfig();

      expect(config).toEqual({ status: 'success', data: { cores: 4 } });
    });

    it('fails getStatus with an authentication error on 401', () => {
      const { client } = makeClient(reply(401, ''));

      expect(() => client.getStatus()).toThrow(ApiAuthenticationError);
    });

    it('fails listBackups with a subscription hint on 403', () => {
      const { client } = makeClient(reply(403, '{"status":"error"}'));

      expect(() => client.listBackups()).toThrow(/subscription/);
      expect(() => client.listBackups()).toThrow(ApiAuthenticationError);
    });

    it('fails startServer with status and body on 500', () => {
      const { client, logger } = makeClient(reply(500, 'internal error'));

      let caught: unknown;
      try {
        client.startServer();
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(ApiRequestError);
      expect(caught).toMatchObject({ status: 500, body: 'internal error' });
      expect(logger.error).toHaveBeenCalledWith(
        `[FireApiClient] POST ${BASE}/status/start failed:`,
        'API request failed with status code 500: internal error'
      );
    });

    it('sends the create backup body verbatim', () => {
      const { client, transport } = makeClient(ok({ status: 'success', data: { backup_id: 'b-1' } }));

      const created = client.createBackup('nightly');

      expect(created.data.backup_id).toBe('b-1');
      expect(transport.requests[0]).toMatchObject({
        method: 'POST',
        url: `${BASE}/backup/create`,
        body: '{"description":"nightly"}',
      });
    });
  });

  describe('failures', () => {
    it('reports invalid JSON as a generic client error', () => {
      const { client } = makeClient(reply(200, 'not json'));

      let caught: unknown;
      try {
        client.getStatus();
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(FireApiError);
      expect(caught).toMatchObject({ kind: 'client', message: expect.stringMatching(/^Invalid JSON in response: /) });
    });

    it('reports a transport timeout as a request error', () => {
      const { client } = makeClient(() => {
        throw new TransportError('No response within 5000 ms', true);
      });

      expect(() => client.getConfig()).toThrow('API request timed out after 5000 ms');
      expect(() => client.getConfig()).toThrow(ApiRequestError);
    });

    it('reports a refused connection as a generic client error', () => {
      const { client } = makeClient(() => {
        throw new TransportError('TypeError: fetch failed', false);
      });

      expect(() => client.getConfig()).toThrow('API request failed: TypeError: fetch failed');
    });
  });

  describe('configuration', () => {
    it('applies base URL and timeout overrides', () => {
      const transport = new FakeBlockingTransport(ok({}));
      const client = new FireApiClient({
        apiKey: 'test-key',
        baseUrl: 'http://127.0.0.1:9000/kvm/',
        timeoutMs: 1500,
        transport,
        logger: silentLogger(),
      });

      client.getStatus();

      expect(client.config).toEqual({ apiKey: 'test-key', baseUrl: 'http://127.0.0.1:9000/kvm/', timeoutMs: 1500 });
      expect(transport.requests[0]).toMatchObject({ url: 'http://127.0.0.1:9000/kvm/status', timeoutMs: 1500 });
    });

    it('sends the trimmed API key', () => {
      const transport = new FakeBlockingTransport(ok({}));
      const client = new FireApiClient({ apiKey: '  test-key\n', transport, logger: silentLogger() });

      client.getStatus();

      expect(transport.requests[0].headers).toEqual({ 'X-FIRE-APIKEY': 'test-key' });
    });

    it('rejects an empty API key', () => {
      expect(() => new FireApiClient({ apiKey: '  ' })).toThrow('API key is required');
    });
  });

  describe('with the default worker transport', () => {
    let server: HangingServer;

    beforeAll(async () => {
      server = await startHangingServer();
    });

    afterAll(async () => {
      await server.close();
    });

    it('fails a call to an unresponsive server with a timeout request error', () => {
      const logger = silentLogger();
      const client = new FireApiClient({ apiKey: 'test-key', baseUrl: `${server.url}/kvm`, timeoutMs: 300, logger });

      let caught: unknown;
      try {
        client.getStatus();
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(ApiRequestError);
      expect(caught).toMatchObject({ status: null, body: '', message: 'API request timed out after 300 ms' });
      expect(logger.error).toHaveBeenCalledWith(
        `[FireApiClient] GET ${server.url}/kvm/status failed:`,
        'API request timed out after 300 ms'
      );
    });
  });
});
