/**
 * Mock Server Integration Tests
 * @module tests/integration/mock-server
 *
 * Drives a real server bound to the loopback interface with fetch.
 */

import { request as httpRequest } from 'node:http';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  AlreadyStoppedError,
  BindError,
  ExpectationViolation,
  InvalidStateError,
  VerificationError,
} from '../../src/errors/index.js';
import { anyRequest, bodyPartialJson, header, method, path } from '../../src/matchers/index.js';
import { Mock, ResponseTemplate } from '../../src/mocks/index.js';
import type { StructuredLogger } from '../../src/logging/index.js';
import { MockServer } from '../../src/server/index.js';
import { createSpyLogger } from '../helpers/index.js';

async function stopQuietly(server: MockServer): Promise<void> {
  if (server.state === 'created' || server.state === 'running') {
    server.reset();
    await server.stop();
  }
}

/**
 * Send a request with an explicit body through node:http; fetch refuses a
 * body on GET and HEAD.
 */
function sendWithBody(uri: string, method: string, target: string, body: string): Promise<number> {
  return new Promise((resolve, reject) => {
    const outgoing = httpRequest(
      `${uri}${target}`,
      { method, headers: { 'content-length': Buffer.byteLength(body) } },
      (response) => {
        response.resume();
        response.on('end', () => resolve(response.statusCode ?? 0));
        response.on('error', reject);
      }
    );
    outgoing.on('error', reject);
    outgoing.end(body);
  });
}

describe('MockServer', () => {
  let server: MockServer;
  let logger: StructuredLogger;

  beforeEach(async () => {
    logger = createSpyLogger();
    server = await MockServer.start({ env: {}, shutdownTimeoutMs: 1000, logger });
  });

  afterEach(async () => {
    await stopQuietly(server);
  });

  describe('binding', () => {
    it('reports the OS-assigned port', () => {
      const address = server.address();
      expect(address.port).not.toBe(0);
      expect(address.host).toBe('127.0.0.1');
      expect(address.family).toBe('IPv4');
      expect(server.uri()).toBe(`http://127.0.0.1:${address.port}`);
      expect(server.state).toBe('running');
    });

    it('raises BindError when the port is taken', async () => {
      const other = new MockServer({ env: {}, logger: createSpyLogger() });

      await expect(other.start({ port: server.address().port })).rejects.toBeInstanceOf(BindError);
      expect(other.state).toBe('created');
    });

    it('refuses to start twice', async () => {
      await expect(server.start()).rejects.toBeInstanceOf(InvalidStateError);
    });

    it('has no address before start', () => {
      const idle = new MockServer({ env: {} });
      expect(() => idle.address()).toThrow(InvalidStateError);
    });

    it('keeps the address after stop', async () => {
      const { port } = server.address();
      await server.stop();
      expect(server.address().port).toBe(port);
    });
  });

  describe('dispatch', () => {
    it('answers unmatched requests with an empty 404', async () => {
      const response = await fetch(`${server.uri()}/nothing-here`);

      expect(response.status).toBe(404);
      expect(await response.text()).toBe('');
    });

    it('lets the most recently mounted rule win', async () => {
      server.mount(Mock.given(anyRequest()).respondWith(ResponseTemplate.ok().bodyString('fallback')));
      server.mount(Mock.given(path('/health')).respondWith(ResponseTemplate.ok().bodyString('healthy')));

      const health = await fetch(`${server.uri()}/health`);
      const other = await fetch(`${server.uri()}/other`);

      expect(await health.text()).toBe('healthy');
      expect(await other.text()).toBe('fallback');
    });

    it('matches on method, headers and JSON body together', async () => {
      server.mount(
        Mock.given(method('POST'), path('/orders'))
          .and(header('x-api-key', 'test-key'))
          .and(bodyPartialJson({ sku: 'test-sku' }))
          .respondWith(ResponseTemplate.withStatus(201).header('location', '/orders/1').bodyJson({ id: 1 }))
          .expect(1)
      );

      const created = await fetch(`${server.uri()}/orders`, {
        method: 'POST',
        headers: { 'content-type': 'application/json', 'x-api-key': 'test-key' },
        body: JSON.stringify({ sku: 'test-sku', qty: 1 }),
      });
      const rejected = await fetch(`${server.uri()}/orders`, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({ sku: 'test-sku' }),
      });

      expect(created.status).toBe(201);
      expect(created.headers.get('location')).toBe('/orders/1');
      expect(await created.json()).toEqual({ id: 1 });
      expect(rejected.status).toBe(404);
      await expect(server.stop().then((report) => report.satisfied)).resolves.toBe(true);
    });

    it('falls through once a rule reaches its match limit', async () => {
      server.mount(Mock.given(path('/once')).respondWith(ResponseTemplate.withStatus(503)));
      server.mount(Mock.given(path('/once')).respondWith(ResponseTemplate.ok()).upToNTimes(1));

      const first = await fetch(`${server.uri()}/once`);
      const second = await fetch(`${server.uri()}/once`);

      expect([first.status, second.status]).toEqual([200, 503]);
    });

    it('survives a body a JSON matcher cannot parse', async () => {
      server.mount(Mock.given(bodyPartialJson({ a: 1 })).respondWith(ResponseTemplate.withStatus(202)));

      const response = await fetch(`${server.uri()}/`, {
        method: 'POST',
        headers: { 'content-type': 'text/plain' },
        body: 'not json',
      });

      expect(response.status).toBe(404);
      expect(logger.matcherFailed).toHaveBeenCalledTimes(1);
    });

    it('records a body sent with GET', async () => {
      server.mount(Mock.given(method('GET'), path('/search')).respondWith(ResponseTemplate.withStatus(204)).expect(1));

      const status = await sendWithBody(server.uri(), 'GET', '/search', 'payload');

      expect(status).toBe(204);
      expect(server.requests().map((request) => request.body.toString('utf8'))).toEqual(['payload']);
    });

    it('records a POST body sent without a content type', async () => {
      const status = await sendWithBody(server.uri(), 'POST', '/plain', 'no-ctype');

      expect(status).toBe(404);
      expect(server.requests()[0]?.body.toString('utf8')).toBe('no-ctype');
    });

    it('answers 413 for a GET body over the limit', async () => {
      const small = await MockServer.start({ env: {}, bodyLimit: 4, shutdownTimeoutMs: 1000, logger: createSpyLogger() });
      try {
        const status = await sendWithBody(small.uri(), 'GET', '/', 'too long');

        expect(status).toBe(413);
        expect(small.requests()).toEqual([]);
      } finally {
        await stopQuietly(small);
      }
    });
  });

  describe('request log', () => {
    it('records method, path, headers and body exactly', async () => {
      const payload = Buffer.from([0x00, 0x7f, 0x80, 0xff]);
      await fetch(`${server.uri()}/upload/a%20b?x=1&x=2`, {
        method: 'PUT',
        headers: { 'content-type': 'application/octet-stream', 'x-trace': 'abc' },
        body: payload,
      });

      const [request] = server.requests();
      expect(request?.sequence).toBe(1);
      expect(request?.method).toBe('PUT');
      expect(request?.path).toBe('/upload/a%20b');
      expect(request?.query.x).toEqual(['1', '2']);
      expect(request?.headers.get('x-trace')).toBe('abc');
      expect(request?.headers.get('content-type')).toBe('application/octet-stream');
      expect(request?.body.equals(payload)).toBe(true);
    });

    it('never lets a caller change a logged body', async () => {
      await fetch(`${server.uri()}/echo`, { method: 'POST', body: 'hello' });

      server.requests()[0]?.body.write('HACKED');

      expect(server.requests()[0]?.body.toString('utf8')).toBe('hello');
    });

    it('keeps arrival order and returns copies', async () => {
      await fetch(`${server.uri()}/first`);
      await fetch(`${server.uri()}/second`);

      const snapshot = server.requests();
      await fetch(`${server.uri()}/third`);

      expect(snapshot.map((request) => request.path)).toEqual(['/first', '/second']);
      expect(server.requests().map((request) => request.sequence)).toEqual([1, 2, 3]);
    });

    it('records nothing when recording is disabled', async () => {
      const quiet = await MockServer.start({ env: {}, recordRequests: false, shutdownTimeoutMs: 1000, logger: createSpyLogger() });
      try {
        const rule = quiet.mount(Mock.given(anyRequest()));
        for (let i = 0; i < 3; i += 1) {
          await fetch(`${quiet.uri()}/ping`);
        }
        expect(quiet.requests()).toEqual([]);
        expect(rule.callCount).toBe(3);
      } finally {
        await stopQuietly(quiet);
      }
    });

    it('reads the recording toggle from the environment', async () => {
      const quiet = new MockServer({ env: { MOCK_SERVER_RECORD_REQUESTS: 'false' } });
      expect(quiet.config.recordRequests).toBe(false);
      await quiet.stop();
    });
  });

  describe('stop', () => {
    it('fails verification for a rule that was never called', async () => {
      server.mount(Mock.given(anyRequest()).expect(1));

      const error: unknown = await server.stop().catch((reason: unknown) => reason);

      expect(error).toBeInstanceOf(VerificationError);
      if (error instanceof VerificationError) {
        expect(error.violations).toHaveLength(1);
        expect(error.violations[0]?.observed).toBe(0);
        expect(error.violations[0]?.expected).toEqual({ min: 1, max: 1 });
      }
      expect(server.state).toBe('stopped');
    });

    it('reports every failing rule, scoped ones included', async () => {
      server.mount(Mock.given(path('/a')).expect(1));
      server.mountScoped(Mock.given(path('/b')).expect(1));
      server.mount(Mock.given(path('/c')).expect({ max: 5 }));

      const error: unknown = await server.stop().catch((reason: unknown) => reason);

      expect(error).toBeInstanceOf(VerificationError);
      if (error instanceof VerificationError) {
        expect(error.violations.map((violation) => violation.description)).toEqual(['path == /a', 'path == /b']);
      }
    });

    it('resolves with the report when every rule is satisfied', async () => {
      server.mount(Mock.given(path('/ok')).expect(1).named('ok'));
      await fetch(`${server.uri()}/ok`);

      const report = await server.stop();
      expect(report.satisfied).toBe(true);
      expect(report.verified.map((verification) => verification.ruleName)).toEqual(['ok']);
    });

    it('raises AlreadyStoppedError the second time', async () => {
      await server.stop();
      await expect(server.stop()).rejects.toBeInstanceOf(AlreadyStoppedError);
    });

    it('refuses new rules once stopped but still allows unmount', async () => {
      const rule = server.mount(Mock.given());
      await server.stop();

      expect(() => server.mount(Mock.given())).toThrow(InvalidStateError);
      expect(() => server.mountScoped(Mock.given())).toThrow(InvalidStateError);
      expect(server.unmount(rule.id)).toBe(true);
    });

    it('waits for a start still binding and closes its listener', async () => {
      const racing = new MockServer({ env: {}, shutdownTimeoutMs: 1000, logger: createSpyLogger() });

      const starting = racing.start();
      const report = await racing.stop();
      const address = await starting;

      expect(racing.state).toBe('stopped');
      expect(report.satisfied).toBe(true);
      await expect(fetch(`http://${address.host}:${address.port}/`)).rejects.toThrow();
      await expect(racing.stop()).rejects.toBeInstanceOf(AlreadyStoppedError);
    });

    it('refuses to mount while a racing start and stop settle', async () => {
      const racing = new MockServer({ env: {}, shutdownTimeoutMs: 1000, logger: createSpyLogger() });

      const starting = racing.start();
      const stopping = racing.stop();

      expect(racing.state).toBe('stopping');
      expect(() => racing.mount(Mock.given())).toThrow(InvalidStateError);
      await starting;
      await stopping;
    });

    it('verifies a server that never started', async () => {
      const idle = new MockServer({ env: {} });
      idle.mount(Mock.given().expect(1));

      await expect(idle.stop()).rejects.toBeInstanceOf(VerificationError);
      expect(idle.state).toBe('stopped');
    });

    it('lets an in-flight delayed response finish', async () => {
      server.mount(Mock.given(path('/slow')).respondWith(ResponseTemplate.ok().bodyString('done').delay(100)).expect(1));

      const pending = fetch(`${server.uri()}/slow`).then((response) => response.text());
      await new Promise((resolve) => setTimeout(resolve, 30));
      const stopped = server.stop();

      expect(await pending).toBe('done');
      await expect(stopped.then((report) => report.satisfied)).resolves.toBe(true);
    });
  });

  describe('scoped rules', () => {
    it('releases successfully within range and stops answering', async () => {
      const guard = server.mountScoped(Mock.given(path('/token')).expect({ min: 1, max: 3 }));
      await fetch(`${server.uri()}/token`);
      await fetch(`${server.uri()}/token`);

      expect(guard.release()).toMatchObject({ observed: 2, expected: { min: 1, max: 3 } });
      expect(guard.receivedRequests()).toHaveLength(2);

      const after = await fetch(`${server.uri()}/token`);
      expect(after.status).toBe(404);
      expect(guard.callCount).toBe(2);
    });

    it('release throws the violation and replays it', () => {
      const guard = server.mountScoped(Mock.given(path('/token')).expect(1));

      expect(() => guard.release()).toThrow(ExpectationViolation);
      expect(() => guard.release()).toThrow(ExpectationViolation);
      expect(guard.callCount).toBe(0);
    });

    it('withScopedMock releases after the callback', async () => {
      const status = await server.withScopedMock(
        Mock.given(path('/inner')).respondWith(ResponseTemplate.withStatus(204)).expect(1),
        async () => (await fetch(`${server.uri()}/inner`)).status
      );

      expect(status).toBe(204);
      expect(server.rules()).toHaveLength(0);
    });

    it('withScopedMock surfaces a violation', async () => {
      await expect(server.withScopedMock(Mock.given(path('/inner')).expect(1), () => 'unused')).rejects.toBeInstanceOf(
        ExpectationViolation
      );
      expect(server.rules()).toHaveLength(0);
    });

    it('withScopedMock lets the callback error win', async () => {
      const failure = new Error('callback failed');

      await expect(
        server.withScopedMock(Mock.given(path('/inner')).expect(1), () => {
          throw failure;
        })
      ).rejects.toBe(failure);
      expect(server.rules()).toHaveLength(0);
    });
  });

  describe('verify and reset', () => {
    it('verify reports without stopping', async () => {
      server.mount(Mock.given(path('/a')).expect(1));

      expect(server.verify().satisfied).toBe(false);
      await fetch(`${server.uri()}/a`);
      expect(server.verify().satisfied).toBe(true);
      expect(server.state).toBe('running');
    });

    it('reset unmounts every rule and clears the log', async () => {
      server.mount(Mock.given().expect(5));
      await fetch(`${server.uri()}/a`);

      server.reset();

      expect(server.rules()).toEqual([]);
      expect(server.requests()).toEqual([]);
      await fetch(`${server.uri()}/b`);
      expect(server.requests().map((request) => request.sequence)).toEqual([2]);
    });
  });

  describe('concurrency', () => {
    it('counts every concurrent request exactly once', async () => {
      const total = 40;
      const rule = server.mount(Mock.given(path('/burst')).respondWith(ResponseTemplate.ok().delay(5)).expect(total));

      const statuses = await Promise.all(
        Array.from({ length: total }, () => fetch(`${server.uri()}/burst`).then((response) => response.status))
      );

      expect(statuses.every((status) => status === 200)).toBe(true);
      expect(rule.callCount).toBe(total);
      const sequences = server.requests().map((request) => request.sequence);
      expect(new Set(sequences).size).toBe(total);
      expect(sequences).toEqual([...sequences].sort((a, b) => a - b));
      await expect(server.stop().then((report) => report.satisfied)).resolves.toBe(true);
    });
  });
});
