import { PassThrough } from 'node:stream';

import { afterEach, describe, expect, it, vi } from 'vitest';
import * as fc from 'fast-check';
import { z } from 'zod';

import { DebugLogger } from '../src/debug/DebugLogger.js';
import {
  ClientClosedError,
  ConfigError,
  DecodeError,
  ProtocolViolationError,
  RequestCancelledError,
  RequestTimeoutError,
  ResponseError,
  TransportError,
} from '../src/errors.js';
import {
  createLspClient,
  unwrapResult,
  type LspClient,
  type LspClientOptions,
} from '../src/service/lsp-client.js';
import {
  createFakeLspServer,
  type FakeLspServer,
} from './fixtures/fake-lsp-server.js';

type SetupOptions = Omit<LspClientOptions, 'toServer' | 'fromServer'>;

const clients: LspClient[] = [];

function setup(options: SetupOptions = {}): {
  server: FakeLspServer;
  client: LspClient;
  errors: Error[];
} {
  const server = createFakeLspServer();
  const errors: Error[] = [];
  const client = createLspClient({
    toServer: server.toServer,
    fromServer: server.fromServer,
    name: 'fake',
    logger: new DebugLogger('lsp-pipe:test-client', { enabled: false }),
    onError: (error) => {
      errors.push(error);
    },
    ...options,
  });
  clients.push(client);
  return { server, client, errors };
}

const captured = (promise: Promise<unknown>): Promise<unknown> =>
  promise.catch((error: unknown) => error);

afterEach(async () => {
  await Promise.all(clients.splice(0).map((client) => client.shutdown()));
});

describe('LspClient requests', () => {
  it('writes one framed request and resolves a null result', async () => {
    const { server, client } = setup();
    const written: Buffer[] = [];
    server.toServer.on('data', (chunk: Buffer) => {
      written.push(chunk);
    });

    const pending = client.request('initialize', { capabilities: {} }, z.null());
    const message = await server.nextMessage();

    expect(Buffer.concat(written).toString('utf8')).toBe(
      'Content-Length: 75\r\n\r\n{"jsonrpc":"2.0","id":1,"method":"initialize","params":{"capabilities":{}}}',
    );
    expect(message).toEqual({
      jsonrpc: '2.0',
      id: 1,
      method: 'initialize',
      params: { capabilities: {} },
    });

    server.sendRaw('Content-Length: 23\r\n\r\n{"id":1,"result":null}\n');
    await expect(pending).resolves.toEqual({ ok: true, value: null });
    expect(client.inFlightCount).toBe(0);
  });

  it('returns an error response without decoding the result', async () => {
    const { server, client } = setup();
    const schema = z.string();
    const safeParse = vi.spyOn(schema, 'safeParse');

    const pending = client.request(
      'textDocument/hover',
      { position: { line: 0, character: 0 } },
      schema,
    );
    const { id } = await server.nextMessage();
    server.respondError(id, -32601, 'method not found');

    await expect(pending).resolves.toEqual({
      ok: false,
      error: { code: -32601, message: 'method not found' },
    });
    expect(safeParse).not.toHaveBeenCalled();
  });

  it('throws a ResponseError when an error result is unwrapped', async () => {
    const { server, client } = setup();

    const pending = client.request('workspace/symbol', { query: 'x' }, z.unknown());
    const { id } = await server.nextMessage();
    server.respondError(id, -32800, 'request cancelled');

    const error = captured(pending.then(unwrapResult));
    await expect(error).resolves.toBeInstanceOf(ResponseError);
    await expect(error).resolves.toMatchObject({
      code: -32800,
      message: 'request cancelled',
    });
  });

  it('rejects with a DecodeError when the result does not match the schema', async () => {
    const { server, client } = setup();

    const pending = captured(
      client.request('workspace/symbol', { query: 'x' }, z.string()),
    );
    const { id } = await server.nextMessage();
    server.respond(id, 42);

    const error = await pending;
    expect(error).toBeInstanceOf(DecodeError);
    expect(error).toMatchObject({
      method: 'workspace/symbol',
      id: 1,
      message:
        "Result of 'workspace/symbol' (id 1) did not decode: <root>: Expected string, received number",
    });
  });

  it('matches concurrent responses by id whatever order they arrive in', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc
          .integer({ min: 1, max: 6 })
          .chain((count) =>
            fc.shuffledSubarray(
              Array.from({ length: count }, (_, index) => index),
              { minLength: count, maxLength: count },
            ),
          ),
        async (order) => {
          const { server, client } = setup();

          const pending = order.map((_, index) =>
            client.request('test/echo', { index }, z.number()),
          );
          const sent = await Promise.all(order.map(() => server.nextMessage()));
          expect(sent.map((message) => message.id)).toEqual(
            order.map((_, index) => index + 1),
          );

          for (const index of order) {
            server.notify('$/progress', { index });
            server.respond(sent[index].id, index * 10);
          }

          await expect(Promise.all(pending)).resolves.toEqual(
            order.map((_, index) => ({ ok: true, value: index * 10 })),
          );
          await client.shutdown();
        },
      ),
      { numRuns: 25 },
    );
  });

  it('delivers a notification before the response that follows it', async () => {
    const events: string[] = [];
    const { server, client } = setup({
      onNotification: (notification) => {
        events.push(`notification:${notification.method}`);
      },
    });

    const pending = client
      .request('initialize', {}, z.unknown())
      .then((result) => {
        events.push('response');
        return result;
      });
    const { id } = await server.nextMessage();
    server.notify('window/logMessage', { type: 3, message: 'starting' });
    server.respond(id, { capabilities: {} });

    await pending;
    expect(events).toEqual(['notification:window/logMessage', 'response']);
  });

  it('starts reading only when the first message is sent', async () => {
    const { server, client } = setup();

    expect(client.state).toBe('idle');
    expect(server.fromServer.listenerCount('data')).toBe(0);

    await client.notify('initialized', {});

    expect(client.state).toBe('running');
    expect(server.fromServer.listenerCount('data')).toBe(1);
    expect(await server.nextMessage()).toEqual({
      jsonrpc: '2.0',
      method: 'initialized',
      params: {},
    });
  });
});

describe('LspClient protocol violations', () => {
  it('reports a response with an unknown id and keeps running', async () => {
    const { server, client, errors } = setup();

    const pending = client.request('test/value', undefined, z.number());
    const { id } = await server.nextMessage();
    server.respond(999, 1);
    server.respond(id, 5);

    await expect(pending).resolves.toEqual({ ok: true, value: 5 });
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(ProtocolViolationError);
    expect(errors[0]).toMatchObject({
      code: 'unmatched-response',
      message: 'Response id 999 from fake does not match any in-flight request',
    });
    expect(client.state).toBe('running');
  });

  it('skips unparseable and empty frames', async () => {
    const { server, client, errors } = setup();

    const pending = client.request('test/value', undefined, z.string());
    const { id } = await server.nextMessage();
    server.sendRaw('Content-Length: 5\r\n\r\n{oops');
    server.sendRaw('Content-Length: 0\r\n\r\n');
    server.respond(id, 'ok');

    await expect(pending).resolves.toEqual({ ok: true, value: 'ok' });
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({ code: 'invalid-json' });
    expect(errors[0].message).toMatch(
      /^Discarded unparseable message from fake: /,
    );
  });

  it('reports a well-formed JSON value that is not a message', async () => {
    const { server, client, errors } = setup();

    const pending = client.request('test/value', undefined, z.string());
    const { id } = await server.nextMessage();
    server.send([1, 2, 3]);
    server.respond(id, 'ok');

    await expect(pending).resolves.toEqual({ ok: true, value: 'ok' });
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({
      code: 'invalid-message',
      message:
        'Discarded unrecognized message from fake: message is not a JSON object',
    });
  });
});

describe('LspClient malformed responses', () => {
  it('rejects the caller whose id a malformed error response carries', async () => {
    const { server, client, errors } = setup();

    const pending = captured(client.request('test/value', undefined, z.unknown()));
    const { id } = await server.nextMessage();
    server.send({ jsonrpc: '2.0', id, error: { code: -32601 } });

    const error = await pending;
    expect(error).toBeInstanceOf(ProtocolViolationError);
    expect(error).toMatchObject({
      code: 'invalid-message',
      message: 'Discarded unrecognized message from fake: error.message: Required',
    });
    expect(errors).toEqual([error]);
    expect(client.inFlightCount).toBe(0);
    expect(client.state).toBe('running');
  });

  it('leaves other callers waiting', async () => {
    const { server, client, errors } = setup();

    const first = captured(client.request('a', undefined, z.unknown()));
    const second = client.request('b', undefined, z.string());
    await server.nextMessage();
    await server.nextMessage();
    server.send({ jsonrpc: '2.0', id: 1, result: 'x', error: 'broken' });
    server.respond(2, 'ok');

    expect(await first).toBeInstanceOf(ProtocolViolationError);
    await expect(second).resolves.toEqual({ ok: true, value: 'ok' });
    expect(errors).toHaveLength(1);
  });
});

describe('LspClient transport failures', () => {
  it('wakes every waiting caller when the stream ends inside a body', async () => {
    const { server, client, errors } = setup();

    const first = captured(client.request('a', undefined, z.unknown()));
    const second = captured(client.request('b', undefined, z.unknown()));
    await server.nextMessage();
    await server.nextMessage();

    server.sendRaw('Content-Length: 40\r\n\r\n{"id":1');
    server.end();

    const error = await first;
    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      code: 'truncated-body',
      message: 'Stream ended inside a frame body: expected 40 bytes, received 7',
    });
    await expect(second).resolves.toBe(error);
    expect(client.state).toBe('failed');
    expect(client.failure).toBe(error);
    expect(errors).toEqual([error]);

    await expect(client.request('c', undefined, z.unknown())).rejects.toBe(error);
  });

  it('fails on a header other than Content-Length', async () => {
    const { server, client, errors } = setup();

    const pending = captured(client.request('a', undefined, z.unknown()));
    await server.nextMessage();
    server.sendRaw('Content-Type: text/plain\r\n\r\n');

    const error = await pending;
    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ code: 'unsupported-header' });
    expect(errors).toEqual([error]);
    expect(server.fromServer.listenerCount('data')).toBe(0);
  });

  it('enforces the configured body limit', async () => {
    const { server, client } = setup({ config: { maxBodyBytes: 8 } });

    const pending = captured(client.request('a', undefined, z.unknown()));
    const { id } = await server.nextMessage();
    server.respond(id, 'a result that is far too long');

    await expect(pending).resolves.toMatchObject({
      name: 'TransportError',
      code: 'malformed-header',
    });
  });

  it('fails with a clean close when the server exits between frames', async () => {
    const { server, client } = setup();

    await client.notify('initialized', {});
    server.end();

    await vi.waitFor(() => {
      expect(client.state).toBe('failed');
    });
    expect(client.failure).toMatchObject({
      code: 'unexpected-end-of-input',
      message: 'Stream closed',
    });
  });

  it('fails when the server stdin can no longer be written', async () => {
    const { server, client } = setup();
    server.toServer.destroy();

    const error = await captured(client.request('a', undefined, z.unknown()));

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      code: 'write-failed',
      message: 'Failed writing to server: stream is no longer writable',
    });
    expect(client.state).toBe('failed');
    await expect(client.notify('exit')).rejects.toBe(error);
  });

  it('reports a write failure from notify', async () => {
    const { server, client } = setup();
    server.toServer.destroy();

    const error = await captured(client.notify('initialized', {}));

    expect(error).toMatchObject({ name: 'TransportError', code: 'write-failed' });
    expect(client.failure).toBe(error);
  });
});

describe('LspClient cancellation', () => {
  it('times out, sends $/cancelRequest and drops the late response', async () => {
    const { server, client, errors } = setup({ config: { requestTimeoutMs: 20 } });

    const pending = captured(client.request('slow', undefined, z.unknown()));
    const request = await server.nextMessage();

    const error = await pending;
    expect(error).toBeInstanceOf(RequestTimeoutError);
    expect(error).toMatchObject({
      id: 1,
      message: "Request 'slow' (id 1) timed out after 20ms",
    });
    expect(await server.nextMessage()).toEqual({
      jsonrpc: '2.0',
      method: '$/cancelRequest',
      params: { id: 1 },
    });

    server.respond(request.id, 'late');
    const next = client.request('fast', undefined, z.string(), { timeoutMs: 0 });
    const nextRequest = await server.nextMessage();
    expect(nextRequest.id).toBe(2);
    server.respond(nextRequest.id, 'ok');

    await expect(next).resolves.toEqual({ ok: true, value: 'ok' });
    expect(errors).toEqual([]);
  });

  it('honours a per-request timeout', async () => {
    const { server, client } = setup();

    const pending = captured(
      client.request('slow', undefined, z.unknown(), { timeoutMs: 10 }),
    );
    await server.nextMessage();

    await expect(pending).resolves.toMatchObject({
      name: 'RequestTimeoutError',
      timeoutMs: 10,
    });
  });

  it('cancels a request when its signal aborts', async () => {
    const { server, client } = setup();
    const controller = new AbortController();

    const pending = captured(
      client.request('textDocument/completion', {}, z.unknown(), {
        signal: controller.signal,
      }),
    );
    await server.nextMessage();
    controller.abort();

    const error = await pending;
    expect(error).toBeInstanceOf(RequestCancelledError);
    expect(error).toMatchObject({
      id: 1,
      message: "Request 'textDocument/completion' (id 1) was cancelled",
    });
    expect(await server.nextMessage()).toEqual({
      jsonrpc: '2.0',
      method: '$/cancelRequest',
      params: { id: 1 },
    });
    expect(client.inFlightCount).toBe(0);
  });

  it.each([
    [-1, 'Number must be greater than or equal to 0'],
    [Number.NaN, 'Expected number, received nan'],
    [1.5, 'Expected integer, received float'],
    [3_000_000_000, 'Number must be less than or equal to 2147483647'],
  ])('rejects timeoutMs %s before sending anything', async (timeoutMs, reason) => {
    const { server, client } = setup();

    const error = await captured(
      client.request('a', undefined, z.unknown(), { timeoutMs }),
    );

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({
      message: `Invalid timeoutMs for 'a': ${reason}`,
      paths: ['timeoutMs'],
    });
    expect(client.state).toBe('idle');

    const pending = client.request('b', undefined, z.null());
    const { id } = await server.nextMessage();
    expect(id).toBe(1);
    server.respond(id, null);
    await expect(pending).resolves.toEqual({ ok: true, value: null });
  });

  it('rejects an already aborted signal without sending anything', async () => {
    const { server, client } = setup();
    const controller = new AbortController();
    controller.abort();

    await expect(
      client.request('a', undefined, z.unknown(), { signal: controller.signal }),
    ).rejects.toMatchObject({
      name: 'RequestCancelledError',
      id: null,
      message: "Request 'a' was cancelled before it was sent",
    });
    expect(client.state).toBe('idle');

    const pending = client.request('b', undefined, z.null());
    const { id } = await server.nextMessage();
    expect(id).toBe(1);
    server.respond(id, null);
    await expect(pending).resolves.toEqual({ ok: true, value: null });
  });
});

describe('LspClient shutdown', () => {
  it('rejects in-flight requests with ClientClosedError', async () => {
    const { server, client, errors } = setup();

    const pending = captured(client.request('a', undefined, z.unknown()));
    await server.nextMessage();
    await client.shutdown();

    const error = await pending;
    expect(error).toBeInstanceOf(ClientClosedError);
    expect(error).toMatchObject({ message: 'client closed' });
    expect(client.state).toBe('closed');
    expect(server.fromServer.listenerCount('data')).toBe(0);

    await expect(client.request('b', undefined, z.unknown())).rejects.toBeInstanceOf(
      ClientClosedError,
    );
    await expect(client.notify('exit')).rejects.toBeInstanceOf(ClientClosedError);

    server.respond(1, null);
    server.end();
    expect(errors).toEqual([]);
  });

  it('is idempotent and works before anything was sent', async () => {
    const { client } = setup();

    await client.shutdown();
    await client.shutdown();

    expect(client.state).toBe('closed');
  });

  it('rejects callers even when the server stops reading its stdin', async () => {
    const toServer = new PassThrough();
    const fromServer = new PassThrough();
    const client = createLspClient({
      toServer,
      fromServer,
      logger: new DebugLogger('lsp-pipe:test-client', { enabled: false }),
      config: { shutdownFlushMs: 20 },
    });
    clients.push(client);

    const pending = captured(
      client.request('test/big', { blob: 'x'.repeat(64 * 1024) }, z.unknown()),
    );
    await client.shutdown();

    expect(await pending).toBeInstanceOf(ClientClosedError);
    expect(client.state).toBe('closed');
    expect(client.inFlightCount).toBe(0);
  });

  it('lets queued writes finish first', async () => {
    const { server, client } = setup();

    const sent = client.notify('exit');
    await client.shutdown();
    await sent;

    expect(await server.nextMessage()).toEqual({ jsonrpc: '2.0', method: 'exit' });
  });
});

describe('LspClient server requests', () => {
  it('answers MethodNotFound when no handler is installed', async () => {
    const { server, client } = setup();
    await client.notify('initialized', {});
    await server.nextMessage();

    server.send({
      jsonrpc: '2.0',
      id: 'cfg-1',
      method: 'workspace/configuration',
      params: { items: [] },
    });

    expect(await server.nextMessage()).toEqual({
      jsonrpc: '2.0',
      id: 'cfg-1',
      error: {
        code: -32601,
        message: 'Unhandled method workspace/configuration',
      },
    });
  });

  it('replies with the value returned by the handler', async () => {
    const onServerRequest = vi.fn((method: string) =>
      method === 'workspace/configuration' ? [{ tabSize: 2 }] : null,
    );
    const { server, client } = setup({ onServerRequest });
    await client.notify('initialized', {});
    await server.nextMessage();

    server.send({
      jsonrpc: '2.0',
      id: 7,
      method: 'workspace/configuration',
      params: { items: [{ section: 'editor' }] },
    });

    expect(await server.nextMessage()).toEqual({
      jsonrpc: '2.0',
      id: 7,
      result: [{ tabSize: 2 }],
    });
    expect(onServerRequest).toHaveBeenCalledWith('workspace/configuration', {
      items: [{ section: 'editor' }],
    });
  });

  it('sends null for a handler that returns nothing', async () => {
    const { server, client } = setup({
      onServerRequest: async () => undefined,
    });
    await client.notify('initialized', {});
    await server.nextMessage();

    server.send({ jsonrpc: '2.0', id: 8, method: 'client/registerCapability' });

    expect(await server.nextMessage()).toEqual({
      jsonrpc: '2.0',
      id: 8,
      result: null,
    });
  });

  it('turns thrown errors into error responses', async () => {
    const { server, client } = setup({
      onServerRequest: (method) => {
        if (method === 'workspace/applyEdit') {
          throw new ResponseError(-32602, 'bad params', { field: 'edit' });
        }
        throw new Error('boom');
      },
    });
    await client.notify('initialized', {});
    await server.nextMessage();

    server.send({ jsonrpc: '2.0', id: 1, method: 'workspace/applyEdit' });
    expect(await server.nextMessage()).toEqual({
      jsonrpc: '2.0',
      id: 1,
      error: { code: -32602, message: 'bad params', data: { field: 'edit' } },
    });

    server.send({ jsonrpc: '2.0', id: 2, method: 'window/workDoneProgress/create' });
    expect(await server.nextMessage()).toEqual({
      jsonrpc: '2.0',
      id: 2,
      error: { code: -32603, message: 'boom' },
    });
  });
});
