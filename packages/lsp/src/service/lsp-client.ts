import type { Readable, Writable } from 'node:stream';

import { ErrorCodes } from 'vscode-jsonrpc/node.js';
import type { ZodType, ZodTypeDef } from 'zod';

import {
  resolveClientConfig,
  TimeoutMsSchema,
  type LspClientConfig,
  type LspClientConfigInput,
} from '../config.js';
import { DebugLogger } from '../debug/DebugLogger.js';
import {
  ClientClosedError,
  ConfigError,
  DecodeError,
  ProtocolViolationError,
  RequestCancelledError,
  RequestTimeoutError,
  ResponseError,
  TransportError,
} from '../errors.js';
import {
  parseMessage,
  serializeNotification,
  serializeRequest,
  serializeResponse,
  type MessageId,
  type RequestId,
  type ResponseErrorPayload,
  type ResponseMessage,
  type ServerRequestMessage,
} from '../protocol/messages.js';
import { encodeFrame, FrameDecoder } from '../transport/framing.js';
import { CorrelationTable } from './correlation-table.js';
import {
  NotificationQueue,
  type NotificationHandler,
} from './notification-queue.js';

export const CANCEL_REQUEST_METHOD = '$/cancelRequest';

export type ClientState = 'idle' | 'running' | 'failed' | 'closed';

export type RequestResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ResponseErrorPayload };

/** Any zod schema whose output is T, whatever its input. */
export type ResultSchema<T> = ZodType<T, ZodTypeDef, unknown>;

export interface RequestOptions {
  signal?: AbortSignal;
  /**
   * Overrides `requestTimeoutMs` from the config; 0 waits forever. Must be
   * an integer no larger than `MAX_TIMER_MS`.
   */
  timeoutMs?: number;
}

export type ServerRequestHandler = (method: string, params: unknown) => unknown;

export interface LspClientOptions {
  /** The server's stdin. */
  toServer: Writable;
  /** The server's stdout. */
  fromServer: Readable;
  onNotification?: NotificationHandler;
  onServerRequest?: ServerRequestHandler;
  /** Receives fatal transport failures and recoverable protocol violations. */
  onError?: (error: Error) => void;
  name?: string;
  config?: LspClientConfigInput;
  logger?: DebugLogger;
}

export function unwrapResult<T>(result: RequestResult<T>): T {
  if (!result.ok) {
    throw ResponseError.fromPayload(result.error);
  }
  return result.value;
}

function toWriteFailure(error: unknown): TransportError {
  if (error instanceof TransportError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(
    'write-failed',
    `Failed writing to server: ${message}`,
    error,
  );
}

/**
 * JSON-RPC client over a pair of byte streams. Requests are correlated with
 * their responses by id; a single reader attached to `fromServer` settles
 * them in stream order and hands notifications to a queue.
 */
export class LspClient {
  private _state: ClientState = 'idle';
  private _failure: TransportError | undefined;
  private nextRequestId: RequestId = 1;
  private readonly table = new CorrelationTable();
  private readonly decoder: FrameDecoder;
  private readonly notifications: NotificationQueue;
  private readonly config: LspClientConfig;
  private readonly logger: DebugLogger;
  private readonly name: string;
  private writeTail: Promise<void> = Promise.resolve();

  public constructor(private readonly options: LspClientOptions) {
    this.config = resolveClientConfig(options.config);
    this.logger = options.logger ?? DebugLogger.getLogger('lsp-pipe:client');
    this.name = options.name ?? 'server';
    this.decoder = new FrameDecoder({
      maxHeaderBytes: this.config.maxHeaderBytes,
      maxBodyBytes: this.config.maxBodyBytes,
    });

    const onNotification =
      options.onNotification ??
      ((notification) => {
        this.logger.debug(
          () => `[${this.name}] no handler for '${notification.method}'`,
        );
      });
    this.notifications = new NotificationQueue(onNotification, {
      limit: this.config.notificationQueueLimit,
      onError: (error) => this.report(error),
    });
  }

  public get state(): ClientState {
    return this._state;
  }

  /** The transport error that put the client into the `failed` state. */
  public get failure(): TransportError | undefined {
    return this._failure;
  }

  public get inFlightCount(): number {
    return this.table.size;
  }

  /**
   * Sends a request and waits for the response with the same id.
   *
   * Resolves `{ ok: false }` when the server answers with an error object;
   * the schema is only applied to a successful result. Rejects with
   * {@link DecodeError} when the result does not match the schema, and with
   * the client's {@link TransportError} if the connection fails first. An
   * invalid `timeoutMs` throws {@link ConfigError} before anything is sent.
   */
  public async request<T>(
    method: string,
    params: unknown,
    schema: ResultSchema<T>,
    options: RequestOptions = {},
  ): Promise<RequestResult<T>> {
    this.assertUsable();
    if (options.timeoutMs !== undefined) {
      const timeout = TimeoutMsSchema.safeParse(options.timeoutMs);
      if (!timeout.success) {
        throw new ConfigError(
          `Invalid timeoutMs for '${method}': ${timeout.error.issues.map((issue) => issue.message).join('; ')}`,
          ['timeoutMs'],
        );
      }
    }
    if (options.signal?.aborted) {
      throw new RequestCancelledError(null, method);
    }
    this.startReader();

    const id = this.nextRequestId;
    this.nextRequestId += 1;

    const response = await this.exchange(id, method, params, options);
    if (response.error) {
      return { ok: false, error: response.error };
    }

    const decoded = schema.safeParse(response.result);
    if (!decoded.success) {
      throw new DecodeError(method, id, decoded.error.issues);
    }
    return { ok: true, value: decoded.data };
  }

  public async notify(method: string, params?: unknown): Promise<void> {
    this.assertUsable();
    this.startReader();

    const frame = encodeFrame(serializeNotification(method, params));
    this.logger.debug(() => `[${this.name}] -> notification '${method}'`);
    try {
      await this.enqueueWrite(frame);
    } catch (error) {
      const failure = toWriteFailure(error);
      this.fail(failure);
      throw this._failure ?? failure;
    }
  }

  /**
   * Stops reading and rejects everything still waiting with
   * {@link ClientClosedError}. Queued writes then get up to
   * `shutdownFlushMs` to finish; the streams themselves are left open for
   * their owner to close.
   */
  public async shutdown(): Promise<void> {
    if (this._state === 'closed') {
      return;
    }

    const previous = this._state;
    this._state = 'closed';
    if (previous === 'running') {
      this.detach();
    }
    this.notifications.close();
    const rejected = this.table.rejectAll(new ClientClosedError());
    this.logger.debug(
      () =>
        `[${this.name}] client closed (${rejected} in-flight request(s) rejected)`,
    );

    const flushed = await this.flushWrites();
    if (!flushed) {
      this.logger.warn(
        () =>
          `[${this.name}] queued writes still pending after ${this.config.shutdownFlushMs}ms`,
      );
      // A write still in progress may yet fail; keep its listener.
      return;
    }
    if (previous !== 'idle') {
      this.options.toServer.off('error', this.onWriteError);
    }
  }

  /** Resolves false when the write queue is not drained in time. */
  private async flushWrites(): Promise<boolean> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), this.config.shutdownFlushMs);
    });
    try {
      return await Promise.race([this.writeTail.then(() => true), expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  private exchange(
    id: RequestId,
    method: string,
    params: unknown,
    options: RequestOptions,
  ): Promise<ResponseMessage> {
    const frame = encodeFrame(serializeRequest(id, method, params));
    const timeoutMs = options.timeoutMs ?? this.config.requestTimeoutMs;
    const { signal } = options;

    const settled = new Promise<ResponseMessage>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const onAbort = (): void => {
        this.abandon(id, new RequestCancelledError(id, method));
      };

      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          this.abandon(id, new RequestTimeoutError(id, method, timeoutMs));
        }, timeoutMs);
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      this.table.register({
        id,
        method,
        settle: resolve,
        reject,
        dispose: () => {
          if (timer !== undefined) {
            clearTimeout(timer);
          }
          signal?.removeEventListener('abort', onAbort);
        },
      });
    });

    this.logger.debug(() => `[${this.name}] -> request #${id} '${method}'`);
    // A failed write fails the whole client, which rejects `settled` too.
    void this.enqueueWrite(frame).catch((error: unknown) => {
      this.fail(toWriteFailure(error));
    });

    return settled;
  }

  private abandon(id: RequestId, error: Error): void {
    const request = this.table.abandon(id);
    if (!request) {
      return;
    }

    this.logger.debug(() => `[${this.name}] abandoned #${id}: ${error.message}`);
    request.reject(error);

    if (this._state === 'running') {
      const frame = encodeFrame(
        serializeNotification(CANCEL_REQUEST_METHOD, { id }),
      );
      void this.enqueueWrite(frame).catch((writeError: unknown) => {
        this.fail(toWriteFailure(writeError));
      });
    }
  }

  private assertUsable(): void {
    if (this._state === 'closed') {
      throw new ClientClosedError();
    }
    if (this._state === 'failed' && this._failure) {
      throw this._failure;
    }
  }

  // ─── Writing ─────────────────────────────────────────────────────────────

  /** Serializes writes so frames never interleave on the server's stdin. */
  private enqueueWrite(frame: Buffer): Promise<void> {
    const write = this.writeTail.then(() => this.writeFrame(frame));
    // The tail only orders writes; each caller observes its own failure.
    this.writeTail = write.catch(() => undefined);
    return write;
  }

  private writeFrame(frame: Buffer): Promise<void> {
    const { toServer } = this.options;

    return new Promise<void>((resolve, reject) => {
      if (this._state === 'failed' && this._failure) {
        reject(this._failure);
        return;
      }
      if (toServer.destroyed || toServer.writableEnded) {
        reject(new Error('stream is no longer writable'));
        return;
      }
      toServer.write(frame, (error?: Error | null) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }

  // ─── Reading ─────────────────────────────────────────────────────────────

  private startReader(): void {
    if (this._state !== 'idle') {
      return;
    }
    this._state = 'running';

    const { fromServer, toServer } = this.options;
    fromServer.on('data', this.onData);
    fromServer.on('end', this.onEnd);
    fromServer.on('close', this.onEnd);
    fromServer.on('error', this.onReadError);
    toServer.on('error', this.onWriteError);
    this.logger.debug(() => `[${this.name}] reader started`);
  }

  /**
   * Removes the read listeners. The write error listener stays until
   * shutdown: a write queued before a failure can still hit EPIPE.
   */
  private detach(): void {
    const { fromServer } = this.options;
    fromServer.off('data', this.onData);
    fromServer.off('end', this.onEnd);
    fromServer.off('close', this.onEnd);
    fromServer.off('error', this.onReadError);
  }

  private readonly onData = (chunk: Buffer | string): void => {
    const { frames, error } = this.decoder.feed(
      typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk,
    );

    for (const body of frames) {
      if (this._state !== 'running') {
        return;
      }
      this.dispatch(body);
    }

    if (error) {
      this.fail(error);
    }
  };

  private readonly onEnd = (): void => {
    this.fail(this.decoder.endOfInput());
  };

  private readonly onReadError = (error: Error): void => {
    this.fail(
      new TransportError(
        'stream-error',
        `Failed reading from server: ${error.message}`,
        error,
      ),
    );
  };

  private readonly onWriteError = (error: Error): void => {
    this.fail(toWriteFailure(error));
  };

  private dispatch(body: Buffer): void {
    if (body.length === 0) {
      this.logger.debug(() => `[${this.name}] <- empty frame ignored`);
      return;
    }

    const outcome = parseMessage(body.toString('utf8'));
    if (!outcome.ok) {
      const error = new ProtocolViolationError(
        outcome.reason,
        `Discarded ${outcome.reason === 'invalid-json' ? 'unparseable' : 'unrecognized'} message from ${this.name}: ${outcome.detail}`,
      );
      this.violation(error);
      if (outcome.responseId !== undefined) {
        this.rejectMalformedResponse(outcome.responseId, error);
      }
      return;
    }

    const { message } = outcome;
    switch (message.kind) {
      case 'response':
        this.settleResponse(message);
        return;
      case 'notification':
        this.logger.debug(
          () => `[${this.name}] <- notification '${message.method}'`,
        );
        this.notifications.push(message);
        return;
      case 'request':
        void this.answerServerRequest(message);
        return;
      default:
        return;
    }
  }

  private settleResponse(message: ResponseMessage): void {
    const lookup = this.table.take(message.id);
    switch (lookup.status) {
      case 'matched':
        this.logger.debug(
          () =>
            `[${this.name}] <- response #${lookup.request.id}${message.error ? ` error ${message.error.code}` : ''}`,
        );
        lookup.request.settle(message);
        return;
      case 'abandoned':
        this.logger.debug(
          () =>
            `[${this.name}] <- late response #${String(message.id)} dropped`,
        );
        return;
      case 'unknown':
        this.violation(
          new ProtocolViolationError(
            'unmatched-response',
            `Response id ${JSON.stringify(message.id)} from ${this.name} does not match any in-flight request`,
          ),
        );
        return;
      default:
        return;
    }
  }

  /** A malformed response still answers the request it names. */
  private rejectMalformedResponse(
    id: MessageId,
    error: ProtocolViolationError,
  ): void {
    const lookup = this.table.take(id);
    if (lookup.status === 'matched') {
      lookup.request.reject(error);
    }
  }

  private async answerServerRequest(
    message: ServerRequestMessage,
  ): Promise<void> {
    this.logger.debug(
      () =>
        `[${this.name}] <- server request #${String(message.id)} '${message.method}'`,
    );

    const reply = await this.resolveServerRequest(message);
    if (this._state !== 'running') {
      return;
    }

    let frame: Buffer;
    try {
      frame = encodeFrame(serializeResponse(message.id, reply));
    } catch (error) {
      frame = encodeFrame(
        serializeResponse(message.id, {
          error: {
            code: ErrorCodes.InternalError,
            message: `Result of '${message.method}' is not serializable: ${error instanceof Error ? error.message : String(error)}`,
          },
        }),
      );
    }

    try {
      await this.enqueueWrite(frame);
    } catch (error) {
      this.fail(toWriteFailure(error));
    }
  }

  private async resolveServerRequest(
    message: ServerRequestMessage,
  ): Promise<{ result: unknown } | { error: ResponseErrorPayload }> {
    const handler = this.options.onServerRequest;
    if (!handler) {
      return {
        error: {
          code: ErrorCodes.MethodNotFound,
          message: `Unhandled method ${message.method}`,
        },
      };
    }

    try {
      return { result: await handler(message.method, message.params) };
    } catch (error) {
      if (error instanceof ResponseError) {
        return { error: error.toPayload() };
      }
      return {
        error: {
          code: ErrorCodes.InternalError,
          message: error instanceof Error ? error.message : String(error),
        },
      };
    }
  }

  // ─── Failure ─────────────────────────────────────────────────────────────

  private violation(error: ProtocolViolationError): void {
    this.logger.warn(() => `[${this.name}] ${error.message}`);
    this.report(error);
  }

  /**
   * Terminal transition for transport failures: report, stop reading and
   * wake every waiting caller with the error.
   */
  private fail(error: TransportError): void {
    if (this._state === 'failed' || this._state === 'closed') {
      return;
    }

    const wasRunning = this._state === 'running';
    this._state = 'failed';
    this._failure = error;
    this.logger.error(
      () => `[${this.name}] transport failure (${error.code}): ${error.message}`,
    );
    this.report(error);

    if (wasRunning) {
      this.detach();
    }
    this.notifications.close();
    this.table.rejectAll(error);
  }

  private report(error: Error): void {
    const { onError } = this.options;
    if (!onError) {
      return;
    }
    try {
      onError(error);
    } catch (handlerError) {
      this.logger.error(
        () =>
          `[${this.name}] onError handler threw: ${handlerError instanceof Error ? handlerError.message : String(handlerError)}`,
      );
    }
  }
}

export function createLspClient(options: LspClientOptions): LspClient {
  return new LspClient(options);
}
