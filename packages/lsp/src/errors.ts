import type { ZodIssue } from 'zod';

import type { RequestId, ResponseErrorPayload } from './protocol/messages.js';

export type TransportErrorCode =
  | 'unexpected-end-of-input'
  | 'malformed-header'
  | 'unsupported-header'
  | 'truncated-body'
  | 'stream-error'
  | 'write-failed';

/**
 * Fatal to the whole client: the inbound stream can no longer be trusted to
 * be on a frame boundary, or the outbound stream refused a write.
 */
export class TransportError extends Error {
  readonly code: TransportErrorCode;

  constructor(code: TransportErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'TransportError';
    this.code = code;
  }
}

export type ProtocolViolationCode =
  | 'unmatched-response'
  | 'invalid-json'
  | 'invalid-message';

/** A single bad message. Framing is intact, so the reader keeps going. */
export class ProtocolViolationError extends Error {
  readonly code: ProtocolViolationCode;

  constructor(code: ProtocolViolationCode, message: string) {
    super(message);
    this.name = 'ProtocolViolationError';
    this.code = code;
  }
}

export class ResponseError extends Error {
  readonly code: number;
  readonly data: unknown;

  constructor(code: number, message: string, data?: unknown) {
    super(message);
    this.name = 'ResponseError';
    this.code = code;
    this.data = data;
  }

  static fromPayload(payload: ResponseErrorPayload): ResponseError {
    return new ResponseError(payload.code, payload.message, payload.data);
  }

  toPayload(): ResponseErrorPayload {
    return this.data === undefined
      ? { code: this.code, message: this.message }
      : { code: this.code, message: this.message, data: this.data };
  }
}

export class DecodeError extends Error {
  readonly method: string;
  readonly id: RequestId;
  readonly issues: ZodIssue[];

  constructor(method: string, id: RequestId, issues: ZodIssue[]) {
    const summary = issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    super(`Result of '${method}' (id ${id}) did not decode: ${summary}`);
    this.name = 'DecodeError';
    this.method = method;
    this.id = id;
    this.issues = issues;
  }
}

export class RequestCancelledError extends Error {
  /** Null when the signal was already aborted and no id was assigned. */
  readonly id: RequestId | null;

  constructor(id: RequestId | null, method: string) {
    super(
      id === null
        ? `Request '${method}' was cancelled before it was sent`
        : `Request '${method}' (id ${id}) was cancelled`,
    );
    this.name = 'RequestCancelledError';
    this.id = id;
  }
}

export class RequestTimeoutError extends Error {
  readonly id: RequestId;
  readonly timeoutMs: number;

  constructor(id: RequestId, method: string, timeoutMs: number) {
    super(`Request '${method}' (id ${id}) timed out after ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
    this.id = id;
    this.timeoutMs = timeoutMs;
  }
}

export class ClientClosedError extends Error {
  constructor(message = 'client closed') {
    super(message);
    this.name = 'ClientClosedError';
  }
}

export class ConfigError extends Error {
  readonly paths: string[];

  constructor(message: string, paths: string[] = []) {
    super(message);
    this.name = 'ConfigError';
    this.paths = paths;
  }
}
