/**
 * `Content-Length` framing used by the Language Server Protocol base layer:
 *
 *   Content-Length: <bytes>\r\n
 *   \r\n
 *   <body>
 *
 * Only the Content-Length header is accepted.
 */

import { TransportError } from '../errors.js';

// ─── Constants ───────────────────────────────────────────────────────────────

export const CONTENT_LENGTH = 'Content-Length';
export const DEFAULT_MAX_HEADER_BYTES = 1024;
export const DEFAULT_MAX_BODY_BYTES = 32 * 1024 * 1024;

const HEADER_TERMINATOR = Buffer.from('\r\n\r\n', 'ascii');
const CONTENT_LENGTH_LINE = /^Content-Length:[ \t]*([0-9]+)[ \t]*$/;
const HEADER_NAME = /^([^:]*):/;

// ─── Functions ───────────────────────────────────────────────────────────────

export function encodeFrame(body: string): Buffer {
  const bodyBytes = Buffer.from(body, 'utf8');
  const header = Buffer.from(
    `${CONTENT_LENGTH}: ${bodyBytes.length}\r\n\r\n`,
    'ascii',
  );
  return Buffer.concat([header, bodyBytes]);
}

// ─── FrameDecoder Class ──────────────────────────────────────────────────────

export interface FrameDecoderOptions {
  maxHeaderBytes?: number;
  maxBodyBytes?: number;
}

export interface FeedResult {
  frames: Buffer[];
  error?: TransportError;
}

type DecoderState =
  | { phase: 'header' }
  | { phase: 'body'; length: number }
  | { phase: 'failed'; error: TransportError };

export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);
  private state: DecoderState = { phase: 'header' };
  private readonly maxHeaderBytes: number;
  private readonly maxBodyBytes: number;

  constructor(options: FrameDecoderOptions = {}) {
    this.maxHeaderBytes = options.maxHeaderBytes ?? DEFAULT_MAX_HEADER_BYTES;
    this.maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
  }

  /** Bytes received but not yet returned as part of a frame. */
  get buffered(): number {
    return this.buffer.length;
  }

  /**
   * Appends a chunk and returns every body that is now complete. Once the
   * stream is out of sync the decoder stops and reports the error; bodies
   * completed before it in the same chunk are still returned.
   */
  feed(chunk: Buffer): FeedResult {
    if (this.state.phase === 'failed') {
      return { frames: [], error: this.state.error };
    }

    this.buffer =
      this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    const frames: Buffer[] = [];

    try {
      while (true) {
        if (this.state.phase === 'header') {
          const length = this.readHeader();
          if (length === null) {
            break;
          }
          this.state = { phase: 'body', length };
        }

        if (this.state.phase === 'body') {
          const { length } = this.state;
          if (this.buffer.length < length) {
            break;
          }
          frames.push(Buffer.from(this.buffer.subarray(0, length)));
          this.buffer = this.buffer.subarray(length);
          this.state = { phase: 'header' };
        }
      }
    } catch (error) {
      if (!(error instanceof TransportError)) {
        throw error;
      }
      this.state = { phase: 'failed', error };
      this.buffer = Buffer.alloc(0);
      return { frames, error };
    }

    return { frames };
  }

  /** The error to raise when the stream ends in the current state. */
  endOfInput(): TransportError {
    switch (this.state.phase) {
      case 'failed':
        return this.state.error;
      case 'body':
        return new TransportError(
          'truncated-body',
          `Stream ended inside a frame body: expected ${this.state.length} bytes, received ${this.buffer.length}`,
        );
      case 'header':
        return new TransportError(
          'unexpected-end-of-input',
          this.buffer.length === 0
            ? 'Stream closed'
            : `Stream ended inside a frame header after ${this.buffer.length} bytes`,
        );
      default:
        return assertNever(this.state);
    }
  }

  reset(): void {
    this.buffer = Buffer.alloc(0);
    this.state = { phase: 'header' };
  }

  /** Returns the declared body length, or null until the header is complete. */
  private readHeader(): number | null {
    const end = this.buffer.indexOf(HEADER_TERMINATOR);
    if (end < 0) {
      if (this.buffer.length > this.maxHeaderBytes) {
        throw new TransportError(
          'malformed-header',
          `Frame header exceeds ${this.maxHeaderBytes} bytes`,
        );
      }
      return null;
    }

    if (end === 0) {
      throw new TransportError(
        'unexpected-end-of-input',
        'Empty frame header',
      );
    }
    if (end > this.maxHeaderBytes) {
      throw new TransportError(
        'malformed-header',
        `Frame header exceeds ${this.maxHeaderBytes} bytes`,
      );
    }

    const block = this.buffer.subarray(0, end).toString('ascii');
    this.buffer = this.buffer.subarray(end + HEADER_TERMINATOR.length);

    let length: number | null = null;
    for (const line of block.split('\r\n')) {
      const match = CONTENT_LENGTH_LINE.exec(line);
      if (match) {
        if (length !== null) {
          throw new TransportError(
            'malformed-header',
            'Frame header has more than one Content-Length',
          );
        }
        length = Number.parseInt(match[1], 10);
        continue;
      }

      const name = HEADER_NAME.exec(line)?.[1];
      if (name === CONTENT_LENGTH) {
        throw new TransportError(
          'malformed-header',
          `Invalid Content-Length value in header '${line}'`,
        );
      }
      throw new TransportError(
        'unsupported-header',
        name === undefined
          ? `Malformed header line '${line}'`
          : `Unsupported header '${name}': only Content-Length is supported`,
      );
    }

    if (length === null) {
      throw new TransportError(
        'malformed-header',
        'Frame header has no Content-Length',
      );
    }
    if (length > this.maxBodyBytes) {
      throw new TransportError(
        'malformed-header',
        `Declared Content-Length ${length} exceeds ${this.maxBodyBytes} bytes`,
      );
    }
    return length;
  }
}

function assertNever(value: never): never {
  throw new Error(`Unexpected decoder state: ${JSON.stringify(value)}`);
}
