import { DebugLogger } from '../debug/DebugLogger.js';
import type { NotificationMessage } from '../protocol/messages.js';

export type NotificationHandler = (
  notification: NotificationMessage,
) => void | Promise<void>;

export interface NotificationQueueOptions {
  /** Maximum number of notifications waiting behind a busy handler. */
  limit?: number;
  onError?: (error: Error) => void;
  logger?: DebugLogger;
}

const DEFAULT_LIMIT = 1000;

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

/**
 * Delivers notifications to a handler one at a time, in arrival order.
 *
 * While idle, `push` calls the handler synchronously, so a notification is
 * seen before any response that followed it on the wire. A handler that
 * returns a promise keeps the queue busy until it settles; anything pushed
 * meanwhile waits here instead of holding up the reader.
 */
export class NotificationQueue {
  private readonly waiting: NotificationMessage[] = [];
  private readonly limit: number;
  private readonly onError?: (error: Error) => void;
  private readonly logger: DebugLogger;
  private busy = false;
  private closed = false;
  private dropped = 0;

  constructor(
    private readonly handler: NotificationHandler,
    options: NotificationQueueOptions = {},
  ) {
    this.limit = options.limit ?? DEFAULT_LIMIT;
    this.onError = options.onError;
    this.logger =
      options.logger ?? DebugLogger.getLogger('lsp-pipe:notifications');
  }

  get pending(): number {
    return this.waiting.length;
  }

  get droppedCount(): number {
    return this.dropped;
  }

  get isBusy(): boolean {
    return this.busy;
  }

  push(notification: NotificationMessage): void {
    if (this.closed) {
      return;
    }

    this.waiting.push(notification);
    if (this.waiting.length > this.limit) {
      const oldest = this.waiting.shift();
      this.dropped += 1;
      this.logger.warn(
        () =>
          `Notification queue over ${this.limit} entries; dropped '${oldest?.method ?? 'unknown'}'`,
      );
    }

    if (!this.busy) {
      this.drain();
    }
  }

  close(): void {
    this.closed = true;
    this.waiting.length = 0;
  }

  private drain(): void {
    this.busy = true;
    while (!this.closed) {
      const next = this.waiting.shift();
      if (next === undefined) {
        break;
      }

      let outcome: unknown;
      try {
        outcome = this.handler(next);
      } catch (error) {
        this.report(next, error);
        continue;
      }

      if (isPromiseLike(outcome)) {
        void Promise.resolve(outcome).then(
          () => this.resume(),
          (error: unknown) => {
            this.report(next, error);
            this.resume();
          },
        );
        return;
      }
    }
    this.busy = false;
  }

  private resume(): void {
    this.busy = false;
    if (!this.closed && this.waiting.length > 0) {
      this.drain();
    }
  }

  private report(notification: NotificationMessage, error: unknown): void {
    const failure = error instanceof Error ? error : new Error(String(error));
    this.logger.error(
      () =>
        `Notification handler for '${notification.method}' failed: ${failure.message}`,
    );
    this.onError?.(failure);
  }
}
