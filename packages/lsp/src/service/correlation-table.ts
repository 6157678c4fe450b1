import type { RequestId, ResponseMessage } from '../protocol/messages.js';

export interface InFlightRequest {
  id: RequestId;
  method: string;
  settle: (response: ResponseMessage) => void;
  reject: (error: Error) => void;
  /** Clears timers and abort listeners. Called once the entry leaves the table. */
  dispose?: () => void;
}

export type ResponseLookup =
  | { status: 'matched'; request: InFlightRequest }
  | { status: 'abandoned' }
  | { status: 'unknown' };

export const DEFAULT_ABANDONED_LIMIT = 1024;

export interface CorrelationTableOptions {
  /** How many abandoned ids to remember; the oldest are forgotten first. */
  abandonedLimit?: number;
}

/**
 * Maps in-flight request ids to their waiters. An id stays here from
 * registration until it is settled, abandoned or rejected; ids that were
 * abandoned (cancelled, timed out) are remembered so a late response can be
 * dropped instead of treated as a protocol violation.
 */
export class CorrelationTable {
  private readonly inFlight = new Map<RequestId, InFlightRequest>();
  private readonly abandoned = new Set<RequestId>();
  private readonly abandonedLimit: number;

  constructor(options: CorrelationTableOptions = {}) {
    this.abandonedLimit = options.abandonedLimit ?? DEFAULT_ABANDONED_LIMIT;
  }

  get size(): number {
    return this.inFlight.size;
  }

  has(id: RequestId): boolean {
    return this.inFlight.has(id);
  }

  register(request: InFlightRequest): void {
    if (this.inFlight.has(request.id) || this.abandoned.has(request.id)) {
      throw new Error(`Request id ${request.id} is already in use`);
    }
    this.inFlight.set(request.id, request);
  }

  /** Removes and returns the waiter for a response id. */
  take(id: unknown): ResponseLookup {
    if (typeof id !== 'number') {
      return { status: 'unknown' };
    }

    const request = this.inFlight.get(id);
    if (request) {
      this.inFlight.delete(id);
      request.dispose?.();
      return { status: 'matched', request };
    }

    if (this.abandoned.delete(id)) {
      return { status: 'abandoned' };
    }

    return { status: 'unknown' };
  }

  /**
   * Drops the waiter without settling it and remembers the id so that a
   * response arriving later is ignored. Returns the removed entry.
   */
  abandon(id: RequestId): InFlightRequest | undefined {
    const request = this.inFlight.get(id);
    if (!request) {
      return undefined;
    }
    this.inFlight.delete(id);
    this.abandoned.add(id);
    // Sets iterate in insertion order.
    for (const oldest of this.abandoned) {
      if (this.abandoned.size <= this.abandonedLimit) {
        break;
      }
      this.abandoned.delete(oldest);
    }
    request.dispose?.();
    return request;
  }

  rejectAll(error: Error): number {
    const requests = [...this.inFlight.values()];
    this.inFlight.clear();
    this.abandoned.clear();
    for (const request of requests) {
      request.dispose?.();
      request.reject(error);
    }
    return requests.length;
  }
}
