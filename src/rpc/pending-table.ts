import type { Logger } from "../logger";
import type { ResponseDocument } from "../types";
import { TimeoutError, TransportError } from "./errors";

interface Waiter {
  method: string;
  resolve: (value: ResponseDocument) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * Responses keyed by request id, filled by the reader and drained by callers.
 *
 * Each response is handed out once. Responses nobody claims are kept up to
 * `maxUnclaimed` entries, oldest evicted first. Ids whose wait timed out are
 * remembered so a late reply for them is dropped instead of lingering.
 */
export class PendingResponseTable {
  private readonly responses = new Map<number, ResponseDocument>();
  private readonly waiters = new Map<number, Waiter>();
  private readonly abandoned = new Set<number>();
  private readonly maxUnclaimed: number;
  private disposedReason?: string;

  constructor(
    maxUnclaimed: number,
    private readonly logger?: Logger,
  ) {
    this.maxUnclaimed = Math.max(1, maxUnclaimed);
  }

  get size(): number {
    return this.responses.size;
  }

  get waiting(): number {
    return this.waiters.size;
  }

  has(id: number): boolean {
    return this.responses.has(id);
  }

  deliver(response: ResponseDocument): void {
    if (this.disposedReason !== undefined) {
      return;
    }
    const waiter = this.waiters.get(response.id);
    if (waiter) {
      this.waiters.delete(response.id);
      clearTimeout(waiter.timer);
      waiter.resolve(response);
      return;
    }

    if (this.abandoned.delete(response.id)) {
      this.logger?.debug({ id: response.id }, "late response discarded");
      return;
    }

    // Duplicate ids: last writer wins, and moves to the young end.
    this.responses.delete(response.id);
    this.responses.set(response.id, response);

    while (this.responses.size > this.maxUnclaimed) {
      const oldest = this.responses.keys().next().value;
      if (oldest === undefined) {
        break;
      }
      this.responses.delete(oldest);
      this.logger?.warn({ id: oldest }, "unclaimed response evicted");
    }
  }

  take(id: number): ResponseDocument | undefined {
    const response = this.responses.get(id);
    if (response !== undefined) {
      this.responses.delete(id);
    }
    return response;
  }

  async wait(id: number, timeoutMs: number, method = "request"): Promise<ResponseDocument> {
    const ready = this.take(id);
    if (ready) {
      return ready;
    }
    if (this.disposedReason !== undefined) {
      throw new TransportError(`${this.disposedReason}; cannot wait for ${method} (id ${id})`);
    }
    if (this.waiters.has(id)) {
      throw new Error(`Already waiting for response ${id} (${method})`);
    }

    return await new Promise<ResponseDocument>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiters.delete(id);
        this.markAbandoned(id);
        reject(new TimeoutError(id, method, timeoutMs));
      }, timeoutMs);
      this.waiters.set(id, { method, resolve, reject, timer });
    });
  }

  /**
   * Rejects everyone still waiting and forgets all state. Later waits fail at once.
   */
  dispose(reason: string): void {
    if (this.disposedReason !== undefined) {
      return;
    }
    this.disposedReason = reason;
    for (const [id, waiter] of this.waiters.entries()) {
      clearTimeout(waiter.timer);
      waiter.reject(new TransportError(`${reason} while waiting for ${waiter.method} (id ${id})`));
    }
    this.waiters.clear();
    this.responses.clear();
    this.abandoned.clear();
  }

  private markAbandoned(id: number): void {
    this.abandoned.add(id);
    while (this.abandoned.size > this.maxUnclaimed) {
      const oldest = this.abandoned.values().next().value;
      if (oldest === undefined) {
        break;
      }
      this.abandoned.delete(oldest);
    }
  }
}
