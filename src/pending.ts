/**
 * Pending-request table
 *
 * Correlates responses with callers. Each slot settles exactly once: by a
 * response, a rejection, its deadline or its abort signal. Whichever comes
 * first removes the slot and clears its timer.
 */

import { ProtocolError, RequestCancelledError, RequestTimeoutError } from './errors.js';
import type { RequestId } from './codec.js';

export interface PendingOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

interface Slot<T> {
  method: string;
  resolve: (value: T) => void;
  reject: (error: Error) => void;
  dispose: () => void;
}

export class PendingRequests<T> {
  private readonly slots = new Map<RequestId, Slot<T>>();
  private nextId = 1;

  constructor(private readonly serverId?: string) {}

  nextRequestId(): number {
    while (this.slots.has(this.nextId)) {
      this.nextId++;
    }
    return this.nextId++;
  }

  /**
   * Register a slot; the returned promise settles when the slot does
   */
  register(id: RequestId, method: string, options: PendingOptions): Promise<T> {
    if (this.slots.has(id)) {
      return Promise.reject(new ProtocolError(this.serverId, `request id ${String(id)} is already pending`));
    }
    const { signal, timeoutMs } = options;
    if (signal?.aborted) {
      return Promise.reject(new RequestCancelledError(this.serverId, method));
    }

    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        if (this.take(id)) {
          reject(new RequestTimeoutError(this.serverId, method, timeoutMs));
        }
      }, timeoutMs);

      const onAbort = (): void => {
        if (this.take(id)) {
          reject(new RequestCancelledError(this.serverId, method));
        }
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      this.slots.set(id, {
        method,
        resolve,
        reject,
        dispose: () => {
          clearTimeout(timer);
          signal?.removeEventListener('abort', onAbort);
        }
      });
    });
  }

  resolve(id: RequestId, value: T): boolean {
    const slot = this.take(id);
    if (!slot) return false;
    slot.resolve(value);
    return true;
  }

  reject(id: RequestId, error: Error): boolean {
    const slot = this.take(id);
    if (!slot) return false;
    slot.reject(error);
    return true;
  }

  /**
   * Reject every outstanding slot; returns how many were rejected
   */
  rejectAll(errorFor: (method: string) => Error): number {
    const slots = Array.from(this.slots.keys());
    let count = 0;
    for (const id of slots) {
      const slot = this.take(id);
      if (slot) {
        slot.reject(errorFor(slot.method));
        count++;
      }
    }
    return count;
  }

  has(id: RequestId): boolean {
    return this.slots.has(id);
  }

  get size(): number {
    return this.slots.size;
  }

  private take(id: RequestId): Slot<T> | undefined {
    const slot = this.slots.get(id);
    if (!slot) return undefined;
    this.slots.delete(id);
    slot.dispose();
    return slot;
  }
}
