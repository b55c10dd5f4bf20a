// ============================================================================
// Call Completion Registry
// ============================================================================
// Correlates gateway completion webhooks with the attempt waiting on them.
// The waiter registers its correlation id before the call is placed; the
// webhook route resolves it. Events that arrive with nobody waiting are kept
// briefly so a fast webhook is not lost.

import { logger } from "../utils/logger";
import type { CallCompletionEvent } from "../types/gateway";

interface PendingWait {
  resolve: (event: CallCompletionEvent | null) => void;
  timer: NodeJS.Timeout;
  signal?: AbortSignal;
  onAbort?: () => void;
}

interface EarlyEvent {
  event: CallCompletionEvent;
  received_at: number;
}

export class CallCompletionRegistryClass {
  private waiting: Map<string, PendingWait> = new Map();
  private early: Map<string, EarlyEvent> = new Map();

  constructor(private readonly earlyRetentionMs: number = 10 * 60 * 1000) {}

  /**
   * Resolves with the completion event, or null on timeout or abort
   */
  waitFor(
    correlationId: string,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<CallCompletionEvent | null> {
    const buffered = this.early.get(correlationId);
    if (buffered) {
      this.early.delete(correlationId);
      return Promise.resolve(buffered.event);
    }

    if (signal?.aborted) {
      return Promise.resolve(null);
    }

    // A second waiter on the same id replaces the first
    this.settle(correlationId, null);

    return new Promise((resolve) => {
      const pending: PendingWait = {
        resolve,
        timer: setTimeout(() => {
          logger.debug("Webhook wait timed out", { correlation_id: correlationId, timeoutMs });
          this.settle(correlationId, null);
        }, timeoutMs),
        signal,
      };
      if (signal) {
        pending.onAbort = () => this.settle(correlationId, null);
        signal.addEventListener("abort", pending.onAbort, { once: true });
      }
      this.waiting.set(correlationId, pending);
    });
  }

  /**
   * Deliver a completion event. Returns true when an attempt was waiting on it.
   */
  resolve(event: CallCompletionEvent): boolean {
    const correlationId = event.correlationId;
    if (!correlationId) {
      logger.warn("Completion webhook without correlation id", { call_id: event.callId });
      return false;
    }

    if (this.settle(correlationId, event)) {
      logger.info("Completion webhook matched waiting attempt", {
        correlation_id: correlationId,
        call_id: event.callId,
      });
      return true;
    }

    this.pruneEarly();
    this.early.set(correlationId, { event, received_at: Date.now() });
    logger.debug("Completion webhook buffered", {
      correlation_id: correlationId,
      call_id: event.callId,
    });
    return false;
  }

  /**
   * Drop any buffered event for an id that is no longer awaited
   */
  forget(correlationId: string): void {
    this.early.delete(correlationId);
    this.settle(correlationId, null);
  }

  getStats(): { waiting: number; buffered: number } {
    return { waiting: this.waiting.size, buffered: this.early.size };
  }

  private settle(correlationId: string, event: CallCompletionEvent | null): boolean {
    const pending = this.waiting.get(correlationId);
    if (!pending) return false;

    this.waiting.delete(correlationId);
    clearTimeout(pending.timer);
    if (pending.signal && pending.onAbort) {
      pending.signal.removeEventListener("abort", pending.onAbort);
    }
    pending.resolve(event);
    return true;
  }

  private pruneEarly(): void {
    const cutoff = Date.now() - this.earlyRetentionMs;
    for (const [id, entry] of this.early.entries()) {
      if (entry.received_at < cutoff) {
        this.early.delete(id);
      }
    }
  }
}

export const callCompletionRegistry = new CallCompletionRegistryClass();
