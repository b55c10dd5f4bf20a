/**
 * Call rate limiter in front of every Bland `POST /v1/calls`
 *
 * Enforces two limits:
 * 1. Global rate limit: calls per second across the process
 * 2. Per-number limit: minimum spacing between calls to the same number
 *
 * The campaign semaphore bounds how many calls are in flight; this bounds how
 * fast new ones start.
 */

import { config } from "../config";
import { logger } from "./logger";
import { sleep as defaultSleep, type SleepFn } from "./retry";

export interface RateLimitConfig {
  enabled: boolean;
  maxCallsPerSecond: number; // Global limit
  sameNumberIntervalMs: number; // Per-number limit
}

interface CallRecord {
  phoneNumber: string;
  timestamp: number;
}

export class CallRateLimiter {
  private config: RateLimitConfig;
  private lastCallByNumber: Map<string, number> = new Map(); // phone -> timestamp
  private recentCalls: CallRecord[] = []; // Sliding window for global rate

  constructor(
    config?: Partial<RateLimitConfig>,
    private readonly sleep: SleepFn = defaultSleep
  ) {
    this.config = {
      enabled: true,
      maxCallsPerSecond: 5,
      sameNumberIntervalMs: 10000, // 10 seconds
      ...config,
    };
  }

  /**
   * Wait until it's safe to call a phone number
   */
  async waitForSlot(phoneNumber: string, signal?: AbortSignal): Promise<void> {
    if (!this.config.enabled) return;

    const waitForNumber = this.getNumberWaitTime(phoneNumber, Date.now());
    if (waitForNumber > 0) {
      logger.debug("Same number called recently, waiting", {
        phone: phoneNumber,
        waitTimeMs: waitForNumber,
      });
      await this.sleep(waitForNumber, signal);
    }

    await this.waitForGlobalSlot(signal);

    const now = Date.now();
    this.lastCallByNumber.set(phoneNumber, now);
    this.recentCalls.push({ phoneNumber, timestamp: now });
  }

  private async waitForGlobalSlot(signal?: AbortSignal): Promise<void> {
    for (;;) {
      const now = Date.now();
      this.pruneWindow(now);

      const oldestCall = this.recentCalls[0];
      if (this.recentCalls.length < this.config.maxCallsPerSecond || !oldestCall) {
        return;
      }

      const waitTime = oldestCall.timestamp + 1000 - now;
      if (waitTime <= 0) return;

      logger.debug("Global call rate reached, waiting", {
        inWindow: this.recentCalls.length,
        maxCallsPerSecond: this.config.maxCallsPerSecond,
        waitTimeMs: waitTime,
      });
      await this.sleep(waitTime, signal);
    }
  }

  private pruneWindow(now: number): void {
    const oneSecondAgo = now - 1000;
    this.recentCalls = this.recentCalls.filter(
      (call) => call.timestamp > oneSecondAgo
    );
  }

  private getNumberWaitTime(phoneNumber: string, now: number): number {
    const lastCall = this.lastCallByNumber.get(phoneNumber);
    if (lastCall === undefined) return 0;
    return Math.max(0, this.config.sameNumberIntervalMs - (now - lastCall));
  }

  /**
   * Get wait time for a specific number (in milliseconds), non-blocking
   */
  getWaitTime(phoneNumber: string): number {
    if (!this.config.enabled) return 0;

    const now = Date.now();
    const numberWait = this.getNumberWaitTime(phoneNumber, now);
    if (numberWait > 0) return numberWait;

    const oneSecondAgo = now - 1000;
    const recentInWindow = this.recentCalls.filter(
      (call) => call.timestamp > oneSecondAgo
    );
    const oldestCall = recentInWindow[0];
    if (recentInWindow.length >= this.config.maxCallsPerSecond && oldestCall) {
      return Math.max(0, oldestCall.timestamp + 1000 - now);
    }

    return 0;
  }

  getStats() {
    const oneSecondAgo = Date.now() - 1000;
    const recentCallCount = this.recentCalls.filter(
      (call) => call.timestamp > oneSecondAgo
    ).length;

    return {
      enabled: this.config.enabled,
      currentCallsPerSecond: recentCallCount,
      maxCallsPerSecond: this.config.maxCallsPerSecond,
      uniqueNumbersCalled: this.lastCallByNumber.size,
    };
  }
}

// Shared by every gateway client in the process
export const callRateLimiter = new CallRateLimiter({
  enabled: config.rateLimiter.enabled,
  maxCallsPerSecond: config.rateLimiter.maxCallsPerSecond,
  sameNumberIntervalMs: config.rateLimiter.sameNumberIntervalMs,
});
