// ============================================================================
// Transcript Poller
// ============================================================================

import { logger } from "../utils/logger";
import { sleep as defaultSleep, type SleepFn } from "../utils/retry";
import {
  AuthError,
  NotFoundError,
  TranscriptFetchError,
  errorMessage,
  isAbortError,
} from "../utils/errors";
import type { CallGateway, CallTranscript } from "../types/gateway";

export interface PollOptions {
  intervalMs: number;
  maxAttempts: number;
  sleep?: SleepFn;
  signal?: AbortSignal;
}

// Bland statuses after which no transcript will ever be attached
const ENDED_WITHOUT_TRANSCRIPT = new Set([
  "failed",
  "no-answer",
  "no_answer",
  "busy",
  "canceled",
  "cancelled",
]);

function isFinished(record: CallTranscript): boolean {
  return record.completed || ENDED_WITHOUT_TRANSCRIPT.has(record.status.toLowerCase());
}

/**
 * Poll the gateway until the call record is complete.
 *
 * NotFound, incomplete records and transient gateway errors are retried every
 * `intervalMs`. Throws TranscriptFetchError once `maxAttempts` polls have
 * passed, AuthError immediately, and an AbortError when the signal fires.
 */
export async function pollForTranscript(
  gateway: CallGateway,
  callId: string,
  options: PollOptions
): Promise<CallTranscript> {
  const sleep = options.sleep ?? defaultSleep;
  let lastProblem = "no response";

  for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
    try {
      const record = await gateway.getCallTranscript(callId, options.signal);
      if (isFinished(record)) {
        logger.debug("Transcript ready", { call_id: callId, polls: attempt, status: record.status });
        return record;
      }
      lastProblem = `call still ${record.status}`;
    } catch (error) {
      if (isAbortError(error) || error instanceof AuthError) {
        throw error;
      }
      lastProblem =
        error instanceof NotFoundError ? "call record not found" : errorMessage(error);
    }

    if (attempt < options.maxAttempts) {
      await sleep(options.intervalMs, options.signal);
    }
  }

  throw new TranscriptFetchError(
    callId,
    `Transcript not available after ${options.maxAttempts} polls: ${lastProblem}`
  );
}
