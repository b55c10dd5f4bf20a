// ============================================================================
// Attempt Tracker - per-contact state machine
// ============================================================================
//
//   pending --call--> done:{confirmed|cancelled|rescheduled|not_available|wrong_number}
//   pending --call--> pending                 (busy_voicemail / failed, attempts left)
//   pending --exhausted--> voicemail fallback --> done:{busy_voicemail|failed}
//
// Once done, nothing on the tracker changes again.

import { randomUUID } from "crypto";
import {
  AttemptTracker,
  CallAttemptResult,
  CallOutcome,
  Contact,
  TERMINAL_OUTCOMES,
} from "../types/campaign";

export function createTracker(
  contact: Readonly<Contact>,
  maxAttempts: number
): AttemptTracker {
  return {
    contact,
    correlation_id: randomUUID(),
    max_attempts: maxAttempts,
    attempts: 0,
    outcome: CallOutcome.PENDING,
    done: false,
    last_result: null,
    voicemail_attempted: false,
  };
}

/**
 * Eligible for another call in the next round
 */
export function isPending(tracker: AttemptTracker): boolean {
  return !tracker.done && tracker.attempts < tracker.max_attempts;
}

/**
 * Out of attempts without a definitive outcome
 */
export function needsVoicemailFallback(tracker: AttemptTracker): boolean {
  return !tracker.done && tracker.attempts >= tracker.max_attempts;
}

export function isTerminalOutcome(outcome: CallOutcome): boolean {
  return TERMINAL_OUTCOMES.has(outcome);
}

/**
 * Apply one call attempt.
 *
 * `outcome` is the classified result of a placed call, or FAILED when the
 * call could not be initiated. Returns false (and changes nothing) when the
 * tracker is already done or out of attempts.
 */
export function recordAttempt(
  tracker: AttemptTracker,
  outcome: CallOutcome,
  result: CallAttemptResult
): boolean {
  if (!isPending(tracker)) {
    return false;
  }

  tracker.attempts += 1;
  tracker.last_result = result;
  tracker.outcome = outcome === CallOutcome.PENDING ? CallOutcome.BUSY_VOICEMAIL : outcome;
  tracker.error = result.success ? undefined : result.error;

  if (isTerminalOutcome(tracker.outcome)) {
    tracker.done = true;
  }

  return true;
}

/**
 * Close an exhausted tracker after its single voicemail call.
 * Returns false when the tracker was not eligible (already done, attempts
 * left, or voicemail already tried).
 */
export function completeWithVoicemail(
  tracker: AttemptTracker,
  delivery: { success: boolean; call_id?: string; error?: string }
): boolean {
  if (!needsVoicemailFallback(tracker) || tracker.voicemail_attempted) {
    return false;
  }

  tracker.voicemail_attempted = true;
  tracker.voicemail_call_id = delivery.call_id;
  tracker.done = true;

  if (delivery.success) {
    tracker.outcome = CallOutcome.BUSY_VOICEMAIL;
  } else {
    tracker.outcome = CallOutcome.FAILED;
    tracker.error = delivery.error ?? "Voicemail delivery failed";
  }

  return true;
}

/**
 * Close a tracker that will not be called again because the run was stopped
 */
export function markStopped(tracker: AttemptTracker, reason: string): boolean {
  if (tracker.done) {
    return false;
  }

  tracker.done = true;
  tracker.outcome = CallOutcome.FAILED;
  tracker.error = reason;
  return true;
}
