import { CallOutcome } from "../../../types/campaign";
import type { DetectFn } from "../types";
import { firstMatch, matchReason } from "../text";

/**
 * Priority 3: Not Available
 * Someone answered but the patient can't take the call now.
 */

const PATTERNS: RegExp[] = [
  /(?:not|isn't)\s+(?:here|home|in)\s+right\s+now/,
  /(?:is|she's|he's|they're)\s+not\s+(?:here|home)/,
  /(?:isn't|aren't)\s+(?:here|home)/,
  /call\s+(?:me\s+|us\s+|them\s+|her\s+|him\s+)?back\s+(?:later|another\s+time|tomorrow)/,
  /try\s+(?:me\s+|again\s+)?(?:later|another\s+time|tomorrow)/,
  /bad\s+time/,
  /not\s+a\s+good\s+time/,
  /(?:can't|cannot)\s+talk\s+(?:right\s+)?now/,
  /(?:i'm|i\s+am)\s+(?:driving|at\s+work|in\s+a\s+meeting)/,
];

export const detectNotAvailable: DetectFn = (view) => {
  const pattern = firstMatch(view.text, PATTERNS);
  if (!pattern) return null;

  return {
    outcome: CallOutcome.NOT_AVAILABLE,
    rule: "not_available",
    reason: matchReason(pattern),
  };
};
