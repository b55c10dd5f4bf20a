import { CallOutcome } from "../../../types/campaign";
import type { DetectFn } from "../types";
import { firstMatch, matchReason } from "../text";

/**
 * Priority 5: Voicemail / answering machine / no connection
 */

const PATTERNS: RegExp[] = [
  /leave\s+(?:a|your)\s+message/,
  /beep/,
  /after\s+the\s+tone/,
  /mailbox/,
  /voice\s*mail/,
  /(?:please\s+)?record\s+your\s+(?:message|name)/,
  /no\s+answer/,
  /disconnected/,
  /(?:not|no\s+longer)\s+in\s+service/,
  /(?:is|are)\s+(?:currently\s+)?unavailable/,
  /this\s+call\s+is\s+being\s+screened/,
];

export const detectVoicemail: DetectFn = (view) => {
  const pattern = firstMatch(view.text, PATTERNS);
  if (!pattern) return null;

  return {
    outcome: CallOutcome.BUSY_VOICEMAIL,
    rule: "voicemail",
    reason: matchReason(pattern),
  };
};
