import { CallOutcome } from "../../../types/campaign";
import type { DetectFn } from "../types";
import { firstMatch, matchReason } from "../text";

/**
 * Priority 2: Wrong Number
 * Checked before any decision keyword so an identity failure is never
 * recorded as a confirmation.
 */

const PATTERNS: RegExp[] = [
  /wrong\s+number/,
  /(?:no\s*one|nobody)\s+(?:here\s+)?(?:by|with|named)\s+(?:that|this)\s+name/,
  /(?:no\s*one|nobody)\s+(?:here\s+)?(?:lives\s+here\s+)?named/,
  /you(?:\s+must|\s+might)?(?:\s+have|'ve\s+got|\s+got)\s+the\s+wrong/,
  /you\s+must\s+have\s+(?:dialed|called)\s+the\s+wrong/,
  /(?:don't|do\s+not)\s+know\s+(?:anyone|anybody|who)\s+(?:by\s+that\s+name|named|that\s+is|that's)/,
  /(?:not|isn't)\s+the\s+right\s+number/,
  /no\s+such\s+person/,
];

export const detectWrongNumber: DetectFn = (view) => {
  const pattern = firstMatch(view.text, PATTERNS);
  if (!pattern) return null;

  return {
    outcome: CallOutcome.WRONG_NUMBER,
    rule: "wrong_number",
    reason: matchReason(pattern),
  };
};
