import { CallOutcome } from "../../../types/campaign";
import type { DetectFn } from "../types";

/**
 * Priority 4: Decision keywords, sentence by sentence.
 *
 * Every match is kept with the index of the sentence it came from and the
 * latest one decides, so a patient who says "yes" and then asks to move the
 * appointment ends up rescheduled. When one sentence hits several families,
 * reschedule beats cancellation beats confirmation ("I can't make it, can we
 * do another day" is a reschedule).
 */

export type DecisionFamily = "reschedule" | "cancellation" | "confirmation";

export interface DecisionMatch {
  family: DecisionFamily;
  sentenceIndex: number;
  pattern: RegExp;
}

const FAMILY_OUTCOME: Record<DecisionFamily, CallOutcome> = {
  reschedule: CallOutcome.RESCHEDULED,
  cancellation: CallOutcome.CANCELLED,
  confirmation: CallOutcome.CONFIRMED,
};

// Within-sentence precedence, highest first
const FAMILY_ORDER: DecisionFamily[] = ["reschedule", "cancellation", "confirmation"];

const FAMILY_PATTERNS: Record<DecisionFamily, RegExp[]> = {
  reschedule: [
    /re-?schedul/,
    /different\s+(?:time|day|date)/,
    /another\s+(?:time|day|date)/,
    /can\s+we\s+(?:schedule|move|change)/,
    /(?:change|move|push)\s+(?:the|my|our)\s+appointment/,
    /push\s+it\s+back/,
    /later\s+date/,
  ],
  cancellation: [
    /cancel/,
    /(?:can't|cannot|won't\s+be\s+able\s+to)\s+make\s+it/,
    /(?:can't|cannot)\s+come/,
    /unable\s+to/,
    /(?:won't|will\s+not)\s+be\s+(?:there|able|coming)/,
    /not\s+(?:going\s+to|gonna)\s+make\s+it/,
    /(?:don't|do\s+not)\s+need\s+(?:the|this|that)\s+appointment/,
    /no\s+longer\s+need/,
  ],
  confirmation: [
    /i'?ll\s+be\s+there/,
    /i\s+will\s+be\s+there/,
    /see\s+you\s+(?:then|there|soon)/,
    /confirm/,
    /i\s+can\s+(?:make\s+it|come|be\s+there)/,
    /(?:will|i'll)\s+attend/,
    /that\s+(?:works|time\s+works)/,
    /sounds\s+good/,
    /count\s+me\s+in/,
    /looking\s+forward/,
  ],
};

// A confirmation phrase next to one of these is not a confirmation
const NEGATION = /\b(?:not|no|can't|cannot|won't|don't|unable|isn't|wasn't)\b/;

/**
 * All decision matches in transcript order
 */
export function findDecisionMatches(sentences: readonly string[]): DecisionMatch[] {
  const matches: DecisionMatch[] = [];

  sentences.forEach((sentence, sentenceIndex) => {
    for (const family of FAMILY_ORDER) {
      if (family === "confirmation" && NEGATION.test(sentence)) {
        continue;
      }
      const pattern = FAMILY_PATTERNS[family].find((p) => p.test(sentence));
      if (pattern) {
        matches.push({ family, sentenceIndex, pattern });
      }
    }
  });

  return matches;
}

/**
 * Latest sentence wins; FAMILY_ORDER breaks ties inside a sentence
 */
export function pickDecision(matches: readonly DecisionMatch[]): DecisionMatch | null {
  let winner: DecisionMatch | null = null;
  for (const match of matches) {
    if (
      !winner ||
      match.sentenceIndex > winner.sentenceIndex ||
      (match.sentenceIndex === winner.sentenceIndex &&
        FAMILY_ORDER.indexOf(match.family) < FAMILY_ORDER.indexOf(winner.family))
    ) {
      winner = match;
    }
  }
  return winner;
}

export const detectDecision: DetectFn = (view) => {
  const winner = pickDecision(findDecisionMatches(view.sentences));
  if (!winner) return null;

  return {
    outcome: FAMILY_OUTCOME[winner.family],
    rule: "decision",
    reason: `${winner.family} in sentence ${winner.sentenceIndex + 1}: ${winner.pattern.source.substring(0, 40)}`,
  };
};
