import { CallOutcome } from "../../../types/campaign";
import type { DetectFn } from "../types";
import { words } from "../text";

/**
 * Priority 6: Sentiment fallback for real conversations with no decision
 * keyword. Only runs when the callee actually talked back.
 */

export const MIN_CONVERSATION_LENGTH = 40;

const CONVERSATION_MARKERS: RegExp[] = [
  /\b(?:hello|hi|hey)\b/,
  /good\s+(?:morning|afternoon|evening)/,
  /thank\s*(?:you|s)/,
  /\b(?:what|when|where|who|how|why|which)\b/,
  /\?/,
];

const POSITIVE_WORDS = new Set([
  "yes", "yeah", "yep", "yup", "sure", "okay", "ok", "great", "perfect",
  "fine", "good", "thanks", "thank", "alright", "wonderful", "absolutely",
  "definitely", "appreciate",
]);

const NEGATIVE_WORDS = new Set([
  "no", "nope", "not", "can't", "cannot", "won't", "don't", "busy",
  "unfortunately", "sorry", "problem", "never",
]);

export function isConversation(text: string): boolean {
  return (
    text.trim().length >= MIN_CONVERSATION_LENGTH &&
    CONVERSATION_MARKERS.some((marker) => marker.test(text))
  );
}

export function scoreSentiment(text: string): { positive: number; negative: number } {
  let positive = 0;
  let negative = 0;
  for (const word of words(text)) {
    if (POSITIVE_WORDS.has(word)) positive++;
    else if (NEGATIVE_WORDS.has(word)) negative++;
  }
  return { positive, negative };
}

export const detectBySentiment: DetectFn = (view) => {
  if (!isConversation(view.text)) return null;

  const { positive, negative } = scoreSentiment(view.text);

  return {
    outcome: positive > negative ? CallOutcome.CONFIRMED : CallOutcome.BUSY_VOICEMAIL,
    rule: "sentiment",
    reason: `positive=${positive} negative=${negative}`,
  };
};
