import type { CallOutcome } from "../../types/campaign";

export type ClassifierRule =
  | "empty"
  | "wrong_number"
  | "not_available"
  | "decision"
  | "voicemail"
  | "sentiment"
  | "default";

export interface ClassificationResult {
  outcome: CallOutcome;
  rule: ClassifierRule;
  reason: string;
}

/**
 * Pre-processed transcript handed to every rule
 */
export interface TranscriptView {
  raw: string;
  // Lower-cased speech of the person called (agent turns removed when the
  // transcript carries speaker labels)
  text: string;
  sentences: string[];
}

export type DetectFn = (view: TranscriptView) => ClassificationResult | null;
