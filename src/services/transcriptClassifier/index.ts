// ============================================================================
// Transcript Classifier - transcript text -> call outcome
// ============================================================================
//
// Ordered rule list, first match wins. Pure and deterministic.
//
// This is keyword matching, not language understanding: it approximates the
// callee's intent and will misread some real conversations (sarcasm, a "yes"
// that answers a different question, decisions phrased in words that are not
// on the lists). Anything it cannot place falls back to busy_voicemail, which
// keeps the contact eligible for another attempt.

import { CallOutcome } from "../../types/campaign";
import type { ClassificationResult, ClassifierRule, DetectFn, TranscriptView } from "./types";
import { extractCalleeSpeech, normalize, splitSentences } from "./text";
import { detectWrongNumber } from "./rules/wrongNumber";
import { detectNotAvailable } from "./rules/notAvailable";
import { detectDecision } from "./rules/decision";
import { detectVoicemail } from "./rules/voicemail";
import { detectBySentiment } from "./rules/sentiment";

export type { ClassificationResult, ClassifierRule } from "./types";

const CLASSIFIER_PIPELINE: Array<{ name: ClassifierRule; detect: DetectFn }> = [
  { name: "wrong_number",  detect: detectWrongNumber },
  { name: "not_available", detect: detectNotAvailable },
  { name: "decision",      detect: detectDecision },
  { name: "voicemail",     detect: detectVoicemail },
  { name: "sentiment",     detect: detectBySentiment },
];

export function buildTranscriptView(transcript: string): TranscriptView {
  const text = normalize(extractCalleeSpeech(transcript));
  return {
    raw: transcript,
    text,
    sentences: splitSentences(text),
  };
}

/**
 * Classify a transcript and report which rule decided it
 */
export function classifyTranscriptDetailed(transcript: string): ClassificationResult {
  if (transcript.trim().length === 0) {
    return {
      outcome: CallOutcome.BUSY_VOICEMAIL,
      rule: "empty",
      reason: "Empty transcript",
    };
  }

  const view = buildTranscriptView(transcript);

  for (const { detect } of CLASSIFIER_PIPELINE) {
    const result = detect(view);
    if (result) {
      return result;
    }
  }

  return {
    outcome: CallOutcome.BUSY_VOICEMAIL,
    rule: "default",
    reason: "No rule matched",
  };
}

export function classifyTranscript(transcript: string): CallOutcome {
  return classifyTranscriptDetailed(transcript).outcome;
}

/**
 * Rules that decide without a clear statement from the callee
 */
export function isAmbiguous(result: ClassificationResult): boolean {
  return result.rule === "default" || result.rule === "sentiment";
}
