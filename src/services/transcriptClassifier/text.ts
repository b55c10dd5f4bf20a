// ============================================================================
// Transcript text helpers
// ============================================================================

const SPEAKER_LABEL = /(?:^|\n|\s)(user|assistant|agent|ai|bot|human|patient|caller)\s*:/gi;
const AGENT_SPEAKERS = new Set(["assistant", "agent", "ai", "bot"]);

/**
 * Lower-case, straighten quotes and collapse whitespace
 */
export function normalize(text: string): string {
  return text
    .replace(/[‘’ʼ]/g, "'")
    .replace(/[“”]/g, '"')
    .toLowerCase()
    .replace(/[ \t]+/g, " ")
    .trim();
}

/**
 * Keep only what the called party said. Bland transcripts look like
 * "assistant: Hi ... \n user: Yes I'll be there". Unlabelled text is
 * returned whole.
 */
export function extractCalleeSpeech(transcript: string): string {
  const labels = [...transcript.matchAll(SPEAKER_LABEL)];
  if (labels.length === 0) {
    return transcript;
  }

  const turns: string[] = [];
  const leading = transcript.slice(0, labels[0]?.index ?? 0).trim();
  if (leading) turns.push(leading);

  labels.forEach((match, i) => {
    const speaker = (match[1] ?? "").toLowerCase();
    const start = (match.index ?? 0) + match[0].length;
    const end = labels[i + 1]?.index ?? transcript.length;
    const speech = transcript.slice(start, end).trim();
    if (speech && !AGENT_SPEAKERS.has(speaker)) {
      turns.push(speech);
    }
  });

  return turns.join("\n");
}

/**
 * Split on sentence punctuation and line breaks, dropping empty pieces
 */
export function splitSentences(text: string): string[] {
  return text
    .split(/[.!?;\n]+/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function firstMatch(text: string, patterns: readonly RegExp[]): RegExp | null {
  return patterns.find((p) => p.test(text)) ?? null;
}

export function matchReason(pattern: RegExp): string {
  return `Matched: ${pattern.source.substring(0, 40)}`;
}

export function words(text: string): string[] {
  return text.split(/[^a-z']+/).filter((w) => w.length > 0);
}
