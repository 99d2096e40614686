/**
 * Text preparation shared by the classifier and the conversation layer.
 */

const TYPOGRAPHIC_APOSTROPHES = /[‘’ʼ`´]/g;

/** Trim, lowercase, straighten apostrophes, collapse whitespace. */
export function normalizeText(text: string): string {
  return text.replace(TYPOGRAPHIC_APOSTROPHES, "'").toLowerCase().replace(/\s+/g, ' ').trim();
}

export function countWords(normalized: string): number {
  return normalized ? normalized.split(' ').length : 0;
}

// Common speech-to-text misses for symptom vocabulary. Applied to voice input only.
const TRANSCRIPTION_CORRECTIONS: ReadonlyArray<readonly [RegExp, string]> = [
  [/\bchest pane\b/g, 'chest pain'],
  [/\bdifficultly breathing\b/g, 'difficulty breathing'],
  [/\bshortness of breathe\b/g, 'shortness of breath'],
  [/\bcan'?t breath\b/g, 'difficulty breathing'],
  [/\bcannot breath\b/g, 'difficulty breathing'],
  [/\bhead egg\b/g, 'headache'],
  [/\bhead ache\b/g, 'headache'],
  [/\bstomach egg\b/g, 'stomach ache'],
  [/\bthrowing up\b/g, 'vomiting'],
  [/\bhigh temperature\b/g, 'high fever'],
  [/\brunning a temperature\b/g, 'fever'],
  [/\bheart attack\b/g, 'chest pain'],
  [/\bseizer\b/g, 'seizure'],
];

/**
 * Rewrites known mis-transcriptions. The result is normalized text, so voice
 * transcripts are stored lowercased.
 */
export function correctTranscription(text: string): string {
  let out = normalizeText(text);
  for (const [pattern, replacement] of TRANSCRIPTION_CORRECTIONS) {
    out = out.replace(pattern, replacement);
  }
  return out;
}
