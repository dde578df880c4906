const URL_PATTERN = /\b(?:https?:\/\/|www\.)\S+/gi;
// C0/C1 controls other than tab, newline and carriage return, which the whitespace pass handles.
const CONTROL_PATTERN = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F-\u009F]/g;
const SYMBOL_PATTERN = /[^\p{L}\p{M}\p{N}\s.,!?;:()'"%\-]/gu;
const DATE_PATTERNS = [
  /\b\d{1,2}\s+de\s+\p{L}+\s+de\s+\d{4}\b/giu,
  /\b\d{1,2}\s+de\s+\p{L}+,?\s+\d{4}\b/giu,
  /\b[A-Z][a-z]{2,8}\.?\s+\d{1,2},\s+\d{4}\b/g
];
const ELLIPSIS_PATTERN = /(?:\.{2,}|…)+/g;
const SENTENCE_BOUNDARY = /(?<=[.!?])\s+(?=\p{Lu})/u;
const TERMINAL_PUNCTUATION = /[.!?]$/;

export const MIN_SENTENCE_LENGTH = 10;

/** Lower-cased, accent-free form used for cache keys and token comparison. */
export function normalize(text: string): string {
  return stripMarks(stripMarks(text).toLowerCase());
}

function stripMarks(value: string): string {
  return value.normalize("NFKD").replace(/\p{M}/gu, "");
}

/** Removes URLs, stray symbols, date stamps and ellipses from provider text. */
export function clean(text: string): string {
  if (!text) {
    return "";
  }
  let value = text.replace(URL_PATTERN, " ");
  value = value.replace(CONTROL_PATTERN, "");
  value = value.replace(SYMBOL_PATTERN, " ");
  for (const pattern of DATE_PATTERNS) {
    value = value.replace(pattern, " ");
  }
  value = value.replace(ELLIPSIS_PATTERN, ".");
  return value.replace(/\s+/g, " ").trim();
}

export function splitSentences(text: string): string[] {
  const cleaned = clean(text);
  if (!cleaned) {
    return [];
  }
  return cleaned
    .split(SENTENCE_BOUNDARY)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > MIN_SENTENCE_LENGTH);
}

export function joinSentences(sentences: readonly string[]): string {
  const text = sentences
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0)
    .join(" ");
  if (!text) {
    return "";
  }
  return TERMINAL_PUNCTUATION.test(text) ? text : `${text}.`;
}

/** Keeps whole sentences while they fit in maxChars; a single oversized sentence is cut. */
export function truncateAtSentence(text: string, maxChars = 500): string {
  if (text.length <= maxChars) {
    return text;
  }
  const kept: string[] = [];
  let length = 0;
  for (const sentence of splitSentences(text)) {
    const added = kept.length === 0 ? sentence.length : sentence.length + 1;
    if (length + added > maxChars) break;
    kept.push(sentence);
    length += added;
  }
  if (kept.length === 0) {
    return `${text.slice(0, Math.max(0, maxChars - 3)).trimEnd()}...`;
  }
  return kept.join(" ");
}
