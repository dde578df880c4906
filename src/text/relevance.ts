import { normalize } from "./normalizer";

const TOKEN_PATTERN = /[\p{L}\p{N}_]{2,}/gu;
const DOCUMENT_COUNT = 2;

export const DEFAULT_DUPLICATE_THRESHOLD = 0.8;

export function tokenize(text: string): string[] {
  return normalize(text).match(TOKEN_PATTERN) ?? [];
}

function termCounts(tokens: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

function smoothIdf(documentFrequency: number): number {
  return Math.log((1 + DOCUMENT_COUNT) / (1 + documentFrequency)) + 1;
}

/**
 * TF-IDF cosine similarity between two texts, fitted on the pair itself.
 * Returns 0 when either side has no tokens.
 */
export function score(candidate: string, question: string): number {
  if (!candidate || !question) {
    return 0;
  }
  const left = termCounts(tokenize(candidate));
  const right = termCounts(tokenize(question));
  if (left.size === 0 || right.size === 0) {
    return 0;
  }

  const weigh = (counts: Map<string, number>, other: Map<string, number>) => {
    const weights = new Map<string, number>();
    for (const [term, count] of counts) {
      const documentFrequency = other.has(term) ? 2 : 1;
      weights.set(term, count * smoothIdf(documentFrequency));
    }
    return weights;
  };

  const leftWeights = weigh(left, right);
  const rightWeights = weigh(right, left);

  let dot = 0;
  for (const [term, weight] of leftWeights) {
    const other = rightWeights.get(term);
    if (other !== undefined) {
      dot += weight * other;
    }
  }
  if (dot === 0) {
    return 0;
  }

  const similarity = dot / (magnitude(leftWeights) * magnitude(rightWeights));
  return Math.min(1, Math.max(0, similarity));
}

function magnitude(weights: Map<string, number>): number {
  let sum = 0;
  for (const weight of weights.values()) {
    sum += weight * weight;
  }
  return Math.sqrt(sum);
}

export function isNearDuplicate(a: string, b: string, threshold = DEFAULT_DUPLICATE_THRESHOLD): boolean {
  return score(a, b) >= threshold;
}

/** Keeps the first of every group of near-identical sentences, preserving order. */
export function removeNearDuplicates(sentences: readonly string[], threshold = DEFAULT_DUPLICATE_THRESHOLD): string[] {
  const kept: string[] = [];
  for (const sentence of sentences) {
    if (!kept.some((existing) => isNearDuplicate(sentence, existing, threshold))) {
      kept.push(sentence);
    }
  }
  return kept;
}
