import { splitSentences } from "../text/normalizer";
import { tokenize } from "../text/relevance";

const APOLOGY_MARKERS = ["desculpe", "não sei", "nao sei", "sorry", "i don't know", "i do not know"];

/**
 * Heuristic quality of an answer in [0, 1]: length, sentence structure,
 * vocabulary shared with the question, and the absence of apologies.
 */
export function assessAnswerQuality(question: string, answer: string): number {
  let quality = 0;
  const length = answer.trim().length;

  if (length >= 50 && length <= 1000) {
    quality += 0.3;
  } else if (length >= 30) {
    quality += 0.1;
  }

  const sentenceCount = splitSentences(answer).length;
  if (sentenceCount >= 2) {
    quality += 0.3;
  } else if (sentenceCount === 1) {
    quality += 0.1;
  }

  const questionWords = new Set(tokenize(question));
  if (questionWords.size > 0) {
    const answerWords = new Set(tokenize(answer));
    let overlap = 0;
    for (const word of questionWords) {
      if (answerWords.has(word)) overlap += 1;
    }
    quality += (overlap / questionWords.size) * 0.2;
  }

  const lower = answer.toLowerCase();
  if (!APOLOGY_MARKERS.some((marker) => lower.includes(marker))) {
    quality += 0.2;
  }

  return Math.min(1, quality);
}
