import { logger } from "../logger";
import { clean, joinSentences, splitSentences } from "../text/normalizer";
import { removeNearDuplicates, score } from "../text/relevance";
import type { FusedAnswer, RankedCandidate } from "../types";
import { resolveStrategy } from "./strategy";

const log = logger.child({ component: "fusion" });

export const MIN_RESULT_LENGTH = 10;
export const DEFAULT_MAX_SENTENCES = 6;
const MIN_FUSED_SENTENCE_LENGTH = 20;
const MAX_DIGIT_RATIO = 0.3;

export interface FuseOptions {
  maxSentences?: number;
}

/** Usable results ranked by relevance to the question, highest first; ties keep input order. */
export function rankCandidates<S extends string>(
  results: ReadonlyMap<S, string | null | undefined>,
  question: string
): RankedCandidate<S>[] {
  return usableResults(results)
    .map(({ source, text }) => ({ source, text, relevance: score(text, question) }))
    .sort((a, b) => b.relevance - a.relevance);
}

/** Up to max sentences of text, picked by relevance and returned in their original order. */
export function extractRelevantSentences(text: string, question: string, max: number): string[] {
  const sentences = splitSentences(text);
  if (sentences.length <= max) {
    return sentences;
  }
  return sentences
    .map((sentence, index) => ({ sentence, index, relevance: score(sentence, question) }))
    .sort((a, b) => b.relevance - a.relevance)
    .slice(0, max)
    .sort((a, b) => a.index - b.index)
    .map(({ sentence }) => sentence);
}

/**
 * Merges per-source answers into one. Returns null when nothing usable
 * remains after filtering.
 */
export function fuse<S extends string>(
  results: ReadonlyMap<S, string | null | undefined>,
  question: string,
  category: string,
  options: FuseOptions = {}
): FusedAnswer<S> | null {
  const maxSentences = options.maxSentences ?? DEFAULT_MAX_SENTENCES;
  const usable = usableResults(results);

  if (usable.length === 0) {
    log.debug("No usable results to fuse", { question });
    return null;
  }

  if (usable.length === 1) {
    const [only] = usable;
    const text = joinSentences(extractRelevantSentences(only.text, question, maxSentences));
    if (!text) {
      return null;
    }
    return { text, contributingSources: [only.source], source: only.source, strategy: "single" };
  }

  const ranked = rankCandidates(results, question);
  const profile = resolveStrategy(category);
  const pool = ranked.slice(0, profile.poolSize).filter((candidate) => candidate.relevance > profile.relevanceFloor);

  log.debug("Fusion ranking", {
    strategy: profile.strategy,
    ranking: ranked.map(({ source, relevance }) => ({ source, relevance: Number(relevance.toFixed(4)) }))
  });

  if (pool.length === 0) {
    return null;
  }

  let sentences: string[];
  if (profile.strategy === "factual") {
    sentences = extractRelevantSentences(pool[0].text, question, maxSentences);
  } else {
    const gathered = pool.flatMap((candidate) =>
      extractRelevantSentences(candidate.text, question, profile.sentencesPerSource)
    );
    sentences = removeNearDuplicates(gathered, profile.duplicateThreshold).slice(0, maxSentences);
  }

  const finalSentences = postProcess(sentences);
  if (finalSentences.length === 0) {
    return null;
  }

  const contributingSources = pool.map((candidate) => candidate.source);
  return {
    text: joinSentences(finalSentences),
    contributingSources,
    source: contributingSources.join("+"),
    strategy: profile.strategy
  };
}

/** Re-cleans the pooled text and drops numeric noise, fragments and symbol-led lines. */
export function postProcess(sentences: readonly string[]): string[] {
  const combined = clean(joinSentences(sentences));
  return splitSentences(combined).filter((sentence) => {
    if (sentence.length < MIN_FUSED_SENTENCE_LENGTH) return false;
    if (!/^[\p{L}\p{N}]/u.test(sentence)) return false;
    const digits = sentence.replace(/\D/g, "").length;
    return digits / sentence.length <= MAX_DIGIT_RATIO;
  });
}

function usableResults<S extends string>(results: ReadonlyMap<S, string | null | undefined>): Array<{ source: S; text: string }> {
  const usable: Array<{ source: S; text: string }> = [];
  for (const [source, text] of results) {
    if (typeof text === "string" && text.trim().length >= MIN_RESULT_LENGTH) {
      usable.push({ source, text });
    }
  }
  return usable;
}
