import type { QuestionAnalysis } from "../parsers/question-schema";
import { SOURCE_NAMES } from "../types";
import type { SourceName } from "../types";
import { CATEGORY_SOURCES, toSpecializedCategory } from "./categories";

export const MAX_QUERIES = 5;

const TEMPORAL_FALLBACKS: Record<"current" | "historical", readonly SourceName[]> = {
  current: ["google", "duckduckgo", "wikipedia"],
  historical: ["wikipedia", "google"]
};

const ENTITY_PREFERENCE = ["MISC", "PERSON", "ORG", "LOC"];

/** Ordered sources for a question: category mapping, then temporal context, then every source. */
export function selectSources(
  analysis: Pick<QuestionAnalysis, "category" | "temporalContext">,
  available: readonly SourceName[] = SOURCE_NAMES
): SourceName[] {
  const category = toSpecializedCategory(analysis.category);
  let preferred: readonly SourceName[];
  if (category) {
    preferred = CATEGORY_SOURCES[category];
  } else if (analysis.temporalContext === "current" || analysis.temporalContext === "historical") {
    preferred = TEMPORAL_FALLBACKS[analysis.temporalContext];
  } else {
    preferred = available;
  }
  const filtered = preferred.filter((source) => available.includes(source));
  return filtered.length > 0 ? filtered : [...available];
}

/** The original question plus reformulations, without duplicates, capped at MAX_QUERIES. */
export function selectQueries(
  question: string,
  analysis: Pick<QuestionAnalysis, "category" | "entities" | "subQuestions">
): string[] {
  const queries = [question];
  const category = toSpecializedCategory(analysis.category);

  if (category === "definition") {
    const entity = primaryEntity(analysis.entities);
    if (entity) {
      queries.push(`what is ${entity}`, `${entity} definition`, `${entity} meaning`);
    }
  }

  if (category === "comparison") {
    const parts = question
      .replace(/ e /g, " and ")
      .split(" and ")
      .map((part) => part.trim())
      .filter((part) => part.length > 0);
    if (parts.length === 2) {
      queries.push(...parts);
    }
  }

  if (analysis.subQuestions.length > 1) {
    queries.push(...analysis.subQuestions);
  }

  return Array.from(new Set(queries)).slice(0, MAX_QUERIES);
}

function primaryEntity(entities: Record<string, string[]>): string | null {
  const ordered = [
    ...ENTITY_PREFERENCE,
    ...Object.keys(entities).filter((type) => !ENTITY_PREFERENCE.includes(type))
  ];
  for (const type of ordered) {
    const first = entities[type]?.find((value) => value.trim().length > 0);
    if (first) {
      return first.trim();
    }
  }
  return null;
}
