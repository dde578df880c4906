import type { SourceName } from "../types";

export const SPECIALIZED_CATEGORIES = [
  "calculation",
  "conversion",
  "definition",
  "historical",
  "scientific",
  "process",
  "location",
  "comparison",
  "list",
  "current"
] as const;

export type SpecializedCategory = (typeof SPECIALIZED_CATEGORIES)[number];

export const CATEGORY_SOURCES: Record<SpecializedCategory, readonly SourceName[]> = {
  calculation: ["wolfram"],
  conversion: ["wolfram", "google"],
  definition: ["wikipedia", "duckduckgo", "google"],
  historical: ["wikipedia", "google", "duckduckgo"],
  scientific: ["arxiv", "wikipedia", "google"],
  process: ["youtube", "wikipedia", "google"],
  location: ["google", "wikipedia"],
  comparison: ["google", "wikipedia"],
  list: ["wikipedia", "google"],
  current: ["google", "duckduckgo"]
};

const CATEGORY_ALIASES: Record<string, SpecializedCategory> = {
  calculo: "calculation",
  conversao: "conversion",
  definicao: "definition",
  historico: "historical",
  history: "historical",
  cientifico: "scientific",
  science: "scientific",
  processo: "process",
  "how-to": "process",
  localizacao: "location",
  comparacao: "comparison",
  lista: "list",
  atual: "current",
  news: "current"
};

export function toSpecializedCategory(category: string): SpecializedCategory | null {
  const key = category
    .normalize("NFKD")
    .replace(/\p{M}/gu, "")
    .trim()
    .toLowerCase();
  const direct = SPECIALIZED_CATEGORIES.find((candidate) => candidate === key);
  return direct ?? CATEGORY_ALIASES[key] ?? null;
}
