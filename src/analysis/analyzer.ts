import { QuestionAnalysisSchema } from "../parsers/question-schema";
import type { QuestionAnalysis, TemporalContext } from "../parsers/question-schema";
import type { SpecializedCategory } from "../selection/categories";
import { normalize } from "../text/normalizer";

const CATEGORY_PATTERNS: Array<{ category: SpecializedCategory; pattern: RegExp }> = [
  { category: "calculation", pattern: /\b(calcul\w*|quanto e|how much is|\d+\s*[-+*/^x]\s*\d+|raiz|square root|integral|derivad\w*|derivative)\b/ },
  { category: "conversion", pattern: /\b(conver\w*|em (metros|quilos|celsius|fahrenheit|dolares|reais)|in (meters|kilograms|celsius|fahrenheit|dollars|miles))\b/ },
  { category: "comparison", pattern: /\b(diferenca entre|compar\w*|versus|vs|difference between|melhor que|better than)\b/ },
  { category: "process", pattern: /\b(como (fazer|funciona|criar|instalar)|how (to|does)|passo a passo|step by step|tutorial)\b/ },
  { category: "scientific", pattern: /\b(teoria|theory|cientific\w*|scientific|pesquisa|research|estudo|study|quantum|quantic\w*|molecul\w*|particula|particle)\b/ },
  { category: "historical", pattern: /\b(quando (foi|aconteceu|nasceu|morreu)|when (was|did)|historia|history|seculo|century|guerra|war)\b/ },
  { category: "location", pattern: /\b(onde (fica|esta)|where is|localiza\w*|location|capital d[aeo]|capital of)\b/ },
  { category: "list", pattern: /\b(lista\w*|list( of)?|quais sao|what are|exemplos de|examples of)\b/ },
  { category: "current", pattern: /\b(hoje|today|agora|now|atual\w*|current\w*|ultim[ao]s? noticias|latest|recente\w*|recent\w*)\b/ },
  { category: "definition", pattern: /\b(o que e|what is|what's|defin\w*|significado|meaning|quem (e|foi)|who (is|was))\b/ }
];

const QUESTION_TYPES: Array<{ type: string; pattern: RegExp }> = [
  { type: "quanto", pattern: /^(quant[oa]s?|how (many|much))\b/ },
  { type: "porque", pattern: /^(por ?que|why)\b/ },
  { type: "como", pattern: /^(como|how)\b/ },
  { type: "quem", pattern: /^(quem|who)\b/ },
  { type: "qual", pattern: /^(qua(l|is)|which|what)\b/ },
  { type: "onde", pattern: /^(onde|where)\b/ },
  { type: "quando", pattern: /^(quando|when)\b/ }
];

const CURRENT_MARKERS = /\b(hoje|today|agora|now|atual\w*|current\w*|este ano|this year|recente\w*|latest)\b/;
const HISTORICAL_MARKERS = /\b(foi|era|was|were|seculo|century|antig\w*|ancient|histori\w*|\d{3,4} (ac|bc))\b/;

const ENTITY_PATTERN = /(?<![\p{L}\p{N}])\p{Lu}[\p{L}'-]+(?:\s+(?:de|da|do|of|the)?\s*\p{Lu}[\p{L}'-]+)*/gu;
const SPLIT_CONJUNCTIONS = /\s+(?:e|and|ou|or)\s+(?=(?:o que|qual|quem|como|onde|quando|what|which|who|how|where|when)\b)/i;

/** Keyword and pattern analysis; no model involved. */
export function analyzeQuestion(text: string): QuestionAnalysis {
  const trimmed = text.trim();
  const normalized = normalize(trimmed);

  return QuestionAnalysisSchema.parse({
    category: detectCategory(normalized),
    questionType: detectQuestionType(normalized),
    subQuestions: splitSubQuestions(trimmed),
    entities: extractEntities(trimmed),
    temporalContext: detectTemporalContext(normalized)
  });
}

export function detectCategory(normalized: string): SpecializedCategory | "general" {
  return CATEGORY_PATTERNS.find(({ pattern }) => pattern.test(normalized))?.category ?? "general";
}

export function detectQuestionType(normalized: string): string {
  const stripped = normalized.replace(/^[^\p{L}\p{N}]+/u, "");
  return QUESTION_TYPES.find(({ pattern }) => pattern.test(stripped))?.type ?? "geral";
}

function detectTemporalContext(normalized: string): TemporalContext {
  if (CURRENT_MARKERS.test(normalized)) return "current";
  if (HISTORICAL_MARKERS.test(normalized)) return "historical";
  return "neutral";
}

function extractEntities(text: string): Record<string, string[]> {
  // The first word of a sentence is capitalized regardless, so it only counts when followed by more capitals.
  const matches = Array.from(text.matchAll(ENTITY_PATTERN), (match) => ({ value: match[0].trim(), index: match.index ?? 0 }));
  const values = matches
    .filter(({ value, index }) => index > 0 || value.includes(" "))
    .map(({ value, index }) => (index === 0 ? value.split(/\s+/).slice(1).join(" ") : value))
    .filter((value) => value.length > 1);
  const unique = Array.from(new Set(values));
  return unique.length > 0 ? { MISC: unique } : {};
}

function splitSubQuestions(text: string): string[] {
  const parts = text
    .split(SPLIT_CONJUNCTIONS)
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
  return parts.length > 1 ? parts : [];
}
