import { z } from "zod";
import { BaseAdapter } from "./adapter";

const DATA_URL = "https://dbpedia.org/data/";
const ABSTRACT_PROPERTY = "http://dbpedia.org/ontology/abstract";
const MIN_ABSTRACT_LENGTH = 100;

const QUESTION_WORDS = new Set(["what", "who", "when", "where", "why", "how", "which", "qual", "quem", "quando", "onde", "como", "porque"]);

const LiteralSchema = z.object({
  value: z.unknown(),
  lang: z.string().optional()
});

const ResourceSchema = z.record(z.string(), z.record(z.string(), z.array(LiteralSchema)));

/** Resource name built from the first two capitalized words, e.g. "Albert_Einstein". */
export function toEntityName(query: string): string | null {
  const words = query
    .split(/\s+/)
    .map((word) => word.replace(/[^\p{L}\p{N}'-]/gu, ""))
    .filter((word) => word.length > 2 && /^\p{Lu}/u.test(word) && !QUESTION_WORDS.has(word.toLowerCase()));
  return words.length > 0 ? words.slice(0, 2).join("_") : null;
}

export class DbpediaAdapter extends BaseAdapter {
  readonly name = "dbpedia";

  readonly timeoutSeconds = 5;

  protected async lookup(query: string, timeoutMs: number): Promise<string | null> {
    const entity = toEntityName(query);
    if (!entity) {
      return null;
    }

    const resource = ResourceSchema.parse(
      await this.http.getJson(`${DATA_URL}${encodeURIComponent(entity)}.json`, { timeoutMs })
    );

    for (const properties of Object.values(resource)) {
      for (const literal of properties[ABSTRACT_PROPERTY] ?? []) {
        if (literal.lang === "en" && typeof literal.value === "string" && literal.value.trim().length > MIN_ABSTRACT_LENGTH) {
          return literal.value.trim();
        }
      }
    }
    return null;
  }
}
