import { z } from "zod";
import { BaseAdapter } from "./adapter";

const INSTANT_ANSWER_URL = "https://api.duckduckgo.com/";
const MIN_LENGTH = 50;

const RelatedTopicSchema = z.object({ Text: z.string().optional() }).passthrough();

const InstantAnswerSchema = z.object({
  AbstractText: z.string().optional(),
  Definition: z.string().optional(),
  RelatedTopics: z.array(RelatedTopicSchema).optional()
});

export class DuckDuckGoAdapter extends BaseAdapter {
  readonly name = "duckduckgo";

  readonly timeoutSeconds = 7;

  protected async lookup(query: string, timeoutMs: number): Promise<string | null> {
    const payload = InstantAnswerSchema.parse(
      await this.http.getJson(INSTANT_ANSWER_URL, {
        params: { q: query, format: "json", no_html: 1, skip_disambig: 1 },
        timeoutMs
      })
    );

    const abstract = payload.AbstractText?.trim() ?? "";
    if (abstract.length > MIN_LENGTH) {
      return abstract;
    }
    const definition = payload.Definition?.trim() ?? "";
    if (definition.length > MIN_LENGTH) {
      return definition;
    }

    const related = (payload.RelatedTopics ?? [])
      .slice(0, 3)
      .map((topic) => topic.Text?.trim() ?? "")
      .filter((text) => text.length > MIN_LENGTH);
    return related.length > 0 ? related.slice(0, 2).join(" ") : null;
  }
}
