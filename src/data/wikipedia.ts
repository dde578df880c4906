import { z } from "zod";
import { describeError } from "../logger";
import { BaseAdapter } from "./adapter";

const SEARCH_URL = "https://en.wikipedia.org/w/api.php";
const SUMMARY_URL = "https://en.wikipedia.org/api/rest_v1/page/summary/";
const MIN_EXTRACT_LENGTH = 100;

const QUESTION_PREFIXES = ["what is", "who is", "who was", "when was", "where is", "how does", "why is"];

const SearchSchema = z.object({
  query: z
    .object({
      search: z.array(z.object({ title: z.string() }))
    })
    .optional()
});

const SummarySchema = z.object({ extract: z.string().optional() });

export function toSearchTerm(question: string): string {
  let term = question.toLowerCase();
  for (const prefix of QUESTION_PREFIXES) {
    term = term.replace(prefix, "");
  }
  return term.replace(/[?!.]+$/g, "").trim();
}

/** Title search followed by the REST summary of the best matches. */
export class WikipediaAdapter extends BaseAdapter {
  readonly name = "wikipedia";

  readonly timeoutSeconds = 7;

  protected async lookup(query: string, timeoutMs: number): Promise<string | null> {
    const term = toSearchTerm(query);
    if (!term) {
      return null;
    }

    const search = SearchSchema.parse(
      await this.http.getJson(SEARCH_URL, {
        params: { action: "query", list: "search", srsearch: term, format: "json", srlimit: 3 },
        timeoutMs
      })
    );

    const titles = (search.query?.search ?? []).slice(0, 2).map((hit) => hit.title);
    for (const title of titles) {
      const summary = SummarySchema.safeParse(
        await this.http
          .getJson(`${SUMMARY_URL}${encodeURIComponent(title.replace(/ /g, "_"))}`, { timeoutMs })
          .catch((error: unknown) => {
            this.log.debug("Summary unavailable", { title, error: describeError(error) });
            return null;
          })
      );
      const extract = summary.success ? summary.data.extract?.trim() ?? "" : "";
      if (extract.length > MIN_EXTRACT_LENGTH) {
        return extract;
      }
    }
    return null;
  }
}
