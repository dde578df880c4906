import { z } from "zod";
import { ProviderUnavailableError } from "../errors";
import type { ProviderHttp } from "../utils";
import { BaseAdapter } from "./adapter";

const SEARCH_URL = "https://www.googleapis.com/customsearch/v1";

const SearchResponseSchema = z.object({
  items: z.array(z.object({ snippet: z.string().optional() })).optional()
});

export class GoogleAdapter extends BaseAdapter {
  readonly name = "google";

  readonly timeoutSeconds = 5;

  constructor(
    http: ProviderHttp,
    private readonly credentials: { cx?: string; apiKey?: string }
  ) {
    super(http);
  }

  protected async lookup(query: string, timeoutMs: number): Promise<string | null> {
    const { cx, apiKey } = this.credentials;
    if (!cx || !apiKey) {
      throw new ProviderUnavailableError(this.name, "GOOGLE_CX and GOOGLE_API_KEY are required");
    }

    const payload = SearchResponseSchema.parse(
      await this.http.getJson(SEARCH_URL, {
        params: { key: apiKey, cx, q: query, num: 3 },
        timeoutMs
      })
    );

    const snippets = (payload.items ?? [])
      .slice(0, 3)
      .map((item) => item.snippet?.trim() ?? "")
      .filter((snippet) => snippet.length > 0);
    return snippets.length > 0 ? snippets.join(" ") : null;
  }
}
