import Parser from "rss-parser";
import { BaseAdapter, collapseWhitespace } from "./adapter";

const QUERY_URL = "https://export.arxiv.org/api/query";
const MIN_SUMMARY_LENGTH = 100;

/** Atom feed of the academic-paper index, parsed with rss-parser. */
export class ArxivAdapter extends BaseAdapter {
  readonly name = "arxiv";

  readonly timeoutSeconds = 10;

  private readonly parser = new Parser<Record<string, unknown>, { summary?: string }>();

  protected async lookup(query: string, timeoutMs: number): Promise<string | null> {
    const xml = await this.http.getText(QUERY_URL, {
      params: { search_query: `all:${query}`, start: 0, max_results: 3 },
      timeoutMs
    });

    const feed = await this.parser.parseString(xml);
    const summaries = feed.items
      .map((entry) => collapseWhitespace(entry.summary ?? entry.contentSnippet ?? ""))
      .filter((summary) => summary.length > MIN_SUMMARY_LENGTH);

    return summaries.length > 0 ? summaries.slice(0, 2).join(" ") : null;
  }
}
