import { z } from "zod";
import { ProviderUnavailableError } from "../errors";
import { describeError } from "../logger";
import type { ProviderHttp } from "../utils";
import { BaseAdapter, collapseWhitespace } from "./adapter";

const SEARCH_URL = "https://www.googleapis.com/youtube/v3/search";
const MAX_SEGMENTS = 20;
const MIN_TRANSCRIPT_LENGTH = 100;

const SearchSchema = z.object({
  items: z
    .array(
      z.object({
        id: z.object({ videoId: z.string().optional() }).passthrough()
      })
    )
    .optional()
});

const TranscriptSchema = z.union([
  z.array(z.object({ text: z.string() }).passthrough()),
  z.object({ segments: z.array(z.object({ text: z.string() }).passthrough()) }).transform((value) => value.segments)
]);

export interface YoutubeCredentials {
  apiKey?: string;
  /** Base URL of a service answering GET {base}/{videoId} with transcript segments. */
  transcriptServiceUrl?: string;
}

/** Video search followed by transcript lookup for each hit, in order. */
export class YoutubeAdapter extends BaseAdapter {
  readonly name = "youtube";

  readonly timeoutSeconds = 10;

  constructor(
    http: ProviderHttp,
    private readonly credentials: YoutubeCredentials
  ) {
    super(http);
  }

  protected async lookup(query: string, timeoutMs: number): Promise<string | null> {
    const { apiKey, transcriptServiceUrl } = this.credentials;
    if (!apiKey || !transcriptServiceUrl) {
      throw new ProviderUnavailableError(this.name, "YOUTUBE_API_KEY and TRANSCRIPT_SERVICE_URL are required");
    }

    const search = SearchSchema.parse(
      await this.http.getJson(SEARCH_URL, {
        params: {
          key: apiKey,
          part: "id",
          type: "video",
          maxResults: 3,
          q: `${query} tutorial explanation`
        },
        timeoutMs
      })
    );

    const videoIds = (search.items ?? []).flatMap((item) => (item.id.videoId ? [item.id.videoId] : []));
    const base = transcriptServiceUrl.replace(/\/$/, "");

    for (const videoId of videoIds) {
      const transcript = TranscriptSchema.safeParse(
        await this.http.getJson(`${base}/${encodeURIComponent(videoId)}`, { timeoutMs }).catch((error: unknown) => {
          this.log.debug("Transcript unavailable", { videoId, error: describeError(error) });
          return null;
        })
      );
      if (!transcript.success) continue;
      const text = collapseWhitespace(
        transcript.data
          .slice(0, MAX_SEGMENTS)
          .map((segment) => segment.text)
          .join(" ")
      );
      if (text.length > MIN_TRANSCRIPT_LENGTH) {
        return text;
      }
    }
    return null;
  }
}
