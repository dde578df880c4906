import { ProviderUnavailableError } from "../errors";
import { describeError } from "../logger";
import type { ProviderHttp } from "../utils";
import { BaseAdapter } from "./adapter";

const ENDPOINTS = ["https://api.wolframalpha.com/v1/result", "https://api.wolframalpha.com/v1/spoken"];

const PLACEHOLDERS = ["did not understand", "no short answer available", "no spoken result available"];

export function isPlausibleWolframAnswer(text: string): boolean {
  const trimmed = text.trim();
  if (trimmed.length <= 10) {
    return false;
  }
  const lower = trimmed.toLowerCase();
  return !PLACEHOLDERS.some((placeholder) => lower.includes(placeholder));
}

/** Short-answer and spoken-answer endpoints, tried in that order. */
export class WolframAdapter extends BaseAdapter {
  readonly name = "wolfram";

  readonly timeoutSeconds = 5;

  constructor(
    http: ProviderHttp,
    private readonly appId: string | undefined
  ) {
    super(http);
  }

  protected async lookup(query: string, timeoutMs: number): Promise<string | null> {
    if (!this.appId) {
      throw new ProviderUnavailableError(this.name, "WOLFRAM_APP_ID is not configured");
    }

    for (const endpoint of ENDPOINTS) {
      try {
        const text = await this.http.getText(endpoint, {
          params: { appid: this.appId, i: query },
          timeoutMs
        });
        if (isPlausibleWolframAnswer(text)) {
          return text.trim();
        }
      } catch (error) {
        // 501 on the short-answer endpoint still leaves the spoken one to try.
        this.log.debug("Wolfram endpoint failed", { endpoint, error: describeError(error) });
      }
    }
    return null;
  }
}
