import type { ProviderCredentials } from "../config/env";
import { SOURCE_NAMES } from "../types";
import type { SourceName } from "../types";
import type { ProviderHttp } from "../utils";
import type { SourceAdapter } from "./adapter";
import { ArxivAdapter } from "./arxiv";
import { DbpediaAdapter } from "./dbpedia";
import { DuckDuckGoAdapter } from "./duckduckgo";
import { GoogleAdapter } from "./google";
import { WikipediaAdapter } from "./wikipedia";
import { WolframAdapter } from "./wolfram";
import { YoutubeAdapter } from "./youtube";

/** Ordered, explicit set of adapters keyed by source name. */
export class SourceRegistry {
  private readonly adapters = new Map<SourceName, SourceAdapter>();

  constructor(adapters: readonly SourceAdapter[] = []) {
    for (const adapter of adapters) {
      this.register(adapter);
    }
  }

  register(adapter: SourceAdapter): this {
    this.adapters.set(adapter.name, adapter);
    return this;
  }

  get(name: SourceName): SourceAdapter | undefined {
    return this.adapters.get(name);
  }

  has(name: SourceName): boolean {
    return this.adapters.has(name);
  }

  /** Registered names, in registration order. */
  names(): SourceName[] {
    return Array.from(this.adapters.keys());
  }

  /** Adapters for the given names, in the given order, skipping unknown and repeated names. */
  resolve(names: readonly SourceName[]): SourceAdapter[] {
    const seen = new Set<SourceName>();
    const resolved: SourceAdapter[] = [];
    for (const name of names) {
      const adapter = this.adapters.get(name);
      if (!adapter || seen.has(name)) continue;
      seen.add(name);
      resolved.push(adapter);
    }
    return resolved;
  }
}

export function createDefaultRegistry(credentials: ProviderCredentials, http: ProviderHttp): SourceRegistry {
  const byName: Record<SourceName, SourceAdapter> = {
    wolfram: new WolframAdapter(http, credentials.wolframAppId),
    google: new GoogleAdapter(http, { cx: credentials.googleCx, apiKey: credentials.googleApiKey }),
    duckduckgo: new DuckDuckGoAdapter(http),
    wikipedia: new WikipediaAdapter(http),
    arxiv: new ArxivAdapter(http),
    dbpedia: new DbpediaAdapter(http),
    youtube: new YoutubeAdapter(http, {
      apiKey: credentials.youtubeApiKey,
      transcriptServiceUrl: credentials.transcriptServiceUrl
    })
  };
  return new SourceRegistry(SOURCE_NAMES.map((name) => byName[name]));
}
