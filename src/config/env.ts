import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const positiveNumber = (fallback: number) => z.coerce.number().positive().default(fallback);

const EnvSchema = z.object({
  PORT: positiveInt(3000),
  WOLFRAM_APP_ID: optionalString,
  GOOGLE_CX: optionalString,
  GOOGLE_API_KEY: optionalString,
  YOUTUBE_API_KEY: optionalString,
  TRANSCRIPT_SERVICE_URL: optionalString,
  FANOUT_MAX_SOURCES: positiveInt(5),
  FANOUT_MAX_CONCURRENCY: positiveInt(5),
  FANOUT_SOURCE_TIMEOUT_SECONDS: positiveNumber(10),
  FANOUT_OVERALL_TIMEOUT_SECONDS: positiveNumber(20),
  FANOUT_EARLY_STOP: positiveInt(2),
  FANOUT_SUBSTANTIAL_LENGTH: z.coerce.number().int().nonnegative().default(100),
  FUSION_MAX_SENTENCES: positiveInt(6),
  CACHE_MAX_ENTRIES: positiveInt(200),
  CACHE_TTL_SECONDS: positiveNumber(3600),
  CONTEXT_SIZE: positiveInt(10)
});

export interface ProviderCredentials {
  wolframAppId?: string;
  googleCx?: string;
  googleApiKey?: string;
  youtubeApiKey?: string;
  transcriptServiceUrl?: string;
}

export interface FanoutSettings {
  maxSources: number;
  maxConcurrency: number;
  perSourceTimeoutSeconds: number;
  overallTimeoutSeconds: number;
  earlyStopThreshold: number;
  substantialLength: number;
}

export interface AppConfig {
  port: number;
  credentials: ProviderCredentials;
  fanout: FanoutSettings;
  fusion: { maxSentences: number };
  cache: { maxEntries: number; ttlSeconds: number };
  contextSize: number;
}

function blankToUndefined(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const cleaned: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(env)) {
    cleaned[key] = value === "" ? undefined : value;
  }
  return cleaned;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(blankToUndefined(env));
  if (!result.success) {
    throw new Error(`Invalid environment configuration: ${JSON.stringify(result.error.format())}`);
  }
  const parsed = result.data;

  return {
    port: parsed.PORT,
    credentials: {
      wolframAppId: parsed.WOLFRAM_APP_ID,
      googleCx: parsed.GOOGLE_CX,
      googleApiKey: parsed.GOOGLE_API_KEY,
      youtubeApiKey: parsed.YOUTUBE_API_KEY,
      transcriptServiceUrl: parsed.TRANSCRIPT_SERVICE_URL
    },
    fanout: {
      maxSources: parsed.FANOUT_MAX_SOURCES,
      maxConcurrency: parsed.FANOUT_MAX_CONCURRENCY,
      perSourceTimeoutSeconds: parsed.FANOUT_SOURCE_TIMEOUT_SECONDS,
      overallTimeoutSeconds: parsed.FANOUT_OVERALL_TIMEOUT_SECONDS,
      earlyStopThreshold: parsed.FANOUT_EARLY_STOP,
      substantialLength: parsed.FANOUT_SUBSTANTIAL_LENGTH
    },
    fusion: { maxSentences: parsed.FUSION_MAX_SENTENCES },
    cache: { maxEntries: parsed.CACHE_MAX_ENTRIES, ttlSeconds: parsed.CACHE_TTL_SECONDS },
    contextSize: parsed.CONTEXT_SIZE
  } satisfies AppConfig;
}
