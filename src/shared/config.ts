import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

/**
 * Raised when the environment carries values that cannot be turned into a
 * {@link MultiSearchConfig}. `issues` lists one line per offending field.
 */
export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid multisearch configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

// Empty strings in .env files mean "not set"
const optionalString = z.preprocess(
  (value) => (value === "" ? undefined : value),
  z.string().optional()
);

const count = (fallback: number) =>
  z.preprocess(
    (value) => (value === "" ? undefined : value),
    z.coerce.number().int().nonnegative().default(fallback)
  );

const EnvSchema = z.object({
  SERPAPI_API_KEY: optionalString,
  SERPER_API_KEY: optionalString,
  SERPAPI_BASE_URL: optionalString.pipe(z.string().url().optional()),
  MULTISEARCH_OUTPUT_DIR: optionalString,
  MULTISEARCH_RATE_LIMIT_MS: count(10_000),
  MULTISEARCH_LOG_FILE: optionalString,
  LOG_LEVEL: z.preprocess(
    (value) => (value === "" ? undefined : value),
    z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info")
  ),
  GOOGLE_RESULTS_NUM: count(10),
  BING_RESULTS_NUM: count(10),
  DUCKDUCKGO_RESULTS_NUM: count(10),
  YAHOO_RESULTS_NUM: count(10),
});

export type LogLevel = z.infer<typeof EnvSchema>["LOG_LEVEL"];

export interface ResultCounts {
  google: number;
  bing: number;
  duckduckgo: number;
  yahoo: number;
}

export interface MultiSearchConfig {
  /** SerpAPI credential; absent means every search returns a MissingCredentialError result. */
  apiKey?: string;
  serpApiBaseUrl: string;
  outputDir: string;
  /** Pause after every engine call, in milliseconds. */
  rateLimitMs: number;
  resultCounts: ResultCounts;
  logFile: string;
  logLevel: LogLevel;
}

export const DEFAULT_OUTPUT_DIR = "./output";
export const DEFAULT_SERPAPI_BASE_URL = "https://serpapi.com/search.json";
export const DEFAULT_LOG_FILE = "search_tool.log";

/**
 * Builds the configuration object from environment variables. Read at call
 * time, so a credential added to the environment later is picked up by the
 * next call.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): MultiSearchConfig => {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  return Object.freeze({
    apiKey: vars.SERPAPI_API_KEY ?? vars.SERPER_API_KEY,
    serpApiBaseUrl: vars.SERPAPI_BASE_URL ?? DEFAULT_SERPAPI_BASE_URL,
    outputDir: vars.MULTISEARCH_OUTPUT_DIR ?? DEFAULT_OUTPUT_DIR,
    rateLimitMs: vars.MULTISEARCH_RATE_LIMIT_MS,
    resultCounts: Object.freeze({
      google: vars.GOOGLE_RESULTS_NUM,
      bing: vars.BING_RESULTS_NUM,
      duckduckgo: vars.DUCKDUCKGO_RESULTS_NUM,
      yahoo: vars.YAHOO_RESULTS_NUM,
    }),
    logFile: vars.MULTISEARCH_LOG_FILE ?? DEFAULT_LOG_FILE,
    logLevel: vars.LOG_LEVEL,
  });
};
