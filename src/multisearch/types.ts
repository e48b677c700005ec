/**
 * One normalized search hit. Every field is best-effort: a backend that does
 * not report an author (most don't) leaves it undefined.
 */
export interface SearchResult {
  title?: string;
  link?: string;
  date?: string;
  author?: string;
  snippet?: string;
}

export interface CitedSource {
  title?: string;
  url?: string;
}

export type EngineName = "google" | "bing" | "duckduckgo" | "yahoo";

/** Static description of how a backend is queried. */
export interface EngineDefinition {
  engineName: EngineName;
  /** Name of the parameter carrying the query text ("q" for most engines, "p" for Yahoo). */
  queryField: string;
  extraParams: Readonly<Record<string, string>>;
}

export interface EngineRequest extends EngineDefinition {
  resultCount: number;
}

/** Parameter mapping handed to a {@link SearchProvider}. */
export interface SearchParams {
  engine: string;
  api_key: string;
  num: number;
  [param: string]: string | number;
}

/** Loosely typed provider payload; only `organic_results` is read. */
export type RawSearchResponse = Record<string, unknown>;

export interface SearchProvider {
  search(params: SearchParams): Promise<RawSearchResponse>;
}

export interface AggregateResult {
  searchResults: SearchResult[];
  citedSources: CitedSource[];
}

export type ErrorType = "InvalidInputError" | "MissingCredentialError";

export interface ErrorResult {
  error: string;
  errorType: ErrorType;
}

export type AggregateOutcome = AggregateResult | ErrorResult;

export const isErrorResult = (value: AggregateOutcome): value is ErrorResult =>
  "error" in value;

export interface AggregateOptions {
  outputDir?: string;
  saveToFile?: boolean;
}
