import type { ResultCounts } from "../shared/config";
import type { EngineDefinition, EngineRequest, SearchParams } from "./types";

// Queried in this order
export const ENGINE_DEFINITIONS: readonly EngineDefinition[] = [
  { engineName: "google", queryField: "q", extraParams: {} },
  { engineName: "bing", queryField: "q", extraParams: {} },
  { engineName: "duckduckgo", queryField: "q", extraParams: { kl: "us-en" } },
  { engineName: "yahoo", queryField: "p", extraParams: {} },
];

export const buildEngineRequests = (
  counts: ResultCounts,
  definitions: readonly EngineDefinition[] = ENGINE_DEFINITIONS
): EngineRequest[] =>
  definitions.map((definition) =>
    Object.freeze({
      ...definition,
      extraParams: Object.freeze({ ...definition.extraParams }),
      resultCount: counts[definition.engineName],
    })
  );

export const buildSearchParams = (
  request: EngineRequest,
  query: string,
  apiKey: string
): SearchParams => ({
  engine: request.engineName,
  [request.queryField]: query,
  ...request.extraParams,
  api_key: apiKey,
  num: request.resultCount,
});

/** Length every aggregate result is padded or truncated to. */
export const targetResultCount = (requests: readonly EngineRequest[]): number =>
  requests.reduce((total, request) => total + request.resultCount, 0);
