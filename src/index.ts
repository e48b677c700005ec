export { MultiSearchAggregator } from "./multisearch/aggregator";
export type { AggregatorDependencies, Sleep } from "./multisearch/aggregator";
export { ENGINE_DEFINITIONS, buildEngineRequests, buildSearchParams, targetResultCount } from "./multisearch/engines";
export { PLACEHOLDER_RESULT, citeSources, extractOrganicResults, normalizeResult, padResults } from "./multisearch/normalize";
export { REPORT_FILE_NAME, appendReport, formatReport, formatResult } from "./multisearch/report";
export { SearchProviderError, SerpApiProvider } from "./multisearch/searchProvider";
export type { SerpApiProviderOptions } from "./multisearch/searchProvider";
export { MULTISEARCH_TOOL_DESCRIPTION, MULTISEARCH_TOOL_NAME, createMultiSearchTool } from "./multisearch/tool";
export type { MultiSearchToolOptions } from "./multisearch/tool";
export { isErrorResult } from "./multisearch/types";
export type {
  AggregateOptions,
  AggregateOutcome,
  AggregateResult,
  CitedSource,
  EngineDefinition,
  EngineName,
  EngineRequest,
  ErrorResult,
  ErrorType,
  RawSearchResponse,
  SearchParams,
  SearchProvider,
  SearchResult,
} from "./multisearch/types";
export { ConfigError, loadConfig } from "./shared/config";
export type { LogLevel, MultiSearchConfig, ResultCounts } from "./shared/config";
export { createLogger, getDefaultLogger } from "./shared/logger";
export type { Logger } from "./shared/logger";
