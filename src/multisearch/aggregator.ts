import type { MultiSearchConfig } from "../shared/config";
import { errorMessage, getDefaultLogger, type Logger } from "../shared/logger";
import { buildEngineRequests, buildSearchParams, targetResultCount } from "./engines";
import { citeSources, extractOrganicResults, padResults } from "./normalize";
import { appendReport } from "./report";
import { SerpApiProvider } from "./searchProvider";
import type {
  AggregateOptions,
  AggregateOutcome,
  EngineRequest,
  SearchProvider,
  SearchResult,
} from "./types";

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface AggregatorDependencies {
  provider?: SearchProvider;
  logger?: Logger;
  sleep?: Sleep;
}

/**
 * Queries every configured engine one after another and folds the hits into
 * a fixed-length result list.
 *
 * An engine that fails contributes nothing, exactly like an engine that found
 * nothing; both show up as placeholder padding in the output.
 */
export class MultiSearchAggregator {
  private readonly provider: SearchProvider;
  private readonly logger: Logger;
  private readonly sleep: Sleep;

  constructor(
    private readonly config: MultiSearchConfig,
    deps: AggregatorDependencies = {}
  ) {
    this.provider = deps.provider ?? new SerpApiProvider({ baseUrl: config.serpApiBaseUrl });
    this.logger = (deps.logger ?? getDefaultLogger()).child({ component: "aggregator" });
    this.sleep = deps.sleep ?? defaultSleep;
  }

  async aggregate(query: string, options: AggregateOptions = {}): Promise<AggregateOutcome> {
    const outputDir = options.outputDir ?? this.config.outputDir;
    const saveToFile = options.saveToFile ?? true;

    this.logger.info({ query }, "Starting search");

    if (query.trim().length === 0) {
      return { error: "Query parameter is required and must not be blank", errorType: "InvalidInputError" };
    }

    const apiKey = this.config.apiKey;
    if (!apiKey) {
      this.logger.error("API key is missing");
      return { error: "API key is required", errorType: "MissingCredentialError" };
    }

    const requests = buildEngineRequests(this.config.resultCounts);
    const combined: SearchResult[] = [];

    for (const request of requests) {
      combined.push(...(await this.searchEngine(request, query, apiKey)));
      await this.sleep(this.config.rateLimitMs);
    }

    const searchResults = padResults(combined, targetResultCount(requests));
    const result = { searchResults, citedSources: citeSources(searchResults) };

    if (saveToFile) {
      const filePath = await appendReport(searchResults, outputDir);
      this.logger.info({ filePath }, "Saved search results");
    }

    this.logger.info({ realResults: combined.length, returned: searchResults.length }, "Search completed successfully");
    return result;
  }

  private async searchEngine(request: EngineRequest, query: string, apiKey: string): Promise<SearchResult[]> {
    try {
      const response = await this.provider.search(buildSearchParams(request, query, apiKey));
      const results = extractOrganicResults(response);
      this.logger.info({ engine: request.engineName, results: results.length }, "Engine search finished");
      return results;
    } catch (error) {
      this.logger.error(
        { engine: request.engineName, error: errorMessage(error) },
        "Failed to retrieve search results"
      );
      return [];
    }
  }
}
