import { tool } from "@langchain/core/tools";
import { z } from "zod";
import { loadConfig, type MultiSearchConfig } from "../shared/config";
import { MultiSearchAggregator, type AggregatorDependencies } from "./aggregator";

export const MULTISEARCH_TOOL_NAME = "multi_engine_search";
export const MULTISEARCH_TOOL_DESCRIPTION =
  "Performs an internet search using multiple search engines and returns structured results.";

const MultiSearchSchema = z.object({
  query: z.string().describe("The search query to run against every configured search engine"),
});

export interface MultiSearchToolOptions extends AggregatorDependencies {
  /** Fixed configuration. When omitted the environment is read on every call. */
  config?: MultiSearchConfig;
}

/**
 * Wraps the aggregator as a LangChain tool taking a single `query` string.
 * The tool's output is the aggregate (or error) result as JSON, and a report
 * block is appended to the configured output directory on every successful call.
 */
export const createMultiSearchTool = (options: MultiSearchToolOptions = {}) => {
  const { config, ...deps } = options;

  return tool(
    async ({ query }) => {
      const aggregator = new MultiSearchAggregator(config ?? loadConfig(), deps);
      const result = await aggregator.aggregate(query, { saveToFile: true });
      return JSON.stringify(result);
    },
    {
      name: MULTISEARCH_TOOL_NAME,
      description: MULTISEARCH_TOOL_DESCRIPTION,
      schema: MultiSearchSchema,
    }
  );
};
