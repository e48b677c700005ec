/**
 * One-shot multi-engine search from the command line.
 *
 *   npm run example:search -- "rust vs go performance"
 *
 * Prints the aggregate result as JSON and appends the report to
 * $MULTISEARCH_OUTPUT_DIR/search_results.md (./output by default).
 */

import { MultiSearchAggregator } from "../../multisearch/aggregator";
import { isErrorResult } from "../../multisearch/types";
import { loadConfig } from "../../shared/config";

async function main() {
  const query = process.argv.slice(2).join(" ");
  const config = loadConfig();
  const aggregator = new MultiSearchAggregator(config);

  console.log(`Searching ${Object.keys(config.resultCounts).length} engines for "${query}"...`);
  const result = await aggregator.aggregate(query);

  if (isErrorResult(result)) {
    console.error(`${result.errorType}: ${result.error}`);
    process.exitCode = 1;
    return;
  }

  console.log(JSON.stringify(result, null, 2));
}

if (require.main === module) {
  main().catch((error) => {
    console.error(error);
    process.exitCode = 1;
  });
}
