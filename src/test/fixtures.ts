import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import pino from "pino";
import type { MultiSearchConfig } from "../shared/config";
import type { RawSearchResponse, SearchParams, SearchProvider } from "../multisearch/types";

export const silentLogger = pino({ enabled: false });

export const makeTempDir = (): string => fs.mkdtempSync(path.join(os.tmpdir(), "multisearch-"));

export const testConfig = (overrides: Partial<MultiSearchConfig> = {}): MultiSearchConfig => ({
  apiKey: "test-key",
  serpApiBaseUrl: "http://localhost/search.json",
  outputDir: "./output",
  rateLimitMs: 10_000,
  resultCounts: { google: 10, bing: 10, duckduckgo: 10, yahoo: 10 },
  logFile: "test.log",
  logLevel: "silent",
  ...overrides,
});

export const organicHits = (engine: string, count: number): RawSearchResponse => ({
  search_metadata: { status: "Success" },
  organic_results: Array.from({ length: count }, (_, i) => ({
    position: i + 1,
    title: `${engine} result ${i}`,
    link: `https://example.com/${engine}/${i}`,
    snippet: `Snippet ${i} from ${engine}`,
  })),
});

type Reply = RawSearchResponse | Error;

/**
 * In-process provider: answers per engine from a fixed table and records
 * every parameter set it receives.
 */
export class FakeSearchProvider implements SearchProvider {
  readonly calls: SearchParams[] = [];

  constructor(private readonly replies: Record<string, Reply>) {}

  async search(params: SearchParams): Promise<RawSearchResponse> {
    this.calls.push(params);
    const reply = this.replies[params.engine] ?? { organic_results: [] };
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}
