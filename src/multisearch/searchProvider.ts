import fetch, { type Response } from "node-fetch";
import { DEFAULT_SERPAPI_BASE_URL } from "../shared/config";
import type { RawSearchResponse, SearchParams, SearchProvider } from "./types";

export class SearchProviderError extends Error {
  constructor(
    message: string,
    public readonly engine: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = "SearchProviderError";
  }
}

export type FetchLike = (url: string) => Promise<Pick<Response, "ok" | "status" | "statusText" | "json">>;

export interface SerpApiProviderOptions {
  baseUrl?: string;
  fetchImpl?: FetchLike;
}

/**
 * SerpAPI client. One GET per engine call; the engine is selected by the
 * `engine` parameter, so every backend shares this provider.
 */
export class SerpApiProvider implements SearchProvider {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: SerpApiProviderOptions = {}) {
    this.baseUrl = options.baseUrl ?? DEFAULT_SERPAPI_BASE_URL;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async search(params: SearchParams): Promise<RawSearchResponse> {
    const query = new URLSearchParams(
      Object.entries(params).map(([key, value]): [string, string] => [key, String(value)])
    );
    const response = await this.fetchImpl(`${this.baseUrl}?${query}`);

    if (!response.ok) {
      throw new SearchProviderError(
        `SerpAPI error for ${params.engine}: ${response.status} ${response.statusText}`,
        params.engine,
        response.status
      );
    }

    const body: unknown = await response.json();
    if (typeof body !== "object" || body === null || Array.isArray(body)) {
      throw new SearchProviderError(`SerpAPI returned a malformed body for ${params.engine}`, params.engine);
    }

    const data = Object.fromEntries(Object.entries(body));
    if (typeof data.error === "string") {
      throw new SearchProviderError(`SerpAPI error for ${params.engine}: ${data.error}`, params.engine);
    }
    return data;
  }
}
