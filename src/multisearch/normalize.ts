import type { CitedSource, RawSearchResponse, SearchResult } from "./types";

export const PLACEHOLDER_RESULT: Readonly<SearchResult> = Object.freeze({
  title: "No additional results",
  link: "",
  snippet: "",
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const stringField = (hit: Record<string, unknown>, key: string): string | undefined => {
  const value = hit[key];
  return typeof value === "string" ? value : undefined;
};

export const normalizeResult = (hit: Record<string, unknown>): SearchResult => ({
  title: stringField(hit, "title"),
  link: stringField(hit, "link"),
  date: stringField(hit, "date"),
  author: stringField(hit, "author"),
  snippet: stringField(hit, "snippet"),
});

/**
 * Reads the organic results of a raw provider response. A missing or
 * non-array `organic_results` yields no results; non-object entries are skipped.
 */
export const extractOrganicResults = (response: RawSearchResponse): SearchResult[] => {
  const organic = response.organic_results;
  if (!Array.isArray(organic)) {
    return [];
  }
  return organic.filter(isRecord).map(normalizeResult);
};

/** Pads with placeholders, or truncates, to exactly `target` entries. */
export const padResults = (results: readonly SearchResult[], target: number): SearchResult[] => {
  const fixed = results.slice(0, target);
  while (fixed.length < target) {
    fixed.push({ ...PLACEHOLDER_RESULT });
  }
  return fixed;
};

export const citeSources = (results: readonly SearchResult[]): CitedSource[] =>
  results.map((result) => ({ title: result.title, url: result.link }));
