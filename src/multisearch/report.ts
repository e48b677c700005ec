import * as fs from "fs";
import * as path from "path";
import type { SearchResult } from "./types";

export const REPORT_FILE_NAME = "search_results.md";

export const formatResult = (result: SearchResult): string =>
  [
    `### ${result.title ?? ""}`,
    `[Link](${result.link ?? ""})`,
    result.snippet ?? "",
    `**Date:** ${result.date ?? "N/A"}`,
    `**Author:** ${result.author ?? "N/A"}`,
    "",
    "",
  ].join("\n");

/** One invocation's block group: every result in order, then the separator. */
export const formatReport = (results: readonly SearchResult[]): string =>
  results.map(formatResult).join("") + "\n---\n";

/**
 * Appends the block group to `<outputDir>/search_results.md`, creating the
 * directory when needed. Returns the report path.
 */
export const appendReport = async (
  results: readonly SearchResult[],
  outputDir: string
): Promise<string> => {
  await fs.promises.mkdir(outputDir, { recursive: true });
  const filePath = path.join(outputDir, REPORT_FILE_NAME);

  const handle = await fs.promises.open(filePath, "a");
  try {
    await handle.appendFile(formatReport(results), "utf8");
  } finally {
    await handle.close();
  }
  return filePath;
};
