import { describe, expect, it } from "vitest";
import { citeSources, extractOrganicResults, normalizeResult, padResults, PLACEHOLDER_RESULT } from "./normalize";

describe("normalizeResult", () => {
  it("copies the known fields", () => {
    expect(
      normalizeResult({
        title: "Rust vs Go",
        link: "https://example.com/rust-go",
        date: "Mar 3, 2024",
        author: "Jane Doe",
        snippet: "A comparison",
        position: 1,
      })
    ).toEqual({
      title: "Rust vs Go",
      link: "https://example.com/rust-go",
      date: "Mar 3, 2024",
      author: "Jane Doe",
      snippet: "A comparison",
    });
  });

  it("leaves missing or non-string fields undefined", () => {
    const result = normalizeResult({ title: "Only title", date: 20240303, author: null });

    expect(result.title).toBe("Only title");
    expect(result.link).toBeUndefined();
    expect(result.date).toBeUndefined();
    expect(result.author).toBeUndefined();
    expect(result.snippet).toBeUndefined();
  });
});

describe("extractOrganicResults", () => {
  it("returns nothing when organic_results is missing", () => {
    expect(extractOrganicResults({ search_metadata: { status: "Success" } })).toEqual([]);
  });

  it("returns nothing when organic_results is not a list", () => {
    expect(extractOrganicResults({ organic_results: "none" })).toEqual([]);
  });

  it("skips entries that are not objects", () => {
    const results = extractOrganicResults({
      organic_results: [{ title: "kept", link: "https://example.com" }, "junk", null, 42, ["nested"]],
    });

    expect(results).toEqual([{ title: "kept", link: "https://example.com" }]);
  });
});

describe("padResults", () => {
  it("pads short lists with placeholders", () => {
    const padded = padResults([{ title: "a", link: "https://example.com/a" }], 3);

    expect(padded).toEqual([
      { title: "a", link: "https://example.com/a" },
      { title: "No additional results", link: "", snippet: "" },
      { title: "No additional results", link: "", snippet: "" },
    ]);
  });

  it("truncates long lists", () => {
    const results = [{ title: "a" }, { title: "b" }, { title: "c" }];

    expect(padResults(results, 2)).toEqual([{ title: "a" }, { title: "b" }]);
    expect(results).toHaveLength(3);
  });

  it("hands out independent placeholder copies", () => {
    const [first, second] = padResults([], 2);

    expect(first).not.toBe(second);
    expect(first).not.toBe(PLACEHOLDER_RESULT);
  });

  it("returns an empty list for a zero target", () => {
    expect(padResults([{ title: "a" }], 0)).toEqual([]);
  });
});

describe("citeSources", () => {
  it("maps title and link one to one", () => {
    expect(citeSources([{ title: "a", link: "https://example.com/a", snippet: "x" }, { title: "b" }])).toEqual([
      { title: "a", url: "https://example.com/a" },
      { title: "b", url: undefined },
    ]);
  });
});
