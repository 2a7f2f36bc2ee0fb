/**
 * Tests for BibTeX reading and writing
 */

import { describe, it, expect } from "vitest";
import { extractBlocks, extractFields, formatEntry, parseBibtex } from "../src/bibtex.js";

const SAMPLE = `% references for the widget paper

@article{smith2020,
  author = {Smith, Alice and Bob Jones},
  title = {A {Study} of Things},
  year = 2020,
  journal = "Journal of Tests",
}

@comment{ignored,
  note = {not a citation}
}

@InProceedings{doe2021,
  title = {Second Paper},
  booktitle = {Proceedings of Testing}
}
`;

// =============================================================================
// extractBlocks
// =============================================================================

describe("extractBlocks", () => {
  it("finds citation blocks and skips @comment", () => {
    const blocks = extractBlocks(SAMPLE);
    expect(blocks.map((b) => [b.type, b.key])).toEqual([
      ["article", "smith2020"],
      ["InProceedings", "doe2021"],
    ]);
  });

  it("ignores a header without a comma-terminated key", () => {
    expect(extractBlocks("@misc{nokey}\n")).toEqual([]);
  });

  it("ignores a block without a closing line", () => {
    expect(extractBlocks("@misc{open,\n  title = {Never closed}}")).toEqual([]);
  });

  it("does not let a broken entry swallow the next one", () => {
    const text = "@article{broken,\n  title = {No closing}\n@article{good,\n  title = {Fine},\n}\n";
    const blocks = extractBlocks(text);
    expect(blocks).toHaveLength(1);
    expect(blocks[0].key).toBe("good");
  });

  it("stops a broken entry at an indented header", () => {
    const text = "@article{a,\n  title = {X}}\n  @article{b,\n  title = {Y},\n  year = {2020}\n}\n";
    expect(parseBibtex(text)).toEqual([{ key: "b", type: "article", fields: { title: "Y", year: "2020" } }]);
  });

  it("accepts trailing whitespace on the closing line", () => {
    const blocks = extractBlocks("@misc{a,\n  title = {T}\n}   \n");
    expect(blocks).toEqual([{ type: "misc", key: "a", body: "\n  title = {T}" }]);
  });
});

// =============================================================================
// extractFields
// =============================================================================

describe("extractFields", () => {
  it("reads braced, quoted and bare values", () => {
    const fields = extractFields('\n  title = {A {Nested} Title},\n  journal = "J. Tests",\n  year = 2020,');
    expect(fields).toEqual({ title: "A {Nested} Title", journal: "J. Tests", year: "2020" });
  });

  it("reads several fields on one line", () => {
    expect(extractFields("\n  title = {T}, year = {2001}")).toEqual({ title: "T", year: "2001" });
  });

  it("lowercases names and trims values", () => {
    expect(extractFields("\n  TITLE = {  Padded  },")).toEqual({ title: "Padded" });
  });

  it("keeps the last value of a repeated field", () => {
    expect(extractFields("\n  year = {2001},\n  year = {2002},")).toEqual({ year: "2002" });
  });

  it("skips lines it cannot read", () => {
    expect(extractFields("\n  garbage line\n  title = {Kept},")).toEqual({ title: "Kept" });
  });
});

// =============================================================================
// parseBibtex
// =============================================================================

describe("parseBibtex", () => {
  it("returns entries with their fields", () => {
    const entries = parseBibtex(SAMPLE);
    expect(entries).toHaveLength(2);
    expect(entries[0]).toEqual({
      key: "smith2020",
      type: "article",
      fields: {
        author: "Smith, Alice and Bob Jones",
        title: "A {Study} of Things",
        year: "2020",
        journal: "Journal of Tests",
      },
    });
    expect(entries[1].fields).toEqual({
      title: "Second Paper",
      booktitle: "Proceedings of Testing",
    });
  });

  it("returns an empty list for empty input", () => {
    expect(parseBibtex("")).toEqual([]);
    expect(parseBibtex("no entries here")).toEqual([]);
  });
});

// =============================================================================
// formatEntry
// =============================================================================

describe("formatEntry", () => {
  it("writes canonical fields first and the rest alphabetically", () => {
    const text = formatEntry("article", "k", {
      zeta: "1",
      doi: "10.1/x",
      title: "T",
      abstract: "Ab",
      author: "A",
    });
    expect(text).toBe(
      [
        "@article{k,",
        "  author = {A},",
        "  title = {T},",
        "  doi = {10.1/x},",
        "  abstract = {Ab},",
        "  zeta = {1},",
        "}",
      ].join("\n")
    );
  });

  it("produces text that parses back to the same fields", () => {
    const [entry] = parseBibtex(SAMPLE);
    const [again] = parseBibtex(formatEntry(entry.type, entry.key, { ...entry.fields }));
    expect(again).toEqual(entry);
  });
});
