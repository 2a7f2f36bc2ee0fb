import { describe, expect, it } from "vitest";
import type {
  ClaimedMetadata,
  OverallStatus,
  PaperLookup,
  VerificationChecks,
  VerificationResult,
} from "@bibverify/refcheck";
import { parseReportFormat, renderReport, statusCountLines } from "../src/reports/index.js";
import { formatTimestamp } from "../src/reports/summary.js";

const generatedAt = new Date(2024, 0, 2, 3, 4, 5);

function makeResult(
  key: string,
  status: OverallStatus,
  extra: {
    claimed?: Partial<ClaimedMetadata>;
    checks?: Partial<VerificationChecks>;
    issues?: string[];
    notes?: string[];
    crossref?: PaperLookup;
    fields?: Record<string, string>;
  } = {}
): VerificationResult {
  return {
    key,
    type: "article",
    claimed: {
      title: "Quantum Widgets",
      authors: ["alice smith"],
      year: "2020",
      identifier: "10.1/found",
      venue: "J. Widgets",
      ...extra.claimed,
    },
    verification: {
      identifierValid: null,
      identifierSource: null,
      authorsMatch: null,
      titleMatch: null,
      yearMatch: null,
      overallStatus: status,
      ...extra.checks,
    },
    issues: extra.issues ?? [],
    notes: extra.notes ?? [],
    actualData: extra.crossref ? { crossref: extra.crossref } : {},
    originalFields: extra.fields ?? {},
  };
}

const crossrefRecord: PaperLookup = {
  ok: true,
  provider: "crossref",
  data: { doi: "10.1/found", title: "Quantum Widgets", authors: ["alice smith"], year: 2020, raw: {} },
};

describe("parseReportFormat", () => {
  it("accepts md as an alias for markdown", () => {
    expect(parseReportFormat("md")).toBe("markdown");
    expect(parseReportFormat("JSON")).toBe("json");
  });

  it("rejects unknown formats", () => {
    expect(() => parseReportFormat("html")).toThrow("Unknown report format html");
    expect(() => parseReportFormat("constructor")).toThrow("Unknown report format constructor");
  });
});

describe("formatTimestamp", () => {
  it("formats local time", () => {
    expect(formatTimestamp(generatedAt)).toBe("2024-01-02 03:04:05");
  });
});

describe("statusCountLines", () => {
  it("sorts statuses by name with counts and shares", () => {
    const results = [
      makeResult("a", "WARNING"),
      makeResult("b", "VERIFIED"),
      makeResult("c", "FABRICATED"),
      makeResult("d", "VERIFIED"),
    ];

    expect(statusCountLines(results)).toEqual([
      "  FABRICATED        :   1 ( 25.0%)",
      "  VERIFIED          :   2 ( 50.0%)",
      "  WARNING           :   1 ( 25.0%)",
    ]);
  });
});

describe("json report", () => {
  it("serializes the results", () => {
    const results = [makeResult("a", "VERIFIED", { crossref: crossrefRecord })];

    expect(JSON.parse(renderReport(results, "json", { generatedAt }))).toEqual(results);
  });
});

describe("text report", () => {
  it("renders a verified entry with its Crossref data", () => {
    const results = [makeResult("smith2020", "VERIFIED", { crossref: crossrefRecord })];
    const rule = "=".repeat(80);
    const thin = "-".repeat(80);

    expect(renderReport(results, "text", { generatedAt })).toBe(
      [
        rule,
        "CITATION VERIFICATION REPORT",
        rule,
        "Generated: 2024-01-02 03:04:05",
        "Total Citations Verified: 1",
        "",
        "SUMMARY:",
        thin,
        "  VERIFIED          :   1 (100.0%)",
        "",
        rule,
        "DETAILED FINDINGS:",
        rule,
        "",
        "VERIFIED (1 citations)",
        rule,
        "",
        "[smith2020]",
        "Type: article",
        "Status: VERIFIED",
        "",
        "CLAIMED:",
        "  Title: Quantum Widgets",
        "  Authors: alice smith",
        "  Year: 2020",
        "  DOI: 10.1/found",
        "  Venue: J. Widgets",
        "",
        "ACTUAL (from Crossref):",
        "  Title: Quantum Widgets",
        "  Authors: alice smith",
        "  Year: 2020",
        "  DOI: 10.1/found",
        "",
        thin,
      ].join("\n")
    );
  });

  it("lists issues, notes and extra authors", () => {
    const results = [
      makeResult("ghost", "IDENTIFIER_INVALID", {
        claimed: { authors: ["a one", "b two", "c three", "d four", "e five"] },
        issues: ["IDENTIFIER_NOT_FOUND: not in Crossref or doi.org, likely invalid"],
        notes: ["doi.org lookup failed (API_ERROR): offline"],
      }),
    ];
    const lines = renderReport(results, "text", { generatedAt }).split("\n");

    expect(lines).toContain("  Authors: a one, b two, c three");
    expect(lines).toContain("           (+2 more)");
    expect(lines).toContain("  ⚠ IDENTIFIER_NOT_FOUND: not in Crossref or doi.org, likely invalid");
    expect(lines).toContain("  - doi.org lookup failed (API_ERROR): offline");
    expect(lines).not.toContain("ACTUAL (from Crossref):");
  });

  it("groups the most severe statuses first", () => {
    const text = renderReport(
      [makeResult("ok", "VERIFIED"), makeResult("bad", "FABRICATED")],
      "text",
      { generatedAt }
    );

    expect(text.indexOf("FABRICATED (1 citations)")).toBeLessThan(text.indexOf("VERIFIED (1 citations)"));
  });
});

describe("markdown report", () => {
  const yearFix = makeResult("lee2019", "WARNING", {
    claimed: { title: "Widgets Revisited", year: "2019", identifier: "10.1/lee" },
    checks: { identifierValid: true, identifierSource: "primary", titleMatch: true, yearMatch: false },
    issues: ["YEAR_MISMATCH: claimed=2019, actual=2020"],
    crossref: {
      ok: true,
      provider: "crossref",
      data: { doi: "10.1/lee", title: "Widgets Revisited", authors: [], year: 2020, raw: {} },
    },
    fields: { title: "Widgets Revisited", year: "2019", doi: "10.1/lee" },
  });

  const results = [
    makeResult("fake2021", "FABRICATED", { issues: ["AUTHOR_MISMATCH: FABRICATED_AUTHORS"] }),
    makeResult("ok1", "VERIFIED"),
    makeResult("ok2", "VERIFIED"),
    yearFix,
  ];

  const markdown = renderReport(results, "markdown", { generatedAt, bibPath: "/work/refs.bib", version: "1.0.0" });
  const lines = markdown.split("\n");

  it("starts with the title and generation time", () => {
    expect(lines.slice(0, 4)).toEqual([
      "# Citation Verification Report",
      "",
      "**Generated:** 2024-01-02 03:04:05  ",
      "**Total Citations Verified:** 4",
    ]);
  });

  it("summarizes statuses by severity", () => {
    const fabricatedRow = lines.indexOf("| ❌ **FABRICATED** | 1 | 25.0% | CRITICAL |");
    const warningRow = lines.indexOf("| ⚠️ **WARNING** | 1 | 25.0% | MEDIUM |");
    const verifiedRow = lines.indexOf("| ✅ **VERIFIED** | 2 | 50.0% | OK |");

    expect(fabricatedRow).toBeGreaterThan(-1);
    expect(warningRow).toBeGreaterThan(fabricatedRow);
    expect(verifiedRow).toBeGreaterThan(warningRow);
  });

  it("reports key findings and the error rate", () => {
    expect(lines).toContain("🚨 **1 FABRICATED citations detected** - Authors do not match actual papers");
    expect(lines).toContain("✅ **2 citations verified** as authentic");
    expect(lines).toContain("**Overall Error Rate:** 25.0%");
  });

  it("suggests the corrected year with a replacement entry", () => {
    expect(lines).toContain("**Corrected Year:** 2020  ");
    expect(lines).toContain("Replace the entry in `refs.bib` with this corrected version:");
    expect(markdown).toContain(
      "```bibtex\n@article{lee2019,\n  title = {Widgets Revisited},\n  year = {2020},\n  doi = {10.1/lee},\n}\n```"
    );
  });

  it("shows Crossref data in a details block", () => {
    expect(lines).toContain("<summary><b>Actual Information (from Crossref)</b></summary>");
    expect(lines).toContain("- **Venue:** N/A");
  });

  it("recommends action for fabricated entries", () => {
    expect(lines).toContain("### 🚨 Critical Actions Required");
    expect(lines).toContain("- `fake2021` - Quantum Widgets...");
    expect(lines).not.toContain("### 🚫 Invalid DOI References");
  });

  it("includes the version in the footer", () => {
    expect(lines).toContain("**Version:** 1.0.0  ");
    expect(lines[lines.length - 2]).toBe("**Total Citations Analyzed:** 4");
  });
});
