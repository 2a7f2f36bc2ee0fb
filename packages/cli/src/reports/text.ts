import type { VerificationResult } from "@bibverify/refcheck";
import {
  STATUS_ORDER,
  formatTimestamp,
  resultsWithStatus,
  statusCountLines,
  type ReportContext,
} from "./summary.js";

const RULE = "=".repeat(80);
const THIN_RULE = "-".repeat(80);

function authorLines(authors: readonly string[]): string[] {
  const lines = [`  Authors: ${authors.slice(0, 3).join(", ")}`];
  if (authors.length > 3) {
    lines.push(`           (+${authors.length - 3} more)`);
  }
  return lines;
}

function renderResult(result: VerificationResult): string[] {
  const { claimed } = result;
  const lines = [
    "",
    `[${result.key}]`,
    `Type: ${result.type}`,
    `Status: ${result.verification.overallStatus}`,
    "",
    "CLAIMED:",
    `  Title: ${claimed.title.slice(0, 100)}`,
    ...authorLines(claimed.authors),
    `  Year: ${claimed.year}`,
    `  DOI: ${claimed.identifier}`,
    `  Venue: ${claimed.venue.slice(0, 60)}`,
    "",
  ];

  if (result.issues.length) {
    lines.push("ISSUES:", ...result.issues.map((issue) => `  ⚠ ${issue}`), "");
  }

  if (result.notes.length) {
    lines.push("NOTES:", ...result.notes.map((note) => `  - ${note}`), "");
  }

  const crossref = result.actualData.crossref;
  if (crossref?.ok) {
    const actual = crossref.data;
    lines.push(
      "ACTUAL (from Crossref):",
      `  Title: ${(actual.title ?? "N/A").slice(0, 100)}`,
      ...authorLines(actual.authors),
      `  Year: ${actual.year ?? "N/A"}`,
      `  DOI: ${actual.doi ?? "N/A"}`,
      ""
    );
  }

  lines.push(THIN_RULE);
  return lines;
}

/**
 * Plain-text report: summary counts, then every entry grouped by status
 */
export function renderText(results: readonly VerificationResult[], context: ReportContext): string {
  const lines = [
    RULE,
    "CITATION VERIFICATION REPORT",
    RULE,
    `Generated: ${formatTimestamp(context.generatedAt)}`,
    `Total Citations Verified: ${results.length}`,
    "",
    "SUMMARY:",
    THIN_RULE,
    ...statusCountLines(results),
    "",
    RULE,
    "DETAILED FINDINGS:",
    RULE,
  ];

  for (const status of STATUS_ORDER) {
    const group = resultsWithStatus(results, status);
    if (!group.length) continue;

    lines.push("", `${status} (${group.length} citations)`, RULE);
    for (const result of group) {
      lines.push(...renderResult(result));
    }
  }

  return lines.join("\n");
}
