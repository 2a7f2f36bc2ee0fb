import path from "path";
import { suggestFixes, type OverallStatus, type VerificationResult } from "@bibverify/refcheck";
import {
  STATUS_ORDER,
  countStatuses,
  formatTimestamp,
  percentage,
  resultsWithStatus,
  type ReportContext,
} from "./summary.js";

const STATUS_EMOJI: Record<OverallStatus, string> = {
  PENDING: "•",
  VERIFIED: "✅",
  WARNING: "⚠️",
  SUSPICIOUS: "🔍",
  FABRICATED: "❌",
  IDENTIFIER_INVALID: "❌",
};

const SEVERITY: Record<OverallStatus, string> = {
  PENDING: "OK",
  VERIFIED: "OK",
  WARNING: "MEDIUM",
  SUSPICIOUS: "HIGH",
  FABRICATED: "CRITICAL",
  IDENTIFIER_INVALID: "CRITICAL",
};

const BADGE_COLOR: Record<OverallStatus, string> = {
  PENDING: "lightgrey",
  VERIFIED: "green",
  WARNING: "yellow",
  SUSPICIOUS: "orange",
  FABRICATED: "red",
  IDENTIFIER_INVALID: "red",
};

function authorList(authors: readonly string[], limit: number): string[] {
  const lines = [`- **Authors:** ${authors.slice(0, limit).join(", ")}`];
  if (authors.length > limit) {
    lines.push(`  - *(+${authors.length - limit} more authors)*`);
  }
  return lines;
}

function summarySection(results: readonly VerificationResult[]): string[] {
  const counts = countStatuses(results);
  const lines = [
    "## Executive Summary",
    "",
    "| Status | Count | Percentage | Severity |",
    "|--------|-------|------------|----------|",
  ];

  for (const status of STATUS_ORDER) {
    const count = counts.get(status) ?? 0;
    if (!count) continue;
    lines.push(
      `| ${STATUS_EMOJI[status]} **${status}** | ${count} | ${percentage(count, results.length)}% | ${SEVERITY[status]} |`
    );
  }

  lines.push("", "---", "");
  return lines;
}

function findingsSection(results: readonly VerificationResult[]): string[] {
  const fabricated = resultsWithStatus(results, "FABRICATED").length;
  const invalid = resultsWithStatus(results, "IDENTIFIER_INVALID").length;
  const suspicious = resultsWithStatus(results, "SUSPICIOUS").length;
  const verified = resultsWithStatus(results, "VERIFIED").length;

  const lines = ["## Key Findings", ""];
  if (fabricated) {
    lines.push(`🚨 **${fabricated} FABRICATED citations detected** - Authors do not match actual papers`);
  }
  if (invalid) {
    lines.push(`🚫 **${invalid} INVALID DOIs** - Citations reference non-existent papers`);
  }
  if (suspicious) {
    lines.push(`⚠️ **${suspicious} SUSPICIOUS citations** - Multiple discrepancies found`);
  }
  if (verified) {
    lines.push(`✅ **${verified} citations verified** as authentic`);
  }

  const flagged = fabricated + invalid + suspicious;
  lines.push("", `**Overall Error Rate:** ${percentage(flagged, results.length)}%`, "", "---", "");
  return lines;
}

function fixesSection(result: VerificationResult, bibName: string): string[] {
  const fixes = suggestFixes(result);
  if (!fixes.hasFixes) return [];

  const lines = ["### 🔧 Suggested Fixes", ""];

  if (fixes.suggestedAuthors) {
    lines.push("**Corrected Authors:**", "```", fixes.suggestedAuthors.slice(0, 10).join(", "));
    if (fixes.suggestedAuthors.length > 10) {
      lines.push(`... (+${fixes.suggestedAuthors.length - 10} more)`);
    }
    lines.push("```", "");
  }
  if (fixes.suggestedIdentifier) {
    lines.push(`**Corrected DOI:** \`${fixes.suggestedIdentifier}\`  `);
  }
  if (fixes.suggestedTitle) {
    lines.push(`**Corrected Title:** ${fixes.suggestedTitle}  `);
  }
  if (fixes.suggestedYear) {
    lines.push(`**Corrected Year:** ${fixes.suggestedYear}  `);
  }

  if (fixes.reconstructedEntry) {
    lines.push(
      "",
      "<details>",
      "<summary><b>📋 Copy-Paste Corrected BibTeX Entry</b></summary>",
      "",
      `Replace the entry in \`${bibName}\` with this corrected version:`,
      "",
      "```bibtex",
      fixes.reconstructedEntry,
      "```",
      "",
      "</details>",
      ""
    );
  }

  return lines;
}

function resultSection(result: VerificationResult, index: number, bibName: string): string[] {
  const status = result.verification.overallStatus;
  const { claimed } = result;
  const badge = status.replace(/_/g, "__");

  const lines = [
    `#### ${index}. \`${result.key}\``,
    "",
    `![Status](https://img.shields.io/badge/Status-${badge}-${BADGE_COLOR[status]})`,
    "",
    "**Claimed Information:**",
    "",
    `- **Title:** ${claimed.title}`,
    ...authorList(claimed.authors, 5),
    `- **Year:** ${claimed.year}`,
    `- **DOI:** \`${claimed.identifier || "N/A"}\``,
    `- **Venue:** ${claimed.venue}`,
    `- **Type:** ${result.type}`,
    "",
  ];

  if (result.issues.length) {
    lines.push("**⚠️ Issues Detected:**", "", ...result.issues.map((issue) => `- 🔴 ${issue}`), "");
  }

  if (result.notes.length) {
    lines.push("**ℹ️ Notes:**", "", ...result.notes.map((note) => `- 📝 ${note}`), "");
  }

  const crossref = result.actualData.crossref;
  if (crossref?.ok) {
    const actual = crossref.data;
    lines.push(
      "<details>",
      "<summary><b>Actual Information (from Crossref)</b></summary>",
      "",
      `- **Title:** ${actual.title ?? "N/A"}`,
      ...authorList(actual.authors, 5),
      `- **Year:** ${actual.year ?? "N/A"}`,
      `- **DOI:** \`${actual.doi ?? "N/A"}\``,
      `- **Venue:** ${actual.venue ?? "N/A"}`,
      "",
      "</details>",
      ""
    );
  }

  if (result.issues.length) {
    lines.push(...fixesSection(result, bibName));
  }

  lines.push("---", "");
  return lines;
}

function recommendationsSection(results: readonly VerificationResult[]): string[] {
  const fabricated = resultsWithStatus(results, "FABRICATED");
  const invalid = resultsWithStatus(results, "IDENTIFIER_INVALID");
  const lines = ["## Recommendations", ""];

  if (fabricated.length) {
    lines.push(
      "### 🚨 Critical Actions Required",
      "",
      "The following citations have **fabricated author information**:",
      "",
      ...fabricated.map((r) => `- \`${r.key}\` - ${r.claimed.title.slice(0, 80)}...`),
      "",
      "**Action:** These citations must be corrected or removed immediately.",
      ""
    );
  }

  if (invalid.length) {
    lines.push(
      "### 🚫 Invalid DOI References",
      "",
      "The following citations have DOIs that do not exist:",
      "",
      ...invalid.map((r) => `- \`${r.key}\` - DOI: \`${r.claimed.identifier}\``),
      "",
      "**Action:** Verify these DOIs are correct or find alternative references.",
      ""
    );
  }

  if (!fabricated.length && !invalid.length) {
    lines.push("No critical problems found.", "");
  }

  return lines;
}

/**
 * Markdown report with summary table, per-entry findings and suggested fixes
 */
export function renderMarkdown(results: readonly VerificationResult[], context: ReportContext): string {
  const generated = formatTimestamp(context.generatedAt);
  const bibName = context.bibPath ? path.basename(context.bibPath) : "references.bib";

  const lines = [
    "# Citation Verification Report",
    "",
    `**Generated:** ${generated}  `,
    `**Total Citations Verified:** ${results.length}`,
    "",
    "---",
    "",
    ...summarySection(results),
    ...findingsSection(results),
    "## Detailed Findings",
    "",
  ];

  for (const status of STATUS_ORDER) {
    const group = resultsWithStatus(results, status);
    if (!group.length) continue;

    lines.push(`### ${STATUS_EMOJI[status]} ${status} (${group.length} citations)`, "");
    group.forEach((result, i) => lines.push(...resultSection(result, i + 1, bibName)));
  }

  lines.push(...recommendationsSection(results));

  lines.push(
    "---",
    "",
    "## About This Report",
    "",
    "Generated by **bibverify**: DOIs are checked against Crossref and the doi.org Handle System, " +
      "and titles against Semantic Scholar. Authors, titles and years are compared with fuzzy matching.",
    ""
  );
  if (context.version) {
    lines.push(`**Version:** ${context.version}  `);
  }
  lines.push(`**Generated:** ${generated}  `, `**Total Citations Analyzed:** ${results.length}`, "");

  return lines.join("\n");
}
