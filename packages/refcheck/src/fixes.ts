/**
 * Fix Suggestions
 *
 * Corrections are only taken from a successful Crossref record; doi.org and
 * search hits do not carry enough metadata to rewrite an entry.
 */

import type { FixSuggestion, VerificationResult } from "./types.js";
import { sameDoi } from "./compare.js";
import { formatEntry } from "./bibtex.js";

/**
 * Write a normalized "first ... last" name as BibTeX "last, first ..."
 */
export function toBibtexName(name: string): string {
  const parts = name.split(" ").filter(Boolean);
  const last = parts.pop();
  if (!last) return "";
  return parts.length > 0 ? `${last}, ${parts.join(" ")}` : last;
}

export function suggestFixes(result: VerificationResult): FixSuggestion {
  const fixes: FixSuggestion = { hasFixes: false };
  const crossref = result.actualData.crossref;
  if (!crossref?.ok) {
    return fixes;
  }

  const actual = crossref.data;
  const { claimed, verification } = result;

  if (verification.authorsMatch && !verification.authorsMatch.isMatch && actual.authors.length > 0) {
    fixes.suggestedAuthors = actual.authors;
  }

  if (actual.doi && (!claimed.identifier || !sameDoi(claimed.identifier, actual.doi))) {
    fixes.suggestedIdentifier = actual.doi;
  }

  if (verification.titleMatch === false && actual.title) {
    fixes.suggestedTitle = actual.title;
  }

  if (verification.yearMatch === false && actual.year !== undefined) {
    fixes.suggestedYear = String(actual.year);
  }

  fixes.hasFixes =
    fixes.suggestedAuthors !== undefined ||
    fixes.suggestedIdentifier !== undefined ||
    fixes.suggestedTitle !== undefined ||
    fixes.suggestedYear !== undefined;

  if (fixes.hasFixes) {
    fixes.reconstructedEntry = reconstructEntry(result, fixes);
  }

  return fixes;
}

/**
 * Rebuild the entry with the suggested fields swapped in. Every other field
 * is written back exactly as parsed.
 */
export function reconstructEntry(result: VerificationResult, fixes: FixSuggestion): string {
  const fields = { ...result.originalFields };

  if (fixes.suggestedAuthors) {
    fields.author = fixes.suggestedAuthors.map(toBibtexName).join(" and ");
  }
  if (fixes.suggestedTitle) {
    fields.title = fixes.suggestedTitle;
  }
  if (fixes.suggestedYear) {
    fields.year = fixes.suggestedYear;
  }
  if (fixes.suggestedIdentifier) {
    fields.doi = fixes.suggestedIdentifier;
  }

  return formatEntry(result.type, result.key, fields);
}
