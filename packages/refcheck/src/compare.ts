/**
 * Field Comparison Logic
 *
 * Claimed-versus-registry comparisons and the status classification that
 * turns an issue list into a verdict.
 */

import type { AuthorComparison, OverallStatus } from "./types.js";
import { normalizeDoi, similarityRatio } from "./normalize.js";

// =============================================================================
// Threshold Constants
// =============================================================================

/** Average author similarity below this means the authors are made up */
export const FABRICATED_AUTHOR_THRESHOLD = 0.3;

/** Average author similarity needed to accept the author list */
export const AUTHOR_MATCH_THRESHOLD = 0.8;

/** Title similarity must exceed this to count as a match */
export const TITLE_MATCH_THRESHOLD = 0.8;

// =============================================================================
// Field Comparison Functions
// =============================================================================

/**
 * Compare claimed authors with the registry's authors.
 *
 * Each claimed author is scored against its best-matching actual author and
 * the scores are averaged, so author order does not matter.
 */
export function compareAuthors(claimed: string[], actual: string[]): AuthorComparison {
  if (claimed.length === 0 || actual.length === 0) {
    return {
      isMatch: false,
      similarity: 0,
      classification: "MISSING_AUTHOR_DATA",
      claimed,
      actual,
    };
  }

  const best = claimed.map((claimedAuthor) =>
    Math.max(...actual.map((actualAuthor) => similarityRatio(claimedAuthor, actualAuthor)))
  );
  const similarity = best.reduce((sum, score) => sum + score, 0) / best.length;

  if (similarity < FABRICATED_AUTHOR_THRESHOLD) {
    return { isMatch: false, similarity, classification: "FABRICATED_AUTHORS", claimed, actual };
  }
  if (similarity < AUTHOR_MATCH_THRESHOLD) {
    return { isMatch: false, similarity, classification: "PARTIAL_MATCH", claimed, actual };
  }
  return { isMatch: true, similarity, classification: "VERIFIED", claimed, actual };
}

/**
 * Compare titles by similarity ratio
 */
export function compareTitle(
  claimed: string,
  actual: string
): { match: boolean; similarity: number } {
  const similarity = similarityRatio(claimed, actual);
  return { match: similarity > TITLE_MATCH_THRESHOLD, similarity };
}

/**
 * Compare years as strings, so "2020" and 2020 are equal
 */
export function compareYear(claimed: string, actual: string | number): boolean {
  return String(actual) === String(claimed);
}

/**
 * DOI equality ignoring case and any resolver prefix
 */
export function sameDoi(a: string, b: string): boolean {
  return normalizeDoi(a) === normalizeDoi(b);
}

// =============================================================================
// Status Classification
// =============================================================================

/**
 * Derive the overall status from an issue list.
 *
 * Precedence is fixed: fabricated authors outrank an unknown identifier,
 * which outranks the issue count.
 */
export function determineStatus(issues: readonly string[]): OverallStatus {
  if (issues.length === 0) return "VERIFIED";
  if (issues.some((issue) => issue.includes("FABRICATED"))) return "FABRICATED";
  if (issues.some((issue) => issueCode(issue) === "IDENTIFIER_NOT_FOUND")) return "IDENTIFIER_INVALID";
  if (issues.length >= 2) return "SUSPICIOUS";
  return "WARNING";
}

/**
 * The code part of an issue string ("TITLE_MISMATCH: ..." → "TITLE_MISMATCH")
 */
export function issueCode(issue: string): string {
  const colon = issue.indexOf(":");
  return colon === -1 ? issue : issue.slice(0, colon);
}
