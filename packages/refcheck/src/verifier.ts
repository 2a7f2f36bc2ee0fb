/**
 * Citation Verification Engine
 *
 * Runs one entry through the lookup fallback chain (Crossref, then doi.org,
 * then a Semantic Scholar title search), records every comparison as an
 * issue string, and classifies the entry once all checks are done.
 */

import type {
  CitationEntry,
  ClaimedMetadata,
  PaperMetadata,
  VerificationResult,
  VerifierOptions,
} from "./types.js";
import { parseAuthors, stripDoiPrefix } from "./normalize.js";
import { compareAuthors, compareTitle, compareYear, determineStatus, sameDoi } from "./compare.js";
import { RateLimiter } from "./rate-limit.js";
import { createSources, type SourceSet } from "./providers/index.js";

export const SECONDARY_SOURCE_NOTE =
  "DOI verified via doi.org Handle System (not indexed by Crossref, e.g. an arXiv preprint)";

export interface CitationVerifierOptions extends VerifierOptions {
  /** Limiter shared by the default sources; created from minIntervalMs when absent */
  limiter?: RateLimiter;
  /** Replace any of the default sources */
  sources?: Partial<SourceSet>;
}

/**
 * Derive the claimed metadata view of an entry
 */
export function claimedMetadata(entry: CitationEntry): ClaimedMetadata {
  const { fields } = entry;
  return {
    title: fields.title ?? "",
    authors: parseAuthors(fields.author),
    year: fields.year ?? "",
    identifier: fields.doi ?? "",
    venue: fields.journal || fields.booktitle || "",
  };
}

export class CitationVerifier {
  readonly limiter: RateLimiter;
  private readonly sources: SourceSet;
  private readonly log: (message: string) => void;

  constructor(options: CitationVerifierOptions = {}) {
    this.limiter = options.limiter ?? new RateLimiter(options.minIntervalMs);
    this.log = options.log ?? (() => {});
    this.sources = { ...createSources(this.limiter, options), ...options.sources };
  }

  /**
   * Verify a single entry. Lookup failures never reject; they show up in
   * `actualData` and degrade the affected check to unknown.
   */
  async verifyEntry(entry: CitationEntry): Promise<VerificationResult> {
    const result: VerificationResult = {
      key: entry.key,
      type: entry.type,
      claimed: claimedMetadata(entry),
      verification: {
        identifierValid: null,
        identifierSource: null,
        authorsMatch: null,
        titleMatch: null,
        yearMatch: null,
        overallStatus: "PENDING",
      },
      issues: [],
      notes: [],
      actualData: {},
      originalFields: { ...entry.fields },
    };

    if (result.claimed.identifier) {
      await this.checkIdentifier(result);
    }

    if (result.verification.identifierValid !== true && result.claimed.title) {
      await this.searchByTitle(result);
    }

    result.verification.overallStatus = determineStatus(result.issues);
    this.log(`${entry.key}: ${result.verification.overallStatus}`);
    return result;
  }

  /**
   * Verify entries one after another
   */
  async verifyEntries(
    entries: readonly CitationEntry[],
    onProgress?: (result: VerificationResult, index: number, total: number) => void
  ): Promise<VerificationResult[]> {
    const results: VerificationResult[] = [];

    for (let i = 0; i < entries.length; i++) {
      const result = await this.verifyEntry(entries[i]);
      results.push(result);
      onProgress?.(result, i, entries.length);
    }

    return results;
  }

  private async checkIdentifier(result: VerificationResult): Promise<void> {
    const { verification } = result;
    const doi = stripDoiPrefix(result.claimed.identifier);

    const crossref = await this.sources.primary.lookupByDoi(doi);
    result.actualData.crossref = crossref;

    if (crossref.ok) {
      verification.identifierValid = true;
      verification.identifierSource = "primary";
      this.compareWithRecord(result, crossref.data);
      return;
    }

    this.log(`Crossref failed for ${doi} (${crossref.kind}), trying doi.org...`);
    const handle = await this.sources.secondary.lookupByDoi(doi);
    result.actualData.doiOrg = handle;

    if (handle.ok && handle.data.exists) {
      verification.identifierValid = true;
      verification.identifierSource = "secondary";
      result.notes.push(SECONDARY_SOURCE_NOTE);
      return;
    }

    if (!handle.ok && handle.kind !== "NOT_FOUND") {
      result.notes.push(`doi.org lookup failed (${handle.kind}): ${handle.detail ?? "no detail"}`);
    }

    verification.identifierValid = false;
    result.issues.push("IDENTIFIER_NOT_FOUND: not in Crossref or doi.org, likely invalid");
  }

  private compareWithRecord(result: VerificationResult, paper: PaperMetadata): void {
    const { claimed, verification, issues } = result;

    const authors = compareAuthors(claimed.authors, paper.authors);
    verification.authorsMatch = authors;
    if (!authors.isMatch) {
      issues.push(`AUTHOR_MISMATCH: ${authors.classification}`);
    }

    if (paper.title) {
      const title = compareTitle(claimed.title, paper.title);
      verification.titleMatch = title.match;
      if (!title.match) {
        issues.push(`TITLE_MISMATCH: similarity=${title.similarity.toFixed(2)}`);
      }
    }

    if (paper.year !== undefined) {
      const yearMatch = compareYear(claimed.year, paper.year);
      verification.yearMatch = yearMatch;
      if (!yearMatch) {
        issues.push(`YEAR_MISMATCH: claimed=${claimed.year}, actual=${paper.year}`);
      }
    }
  }

  private async searchByTitle(result: VerificationResult): Promise<void> {
    const { claimed, verification, issues } = result;

    const search = await this.sources.search.searchByTitle(claimed.title, claimed.authors);
    result.actualData.semanticScholar = search;
    if (!search.ok) {
      this.log(`No corroborating search hit for ${result.key} (${search.kind})`);
      return;
    }

    const paper = search.data;
    if (paper.doi) {
      if (!claimed.identifier) {
        issues.push(`IDENTIFIER_MISSING: actual=${paper.doi}`);
      } else if (!sameDoi(claimed.identifier, paper.doi)) {
        issues.push(`IDENTIFIER_WRONG: claimed=${claimed.identifier}, actual=${paper.doi}`);
      }
    }

    // Authors are only judged against a hit that is the same work by title
    const sameWork = paper.title !== undefined && compareTitle(claimed.title, paper.title).match;
    if (sameWork && claimed.authors.length > 0 && paper.authors.length > 0) {
      const authors = compareAuthors(claimed.authors, paper.authors);
      verification.authorsMatch = authors;
      if (!authors.isMatch) {
        issues.push(`AUTHOR_MISMATCH: ${authors.classification}`);
      }
    }
  }
}
