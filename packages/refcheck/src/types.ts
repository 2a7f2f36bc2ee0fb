/**
 * Refcheck Type Definitions
 *
 * Types shared by the parser, the source clients, the verification engine
 * and the fix suggester.
 */

// =============================================================================
// Entries
// =============================================================================

/**
 * One parsed BibTeX entry
 */
export interface CitationEntry {
  /** Citation key, unique within a file */
  readonly key: string;
  /** Entry type as written (article, inproceedings, ...) */
  readonly type: string;
  /** Field name (lowercased) to trimmed value */
  readonly fields: Readonly<Record<string, string>>;
}

/**
 * Metadata an entry claims about the cited work
 */
export interface ClaimedMetadata {
  title: string;
  /** Normalized author names in citation order */
  authors: string[];
  year: string;
  /** DOI as written in the entry, "" when absent */
  identifier: string;
  /** journal, else booktitle */
  venue: string;
}

// =============================================================================
// Lookups
// =============================================================================

/**
 * Why a lookup produced no data
 */
export type FailureKind =
  | "NOT_FOUND"         // Source confirms the work is absent
  | "API_ERROR"         // Transport error, timeout or unexpected status
  | "INVALID_RESPONSE"; // Success status but the payload could not be read

export interface LookupFailure {
  ok: false;
  provider: string;
  kind: FailureKind;
  detail?: string;
  statusCode?: number;
}

export interface LookupSuccess<T> {
  ok: true;
  provider: string;
  data: T;
}

/**
 * Result of a single source call
 */
export type LookupResult<T> = LookupSuccess<T> | LookupFailure;

/**
 * Paper metadata returned by Crossref and Semantic Scholar
 */
export interface PaperMetadata {
  doi?: string;
  title?: string;
  /** Normalized author names */
  authors: string[];
  year?: number;
  venue?: string;
  /** Work type reported by the registry (journal-article, ...) */
  type?: string;
  /** Unmodified provider payload */
  raw: unknown;
}

/**
 * A value stored in a DOI handle record
 */
export interface HandleValue {
  index?: number;
  type: string;
  data?: {
    format?: string;
    value?: unknown;
  };
}

/**
 * Existence record returned by the doi.org Handle System
 */
export interface HandleRecord {
  doi: string;
  exists: boolean;
  handle?: string;
  /** First URL value registered for the handle */
  resolvedUrl?: string;
  values: HandleValue[];
  raw: unknown;
}

export type PaperLookup = LookupResult<PaperMetadata>;
export type HandleLookup = LookupResult<HandleRecord>;

/**
 * Primary registry: full metadata by DOI
 */
export interface DoiMetadataSource {
  readonly name: string;
  lookupByDoi(doi: string): Promise<PaperLookup>;
}

/**
 * Secondary registry: existence only
 */
export interface DoiHandleSource {
  readonly name: string;
  lookupByDoi(doi: string): Promise<HandleLookup>;
}

/**
 * Title/author search returning the single best hit
 */
export interface PaperSearchSource {
  readonly name: string;
  searchByTitle(title: string, authors: string[]): Promise<PaperLookup>;
}

// =============================================================================
// Comparison
// =============================================================================

export type AuthorClassification =
  | "FABRICATED_AUTHORS"   // Average similarity below 0.30
  | "PARTIAL_MATCH"        // 0.30 up to 0.80
  | "VERIFIED"             // 0.80 and above
  | "MISSING_AUTHOR_DATA"; // One of the lists was empty

export interface AuthorComparison {
  isMatch: boolean;
  similarity: number;
  classification: AuthorClassification;
  claimed: string[];
  actual: string[];
}

// =============================================================================
// Verification
// =============================================================================

export type OverallStatus =
  | "PENDING"
  | "VERIFIED"
  | "WARNING"
  | "SUSPICIOUS"
  | "FABRICATED"
  | "IDENTIFIER_INVALID";

/** Which registry vouched for the identifier */
export type IdentifierSource = "primary" | "secondary";

export interface VerificationChecks {
  identifierValid: boolean | null;
  identifierSource: IdentifierSource | null;
  authorsMatch: AuthorComparison | null;
  titleMatch: boolean | null;
  yearMatch: boolean | null;
  overallStatus: OverallStatus;
}

/**
 * Every source call made for an entry, keyed by source
 */
export interface ActualData {
  crossref?: PaperLookup;
  doiOrg?: HandleLookup;
  semanticScholar?: PaperLookup;
}

export interface VerificationResult {
  key: string;
  type: string;
  claimed: ClaimedMetadata;
  verification: VerificationChecks;
  /** Issue strings of the form "CODE: detail" */
  issues: string[];
  /** Informational notes that do not affect the status */
  notes: string[];
  actualData: ActualData;
  /** Entry fields as parsed, used to rebuild a corrected entry */
  originalFields: Record<string, string>;
}

// =============================================================================
// Fixes
// =============================================================================

export interface FixSuggestion {
  hasFixes: boolean;
  suggestedAuthors?: string[];
  suggestedIdentifier?: string;
  suggestedTitle?: string;
  suggestedYear?: string;
  /** Corrected BibTeX entry, present when hasFixes is true */
  reconstructedEntry?: string;
}

// =============================================================================
// Options
// =============================================================================

export interface VerifierOptions {
  /** Minimum spacing between outbound calls, in ms (default 500) */
  minIntervalMs?: number;
  /** Per-call timeout, in ms (default 10000) */
  timeoutMs?: number;
  /** Contact address sent in the User-Agent */
  mailto?: string;
  /** Sent to Semantic Scholar as x-api-key */
  semanticScholarApiKey?: string;
  /** Verbose log sink */
  log?: (message: string) => void;
}
