/**
 * @bibverify/refcheck
 *
 * Checks BibTeX citations against Crossref, doi.org and Semantic Scholar
 * and classifies each one. Used by the CLI.
 */

// =============================================================================
// Type Exports
// =============================================================================

export type {
  // Entry types
  CitationEntry,
  ClaimedMetadata,

  // Lookup types
  FailureKind,
  LookupFailure,
  LookupSuccess,
  LookupResult,
  PaperMetadata,
  HandleValue,
  HandleRecord,
  PaperLookup,
  HandleLookup,

  // Source interfaces
  DoiMetadataSource,
  DoiHandleSource,
  PaperSearchSource,

  // Comparison types
  AuthorClassification,
  AuthorComparison,

  // Verification types
  OverallStatus,
  IdentifierSource,
  VerificationChecks,
  ActualData,
  VerificationResult,

  // Fix types
  FixSuggestion,

  // Options
  VerifierOptions,
} from "./types.js";

// =============================================================================
// BibTeX
// =============================================================================

export {
  parseBibtex,
  extractBlocks,
  extractFields,
  formatEntry,
  CANONICAL_FIELD_ORDER,
  type BibtexBlock,
} from "./bibtex.js";

// =============================================================================
// Normalization Utilities
// =============================================================================

export {
  normalizeString,
  cleanAuthorName,
  parseAuthors,
  normalizeDoi,
  stripDoiPrefix,
  similarityRatio,
} from "./normalize.js";

// =============================================================================
// Field Comparison
// =============================================================================

export {
  compareAuthors,
  compareTitle,
  compareYear,
  sameDoi,
  determineStatus,
  issueCode,
  FABRICATED_AUTHOR_THRESHOLD,
  AUTHOR_MATCH_THRESHOLD,
  TITLE_MATCH_THRESHOLD,
} from "./compare.js";

// =============================================================================
// Rate Limiting
// =============================================================================

export { RateLimiter, systemClock, DEFAULT_MIN_INTERVAL_MS, type Clock } from "./rate-limit.js";

// =============================================================================
// Providers
// =============================================================================

export {
  BaseProvider,
  CrossrefProvider,
  DoiOrgProvider,
  SemanticScholarProvider,
  buildUserAgent,
  describeError,
  createSources,
  DEFAULT_TIMEOUT_MS,
  TOOL_VERSION,
  type ProviderOptions,
  type SemanticScholarOptions,
  type SourceSet,
} from "./providers/index.js";

// =============================================================================
// Verification
// =============================================================================

export {
  CitationVerifier,
  claimedMetadata,
  SECONDARY_SOURCE_NOTE,
  type CitationVerifierOptions,
} from "./verifier.js";

export { suggestFixes, reconstructEntry, toBibtexName } from "./fixes.js";
