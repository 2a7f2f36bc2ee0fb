/**
 * Provider Exports
 */

import { RateLimiter } from "../rate-limit.js";
import { buildUserAgent, type ProviderOptions } from "./base.js";
import { CrossrefProvider } from "./crossref.js";
import { DoiOrgProvider } from "./doi-org.js";
import { SemanticScholarProvider } from "./semantic-scholar.js";
import type { DoiHandleSource, DoiMetadataSource, PaperSearchSource, VerifierOptions } from "../types.js";

export {
  BaseProvider,
  buildUserAgent,
  describeError,
  DEFAULT_TIMEOUT_MS,
  TOOL_VERSION,
  type ProviderOptions,
} from "./base.js";
export { CrossrefProvider } from "./crossref.js";
export { DoiOrgProvider } from "./doi-org.js";
export { SemanticScholarProvider, type SemanticScholarOptions } from "./semantic-scholar.js";

/**
 * The three sources a verifier consults, in fallback order
 */
export interface SourceSet {
  primary: DoiMetadataSource;
  secondary: DoiHandleSource;
  search: PaperSearchSource;
}

/**
 * Build the default sources around one shared limiter
 */
export function createSources(limiter: RateLimiter, options: VerifierOptions = {}): SourceSet {
  const shared: ProviderOptions = {
    limiter,
    timeoutMs: options.timeoutMs,
    userAgent: buildUserAgent(options.mailto),
    log: options.log,
  };

  return {
    primary: new CrossrefProvider(shared),
    secondary: new DoiOrgProvider(shared),
    search: new SemanticScholarProvider({ ...shared, apiKey: options.semanticScholarApiKey }),
  };
}
