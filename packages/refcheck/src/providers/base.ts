/**
 * Provider Base Class
 *
 * Shared request plumbing for the registry clients: rate limiting, timeouts,
 * User-Agent, and conversion of every failure into a typed lookup result.
 */

import type { FailureKind, LookupFailure, LookupResult } from "../types.js";
import { RateLimiter } from "../rate-limit.js";

export const DEFAULT_TIMEOUT_MS = 10_000;

export const TOOL_VERSION = "1.0.0";

export interface ProviderOptions {
  /** Shared limiter; every provider of one verifier must get the same one */
  limiter?: RateLimiter;
  timeoutMs?: number;
  userAgent?: string;
  log?: (message: string) => void;
}

/**
 * User-Agent sent to every registry. Crossref routes requests that carry a
 * mailto to its "polite" pool.
 */
export function buildUserAgent(mailto?: string): string {
  const contact = mailto ? `; mailto:${mailto}` : "";
  return `bibverify/${TOOL_VERSION} (citation verification tool${contact})`;
}

/**
 * Readable message for anything thrown by fetch or body parsing
 */
export function describeError(err: unknown, timeoutMs: number): string {
  if (err instanceof Error) {
    if (err.name === "TimeoutError" || err.name === "AbortError") {
      return `Request timed out after ${timeoutMs}ms`;
    }
    if (err.cause instanceof Error) {
      return `${err.message} (${err.cause.message})`;
    }
    return err.message;
  }
  return "Unknown error";
}

export abstract class BaseProvider {
  abstract readonly name: string;

  protected readonly limiter: RateLimiter;
  protected readonly timeoutMs: number;
  protected readonly userAgent: string;
  protected readonly log: (message: string) => void;

  constructor(options: ProviderOptions = {}) {
    this.limiter = options.limiter ?? new RateLimiter();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? buildUserAgent();
    this.log = options.log ?? (() => {});
  }

  /**
   * Rate-limited GET with a fixed timeout
   */
  protected async get(url: string, headers: Record<string, string> = {}): Promise<Response> {
    await this.limiter.wait();
    return fetch(url, {
      headers: { "User-Agent": this.userAgent, ...headers },
      signal: AbortSignal.timeout(this.timeoutMs),
    });
  }

  /**
   * Parse a response body as JSON; undefined when it is not JSON
   */
  protected async readJson(response: Response): Promise<unknown> {
    const text = await response.text();
    try {
      return JSON.parse(text);
    } catch {
      return undefined;
    }
  }

  /**
   * Create a "not found" result
   */
  protected notFound(detail?: string, statusCode?: number): LookupFailure {
    return this.failure("NOT_FOUND", detail, statusCode);
  }

  /**
   * Create a transport/status error result
   */
  protected apiError(detail: string, statusCode?: number): LookupFailure {
    this.log(`${this.name} API error: ${detail}`);
    return this.failure("API_ERROR", detail, statusCode);
  }

  /**
   * Create a result for a payload that could not be read
   */
  protected invalidResponse(detail: string): LookupFailure {
    this.log(`${this.name} returned an unreadable payload: ${detail}`);
    return this.failure("INVALID_RESPONSE", detail);
  }

  /**
   * Create a success result
   */
  protected found<T>(data: T): LookupResult<T> {
    return { ok: true, provider: this.name, data };
  }

  /**
   * Convert a thrown error into an API_ERROR result
   */
  protected caught(err: unknown): LookupFailure {
    return this.apiError(describeError(err, this.timeoutMs));
  }

  private failure(kind: FailureKind, detail?: string, statusCode?: number): LookupFailure {
    const result: LookupFailure = { ok: false, provider: this.name, kind };
    if (detail !== undefined) result.detail = detail;
    if (statusCode !== undefined) result.statusCode = statusCode;
    return result;
  }
}
