/**
 * Semantic Scholar Provider
 *
 * Title search returning the top-ranked paper.
 * Good coverage across fields, including preprints without a DOI.
 */

import { z } from "zod";
import type { PaperLookup, PaperMetadata, PaperSearchSource } from "../types.js";
import { BaseProvider, type ProviderOptions } from "./base.js";
import { cleanAuthorName } from "../normalize.js";

const S2_SEARCH_API = "https://api.semanticscholar.org/graph/v1/paper/search";
const S2_FIELDS = "title,authors,year,venue,externalIds";

const S2AuthorSchema = z
  .object({
    authorId: z.string().nullable().optional(),
    name: z.string().nullable().optional(),
  })
  .passthrough();

const S2PaperSchema = z
  .object({
    paperId: z.string().optional(),
    title: z.string().nullable().optional(),
    authors: z.array(S2AuthorSchema).optional(),
    year: z.number().nullable().optional(),
    venue: z.string().nullable().optional(),
    externalIds: z.record(z.unknown()).nullable().optional(),
  })
  .passthrough();

const S2SearchResponseSchema = z
  .object({
    total: z.number().optional(),
    data: z.array(S2PaperSchema).optional(),
  })
  .passthrough();

type S2Paper = z.infer<typeof S2PaperSchema>;

export interface SemanticScholarOptions extends ProviderOptions {
  apiKey?: string;
}

export class SemanticScholarProvider extends BaseProvider implements PaperSearchSource {
  readonly name = "semantic_scholar";
  private readonly apiKey?: string;

  constructor(options: SemanticScholarOptions = {}) {
    super(options);
    this.apiKey = options.apiKey;
  }

  /**
   * Search by title alone; author names in the query make the ranking worse
   * for papers with long author lists
   */
  async searchByTitle(title: string, _authors: string[] = []): Promise<PaperLookup> {
    this.log(`Querying Semantic Scholar for: ${title.slice(0, 50)}...`);

    const url = new URL(S2_SEARCH_API);
    url.searchParams.set("query", title);
    url.searchParams.set("limit", "1");
    url.searchParams.set("fields", S2_FIELDS);

    try {
      const response = await this.get(url.toString(), this.apiKey ? { "x-api-key": this.apiKey } : {});

      if (!response.ok) {
        return this.apiError(`Semantic Scholar API error: ${response.status}`, response.status);
      }

      const parsed = S2SearchResponseSchema.safeParse(await this.readJson(response));
      if (!parsed.success) {
        return this.invalidResponse("Semantic Scholar response is not a search result");
      }

      const top = parsed.data.data?.[0];
      if (!top) {
        return this.notFound(`No Semantic Scholar results for "${title}"`);
      }

      return this.found(this.toPaperMetadata(top));
    } catch (err) {
      return this.caught(err);
    }
  }

  private toPaperMetadata(paper: S2Paper): PaperMetadata {
    const doi = paper.externalIds?.DOI;
    return {
      doi: typeof doi === "string" ? doi : undefined,
      title: paper.title ?? undefined,
      authors: (paper.authors ?? [])
        .map((a) => a.name ?? "")
        .filter(Boolean)
        .map(cleanAuthorName),
      year: paper.year ?? undefined,
      venue: paper.venue || undefined,
      raw: paper,
    };
  }
}
