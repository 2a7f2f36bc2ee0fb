/**
 * Crossref Provider
 *
 * Primary registry: full work metadata by DOI.
 * Official DOI registry, authoritative for DOI metadata.
 */

import { z } from "zod";
import type { DoiMetadataSource, PaperLookup, PaperMetadata } from "../types.js";
import { BaseProvider } from "./base.js";
import { cleanAuthorName } from "../normalize.js";

const CROSSREF_API = "https://api.crossref.org/works";

const CrossrefDateSchema = z
  .object({
    "date-parts": z.array(z.array(z.number().nullable())).optional(),
  })
  .passthrough();

const CrossrefAuthorSchema = z
  .object({
    given: z.string().optional(),
    family: z.string().optional(),
    name: z.string().optional(),
  })
  .passthrough();

const CrossrefWorkSchema = z
  .object({
    DOI: z.string().optional(),
    title: z.array(z.string()).optional(),
    author: z.array(CrossrefAuthorSchema).optional(),
    published: CrossrefDateSchema.optional(),
    created: CrossrefDateSchema.optional(),
    "container-title": z.array(z.string()).optional(),
    publisher: z.string().optional(),
    type: z.string().optional(),
  })
  .passthrough();

const CrossrefResponseSchema = z.object({
  message: CrossrefWorkSchema,
});

type CrossrefWork = z.infer<typeof CrossrefWorkSchema>;
type CrossrefDate = z.infer<typeof CrossrefDateSchema>;

export class CrossrefProvider extends BaseProvider implements DoiMetadataSource {
  readonly name = "crossref";

  async lookupByDoi(doi: string): Promise<PaperLookup> {
    this.log(`Querying Crossref for DOI: ${doi}`);

    try {
      const response = await this.get(`${CROSSREF_API}/${encodeURIComponent(doi)}`);

      if (response.status === 404) {
        return this.notFound(`DOI not registered with Crossref: ${doi}`, 404);
      }
      if (!response.ok) {
        return this.apiError(`Crossref API error: ${response.status}`, response.status);
      }

      const parsed = CrossrefResponseSchema.safeParse(await this.readJson(response));
      if (!parsed.success) {
        return this.invalidResponse("Crossref response has no work message");
      }

      return this.found(this.toPaperMetadata(parsed.data.message));
    } catch (err) {
      return this.caught(err);
    }
  }

  private toPaperMetadata(work: CrossrefWork): PaperMetadata {
    const venue = work["container-title"]?.[0] || work.publisher;
    return {
      doi: work.DOI,
      title: work.title?.[0],
      authors: (work.author ?? []).map(formatAuthor).filter(Boolean).map(cleanAuthorName),
      year: yearOf(work.published) ?? yearOf(work.created),
      venue: venue || undefined,
      type: work.type,
      raw: work,
    };
  }
}

function formatAuthor(author: z.infer<typeof CrossrefAuthorSchema>): string {
  if (author.name) return author.name;
  return [author.given, author.family].filter(Boolean).join(" ");
}

function yearOf(date: CrossrefDate | undefined): number | undefined {
  return date?.["date-parts"]?.[0]?.[0] ?? undefined;
}
