/**
 * doi.org Handle System Provider
 *
 * Secondary registry: confirms that a DOI exists when Crossref does not
 * index it (DataCite DOIs, arXiv preprints). Carries no bibliographic
 * metadata.
 */

import { z } from "zod";
import type { DoiHandleSource, HandleLookup, HandleValue } from "../types.js";
import { BaseProvider } from "./base.js";

const HANDLE_API = "https://doi.org/api/handles";

/** Handle System responseCode for a resolved handle */
const HANDLE_FOUND = 1;

const HandleValueSchema = z
  .object({
    index: z.number().optional(),
    type: z.string(),
    data: z
      .object({
        format: z.string().optional(),
        value: z.unknown(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

const HandleResponseSchema = z
  .object({
    responseCode: z.number(),
    handle: z.string().optional(),
    values: z.array(HandleValueSchema).optional(),
  })
  .passthrough();

export class DoiOrgProvider extends BaseProvider implements DoiHandleSource {
  readonly name = "doi.org";

  async lookupByDoi(doi: string): Promise<HandleLookup> {
    this.log(`Querying doi.org for DOI: ${doi}`);

    try {
      const response = await this.get(`${HANDLE_API}/${encodeURIComponent(doi)}`);

      if (response.status === 404) {
        return this.notFound(`Handle not found: ${doi}`, 404);
      }
      if (response.status !== 200) {
        return this.apiError(`doi.org API error: ${response.status}`, response.status);
      }

      const parsed = HandleResponseSchema.safeParse(await this.readJson(response));
      if (!parsed.success) {
        return this.invalidResponse("doi.org response has no responseCode");
      }

      const data = parsed.data;
      if (data.responseCode !== HANDLE_FOUND) {
        return this.notFound(`doi.org responseCode ${data.responseCode}`);
      }

      const values: HandleValue[] = data.values ?? [];
      this.log(`DOI ${doi} exists in doi.org system`);
      return this.found({
        doi,
        exists: true,
        handle: data.handle,
        resolvedUrl: firstUrl(values),
        values,
        raw: data,
      });
    } catch (err) {
      return this.caught(err);
    }
  }
}

function firstUrl(values: HandleValue[]): string | undefined {
  for (const value of values) {
    const url = value.data?.value;
    if (value.type === "URL" && typeof url === "string") {
      return url;
    }
  }
  return undefined;
}
