import fs from "fs/promises";
import { parseBibtex, type CitationEntry } from "@bibverify/refcheck";

export interface SelectionOptions {
  /** 1-based, inclusive */
  start?: number;
  /** 1-based, inclusive */
  end?: number;
  key?: string;
}

/** How many keys to list when a requested key is missing */
const KEY_HINT_LIMIT = 10;

/**
 * Read and parse a BibTeX file
 */
export async function readBibFile(filePath: string): Promise<CitationEntry[]> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      throw new Error(`BibTeX file not found: ${filePath}`);
    }
    throw err;
  }
  return parseBibtex(text);
}

/**
 * Pick the entries to verify: one key, or a 1-based inclusive range
 */
export function selectEntries(entries: CitationEntry[], options: SelectionOptions): CitationEntry[] {
  if (options.key) {
    const selected = entries.filter((entry) => entry.key === options.key);
    if (!selected.length) {
      const keys = entries.slice(0, KEY_HINT_LIMIT).map((entry) => entry.key);
      const hint = keys.length ? `. Available keys: ${keys.join(", ")}` : "";
      throw new Error(`Citation key not found: ${options.key}${hint}`);
    }
    return selected;
  }

  const { start, end } = options;
  if (start === undefined || end === undefined) {
    throw new Error("Must specify either --key or both --start and --end");
  }

  if (!Number.isInteger(start) || !Number.isInteger(end) || start < 1 || end > entries.length || start > end) {
    throw new Error(`Invalid range ${start}-${end}. File has ${entries.length} entries.`);
  }

  return entries.slice(start - 1, end);
}
