/**
 * BibTeX Reading and Writing
 *
 * A two-stage, best-effort tokenizer: blocks are cut out of the file first,
 * then fields are read from each block body. Anything that does not fit is
 * skipped rather than reported.
 */

import type { CitationEntry } from "./types.js";

/** Entry types that never describe a citation */
const NON_CITATION_TYPES = new Set(["comment", "string", "preamble"]);

/** Field order used when writing an entry back out */
export const CANONICAL_FIELD_ORDER = [
  "author",
  "title",
  "booktitle",
  "journal",
  "year",
  "month",
  "volume",
  "number",
  "pages",
  "publisher",
  "address",
  "organization",
  "editor",
  "series",
  "edition",
  "chapter",
  "note",
  "doi",
  "url",
  "isbn",
  "issn",
  "eprint",
  "archiveprefix",
  "primaryclass",
] as const;

/**
 * Raw entry block before field extraction
 */
export interface BibtexBlock {
  type: string;
  key: string;
  body: string;
}

// =============================================================================
// Stage 1: blocks
// =============================================================================

const HEADER = /@(\w+)\s*\{/g;
const KEY = /\s*([^,\s{}]+)\s*,/y;
/** A line holding only the closing brace */
const CLOSING_LINE = /\r?\n\}[ \t]*\r?(?=\n|$)/g;
/** Another entry starting a line, indented or not */
const NEXT_HEADER = /\n[ \t]*@\w+\s*\{/g;

/**
 * Cut `@type{key, ...}` blocks out of a file.
 *
 * A block must have a comma-terminated key and end at a line consisting of
 * `}`. A block whose closing line comes after the start of the next entry is
 * dropped, so one broken entry never swallows its neighbour.
 */
export function extractBlocks(text: string): BibtexBlock[] {
  const blocks: BibtexBlock[] = [];
  HEADER.lastIndex = 0;

  let header: RegExpExecArray | null;
  while ((header = HEADER.exec(text)) !== null) {
    const type = header[1];
    const afterBrace = HEADER.lastIndex;

    KEY.lastIndex = afterBrace;
    const key = KEY.exec(text);
    if (!key) continue;
    const bodyStart = KEY.lastIndex;

    CLOSING_LINE.lastIndex = bodyStart;
    const closing = CLOSING_LINE.exec(text);
    if (!closing) continue;

    NEXT_HEADER.lastIndex = bodyStart;
    const next = NEXT_HEADER.exec(text);
    if (next && next.index < closing.index) {
      HEADER.lastIndex = next.index;
      continue;
    }

    HEADER.lastIndex = closing.index + closing[0].length;
    if (NON_CITATION_TYPES.has(type.toLowerCase())) continue;

    blocks.push({ type, key: key[1], body: text.slice(bodyStart, closing.index) });
  }

  return blocks;
}

// =============================================================================
// Stage 2: fields
// =============================================================================

const FIELD_NAME = /\s*(\w+)\s*=\s*/y;
const BARE_VALUE = /[^\s,{}"]+/y;

interface ValueToken {
  text: string;
  end: number;
}

function readBraced(body: string, start: number): ValueToken | null {
  let depth = 0;
  for (let i = start; i < body.length; i++) {
    const ch = body[i];
    if (ch === "{") {
      depth++;
    } else if (ch === "}") {
      depth--;
      if (depth === 0) {
        return { text: body.slice(start + 1, i), end: i + 1 };
      }
    }
  }
  return null;
}

function readQuoted(body: string, start: number): ValueToken | null {
  let depth = 0;
  for (let i = start + 1; i < body.length; i++) {
    const ch = body[i];
    if (ch === "{") depth++;
    else if (ch === "}") depth--;
    else if (ch === '"' && depth === 0) {
      return { text: body.slice(start + 1, i), end: i + 1 };
    }
  }
  return null;
}

function readValue(body: string, start: number): ValueToken | null {
  const ch = body[start];
  if (ch === "{") return readBraced(body, start);
  if (ch === '"') return readQuoted(body, start);

  BARE_VALUE.lastIndex = start;
  const bare = BARE_VALUE.exec(body);
  return bare ? { text: bare[0], end: BARE_VALUE.lastIndex } : null;
}

/** Position just past the next comma or newline */
function skipPast(body: string, from: number): number {
  for (let i = from; i < body.length; i++) {
    if (body[i] === "," || body[i] === "\n") return i + 1;
  }
  return body.length;
}

/**
 * Read `name = {value}` pairs from a block body.
 *
 * Braced values may nest braces; `"quoted"` and bare values such as
 * `year = 2020` are accepted too. Names are lowercased and values trimmed;
 * when a name repeats, the last value wins.
 */
export function extractFields(body: string): Record<string, string> {
  const fields = new Map<string, string>();
  let pos = 0;

  while (pos < body.length) {
    FIELD_NAME.lastIndex = pos;
    const name = FIELD_NAME.exec(body);
    if (!name) {
      pos = skipPast(body, pos);
      continue;
    }

    const valueStart = FIELD_NAME.lastIndex;
    const value = readValue(body, valueStart);
    if (!value) {
      pos = skipPast(body, valueStart);
      continue;
    }

    fields.set(name[1].toLowerCase(), value.text.trim());
    pos = value.end;
  }

  return Object.fromEntries(fields);
}

/**
 * Parse every citation entry in a BibTeX file
 */
export function parseBibtex(text: string): CitationEntry[] {
  return extractBlocks(text).map((block) => ({
    key: block.key,
    type: block.type,
    fields: extractFields(block.body),
  }));
}

// =============================================================================
// Writing
// =============================================================================

/**
 * Serialize an entry: canonical fields first, then the rest alphabetically
 */
export function formatEntry(type: string, key: string, fields: Record<string, string>): string {
  const remaining = new Map(Object.entries(fields));
  const lines = [`@${type}{${key},`];

  for (const name of CANONICAL_FIELD_ORDER) {
    const value = remaining.get(name);
    if (value === undefined) continue;
    lines.push(`  ${name} = {${value}},`);
    remaining.delete(name);
  }

  const rest = [...remaining.keys()].sort();
  for (const name of rest) {
    lines.push(`  ${name} = {${remaining.get(name) ?? ""}},`);
  }

  lines.push("}");
  return lines.join("\n");
}
