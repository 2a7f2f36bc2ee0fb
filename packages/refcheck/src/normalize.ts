/**
 * String Normalization Utilities
 *
 * Name canonicalization and string similarity used when comparing claimed
 * citation metadata against registry records.
 */

/** LaTeX accent commands whose argument is a single character */
const BRACED_ACCENT = /\\['"`^~=.]?\{(.)\}/g;
const BARE_ACCENT = /\\['"`^~=.](.)/g;

/** Sequences at least this long get the popular-element heuristic */
const AUTOJUNK_MIN_LENGTH = 200;

/**
 * Basic normalization: lowercase, remove diacritics, collapse whitespace
 */
export function normalizeString(str: string): string {
  return str
    .toLowerCase()
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "") // Remove diacritics
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Normalize an author name for comparison.
 *
 * Decodes accent escapes such as `\"{u}`, `\'e` and `{\"o}` to the bare
 * letter, then applies {@link normalizeString}. Idempotent.
 */
export function cleanAuthorName(name: string): string {
  const decoded = name
    .replace(BRACED_ACCENT, "$1")
    .replace(BARE_ACCENT, "$1")
    .replace(/[{}]/g, "");
  return normalizeString(decoded);
}

/**
 * Split a BibTeX author field into normalized names.
 *
 * "Smith, John and Jane Doe" → ["john smith", "jane doe"]
 */
export function parseAuthors(authorString: string | undefined): string[] {
  if (!authorString) return [];

  const names: string[] = [];
  for (const author of authorString.split(/\s+and\s+/)) {
    let name: string;
    if (author.includes(",")) {
      const parts = author.split(",");
      const last = parts[0].trim();
      const first = parts[1]?.trim() ?? "";
      name = `${first} ${last}`.trim();
    } else {
      name = author.trim();
    }
    if (!name) continue;

    const cleaned = cleanAuthorName(name);
    if (cleaned) names.push(cleaned);
  }
  return names;
}

/**
 * Strip a resolver prefix from a DOI while keeping its case, so the value
 * sent to a registry is the one the author wrote
 */
export function stripDoiPrefix(doi: string): string {
  const trimmed = doi.trim();
  const match = trimmed.match(/^(?:https?:\/\/(?:dx\.)?doi\.org\/|doi:)/i);
  return match ? trimmed.slice(match[0].length) : trimmed;
}

/**
 * Comparable form of a DOI: no resolver prefix, lowercased
 */
export function normalizeDoi(doi: string): string {
  return stripDoiPrefix(doi).toLowerCase();
}

// =============================================================================
// Similarity
// =============================================================================

interface MatchingBlock {
  a: number;
  b: number;
  size: number;
}

/**
 * Index of every position of each element in `b`, minus elements that are
 * too common in long sequences to anchor a match
 */
function buildIndex(b: string[]): Map<string, number[]> {
  const index = new Map<string, number[]>();
  b.forEach((ch, j) => {
    const positions = index.get(ch);
    if (positions) {
      positions.push(j);
    } else {
      index.set(ch, [j]);
    }
  });

  if (b.length >= AUTOJUNK_MIN_LENGTH) {
    const limit = Math.floor(b.length / 100) + 1;
    for (const [ch, positions] of index) {
      if (positions.length > limit) index.delete(ch);
    }
  }

  return index;
}

/**
 * Longest common run in a[alo:ahi] and b[blo:bhi]; ties go to the earliest
 * run in `a`, then in `b`
 */
function findLongestMatch(
  a: string[],
  b: string[],
  index: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number
): MatchingBlock {
  let besti = alo;
  let bestj = blo;
  let bestsize = 0;
  let runs = new Map<number, number>();

  for (let i = alo; i < ahi; i++) {
    const nextRuns = new Map<number, number>();
    for (const j of index.get(a[i]) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const k = (runs.get(j - 1) ?? 0) + 1;
      nextRuns.set(j, k);
      if (k > bestsize) {
        besti = i - k + 1;
        bestj = j - k + 1;
        bestsize = k;
      }
    }
    runs = nextRuns;
  }

  // Popular elements were left out of the index; absorb them at the edges
  while (besti > alo && bestj > blo && a[besti - 1] === b[bestj - 1]) {
    besti--;
    bestj--;
    bestsize++;
  }
  while (
    besti + bestsize < ahi &&
    bestj + bestsize < bhi &&
    a[besti + bestsize] === b[bestj + bestsize]
  ) {
    bestsize++;
  }

  return { a: besti, b: bestj, size: bestsize };
}

function matchingBlocks(a: string[], b: string[]): MatchingBlock[] {
  const index = buildIndex(b);
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  const blocks: MatchingBlock[] = [];

  let range = queue.pop();
  while (range) {
    const [alo, ahi, blo, bhi] = range;
    const block = findLongestMatch(a, b, index, alo, ahi, blo, bhi);
    if (block.size > 0) {
      blocks.push(block);
      if (alo < block.a && blo < block.b) {
        queue.push([alo, block.a, blo, block.b]);
      }
      if (block.a + block.size < ahi && block.b + block.size < bhi) {
        queue.push([block.a + block.size, ahi, block.b + block.size, bhi]);
      }
    }
    range = queue.pop();
  }

  return blocks.sort((x, y) => x.a - y.a || x.b - y.b);
}

/**
 * Similarity ratio between two strings, 0.0 to 1.0.
 *
 * Case-insensitive. Computed as 2·M / (|a| + |b|) where M is the number of
 * characters in the longest matching blocks found by recursive longest
 * common substring search. Two empty strings score 1.0.
 */
export function similarityRatio(str1: string, str2: string): number {
  const a = Array.from(str1.toLowerCase());
  const b = Array.from(str2.toLowerCase());
  const total = a.length + b.length;
  if (total === 0) return 1;

  const matched = matchingBlocks(a, b).reduce((sum, block) => sum + block.size, 0);
  return (2 * matched) / total;
}
