const OPENERS = new Set(["{", "["]);
const CLOSERS = new Set(["}", "]"]);

/**
 * Return the first balanced `{...}` / `[...]` region of `text`, or "" when the
 * first opening bracket is never balanced.
 *
 * Any opener raises the depth and any closer lowers it; bracket kinds are not
 * paired and string literals are not special-cased. JSON.parse downstream
 * rejects whatever this lets through.
 */
export function extractFirstStructuredBlock(text: string): string {
  let start = -1;
  let depth = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (start === -1) {
      if (OPENERS.has(ch)) {
        start = i;
        depth = 1;
      }
      continue;
    }
    if (OPENERS.has(ch)) {
      depth++;
    } else if (CLOSERS.has(ch)) {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return "";
}
