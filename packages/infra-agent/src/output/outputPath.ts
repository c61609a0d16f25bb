import { existsSync } from "node:fs";
import { join } from "node:path";

export const DEFAULT_SLUG_MAX_LENGTH = 60;
export const FALLBACK_SLUG = "generated-tf";
/** Words of the spec used to name its output directory. */
const SPEC_SLUG_WORDS = 8;

function trimHyphens(value: string): string {
  return value.replace(/^-+|-+$/g, "");
}

/**
 * Filesystem-safe slug: lowercase, runs of anything but [a-z0-9] collapsed to
 * one hyphen, no leading or trailing hyphen, at most `maxLength` characters.
 */
export function slugify(
  text: string,
  maxLength: number = DEFAULT_SLUG_MAX_LENGTH,
): string {
  const slug = trimHyphens(
    trimHyphens(text.trim().toLowerCase().replace(/[^a-z0-9]+/g, "-")).slice(
      0,
      maxLength,
    ),
  );
  return slug || FALLBACK_SLUG;
}

export function slugFromSpec(specText: string): string {
  const head = specText.split(/\s+/).filter(Boolean).slice(0, SPEC_SLUG_WORDS);
  return slugify(head.join(" "));
}

/**
 * First of `<base>/<slug>`, `<base>/<slug>-2`, `<base>/<slug>-3`, ... that does
 * not exist yet. Nothing is created; two concurrent callers can get the same
 * answer.
 */
export function allocateOutputDir(baseDir: string, slug: string): string {
  const candidate = join(baseDir, slug);
  if (!existsSync(candidate)) return candidate;
  for (let i = 2; ; i++) {
    const alt = join(baseDir, `${slug}-${i}`);
    if (!existsSync(alt)) return alt;
  }
}

export function deriveOutputDir(specText: string, baseDir: string): string {
  return allocateOutputDir(baseDir, slugFromSpec(specText));
}
