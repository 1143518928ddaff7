/**
 * identity derivation for new event documents.
 * identity is the filename: `<target>-<slug>.md`, or `<target>.md` when
 * nothing sluggable is known. collisions get `-2`, `-3`, ... suffixes.
 */

import type { IsoDate } from "./dates.js";

const MARKDOWN_LINK = /\[([^\]]*)\]\([^)]*\)/g;

export const IDENTITY_PATTERN = /^[^/\\]+\.md$/;

export function isValidIdentity(identity: string): boolean {
  return IDENTITY_PATTERN.test(identity) && !identity.startsWith(".");
}

export function slugify(text: string | undefined): string {
  if (!text) return "";
  return text
    .replace(MARKDOWN_LINK, "$1")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 50)
    .replace(/-+$/, "");
}

/**
 * prefers the extractor's slug (ASCII even for non-latin titles), then the
 * title. `taken` holds every identity already on disk, malformed ones too.
 */
export function deriveIdentity(
  target: IsoDate,
  label: { slug?: string; title?: string },
  taken: ReadonlySet<string>,
): string {
  const slug = slugify(label.slug) || slugify(label.title);
  const base = slug ? `${target}-${slug}` : target;

  let candidate = `${base}.md`;
  for (let n = 2; taken.has(candidate); n++) {
    candidate = `${base}-${n}.md`;
  }
  return candidate;
}
