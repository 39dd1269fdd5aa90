import anyAscii from "any-ascii";

/**
 * Convert a string to a URL-safe slug. Letters from other scripts are
 * transliterated first, so "Кино" becomes "kino".
 */
export function slugify(text: string): string {
  return anyAscii(text.normalize("NFC"))
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/**
 * Generate a unique slug by appending a counter if needed.
 * Text that slugs to nothing uses `fallback` as its base.
 */
export function uniqueSlug(text: string, existing: Set<string>, fallback = "untitled"): string {
  const base = slugify(text) || fallback;
  if (!existing.has(base)) {
    existing.add(base);
    return base;
  }
  let i = 2;
  while (existing.has(`${base}-${i}`)) i++;
  const slug = `${base}-${i}`;
  existing.add(slug);
  return slug;
}
