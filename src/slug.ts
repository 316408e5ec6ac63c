/**
 * URL-safe identifier for a color name, shared by SVG group ids and STL file names.
 * e.g. "Sky Blue" -> "sky-blue"
 */
export function slugify(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}
