export function slugify(text: string): string {
  return text.toString().toLowerCase().trim().replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '');
}

/** UTC ISO-8601 made safe for file names (`:` becomes `-`). */
export function fileTimestamp(date: Date): string {
  return date.toISOString().replace(/:/g, '-');
}
