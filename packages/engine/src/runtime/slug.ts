/**
 * Lower-case, dash-separated form of a name ("Old  Tom's Dog" -> "old-toms-dog")
 */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .trim()
    .replace(/[^\w\s-]/g, "")
    .replace(/[\s_-]+/g, "-")
    .replace(/^-+|-+$/g, "");
}
