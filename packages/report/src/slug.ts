/**
 * URL-style slug: ASCII letters, digits, underscores and single hyphens.
 *
 * "Cost of Funds & Fees" → "cost-of-funds-fees"
 */
export function slugify(text: string): string {
  return text
    .normalize("NFKD")
    .replace(/[^\x00-\x7F]/g, "")
    .toLowerCase()
    .replace(/[^\w\s-]/g, "")
    .replace(/[-\s]+/g, "-")
    .replace(/^[-_]+|[-_]+$/g, "");
}
