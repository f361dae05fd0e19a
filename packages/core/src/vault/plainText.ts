// Markdown to plain text projection
// - shared by note excerpts and search records

export const DEFAULT_EXCERPT_LENGTH = 160;

const ELLIPSIS = "…";

/**
 * Drops fenced code, keeps link labels, removes markup characters and
 * collapses whitespace.
 */
export function toPlainText(markdown: string): string {
  const withoutCode = markdown.replace(/```[\s\S]*?```/g, "");
  const withoutLinks = withoutCode.replace(/\[(.*?)\]\([^)]*\)/g, "$1");
  const withoutMarkup = withoutLinks.replace(/[#*>`_~]/g, "");
  return withoutMarkup.split(/\s+/).filter(Boolean).join(" ");
}

/**
 * Plain-text summary of at most `maxLength` characters (code points).
 * A truncated excerpt ends with a single ellipsis.
 */
export function createExcerpt(markdown: string, maxLength: number = DEFAULT_EXCERPT_LENGTH): string {
  const collapsed = toPlainText(markdown);
  const chars = Array.from(collapsed);
  if (chars.length <= maxLength) return collapsed;

  // Trailing ellipses in the source would double up with the appended one
  const head = chars
    .slice(0, Math.max(0, maxLength - 1))
    .join("")
    .replace(/[\s…]+$/u, "");
  return head + ELLIPSIS;
}
