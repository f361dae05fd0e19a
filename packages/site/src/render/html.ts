// HTML string helpers
// - escaping and page-relative URLs

import path from "node:path";

const ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#x27;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => ESCAPES[ch] ?? ch);
}

/**
 * URL of `toPath` as seen from the page at `fromPath` (both site-relative).
 * A `fromPath` without an extension is treated as a directory.
 */
export function relativeUrl(fromPath: string, toPath: string): string {
  const fromDir = path.posix.extname(fromPath) ? path.posix.dirname(fromPath) : fromPath;
  return path.posix.relative(fromDir, toPath);
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

export function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
}

export function formatDateTime(date: Date): string {
  return `${formatDate(date)} ${pad2(date.getHours())}:${pad2(date.getMinutes())}`;
}
