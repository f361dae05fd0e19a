// Search records
// - flat per-note projection consumed by the client-side search page

import { sortNotesByTitle } from "../graph/ordering.js";
import type { Note } from "../graph/types.js";
import { toPlainText } from "../vault/plainText.js";

export type SearchRecord = {
  title: string;
  url: string;
  tags: string[];
  excerpt: string;
  plainTextContent: string;
};

export function joinBaseUrl(baseUrl: string, urlPath: string): string {
  if (!baseUrl) return urlPath;
  return `${baseUrl.replace(/\/+$/, "")}/${urlPath.replace(/^\/+/, "")}`;
}

export function buildSearchRecords(notes: Iterable<Note>, baseUrl = ""): SearchRecord[] {
  return sortNotesByTitle(notes).map((note) => ({
    title: note.title,
    url: joinBaseUrl(baseUrl, note.outputPath),
    tags: [...note.tags],
    excerpt: note.excerpt,
    plainTextContent: toPlainText(note.body),
  }));
}
