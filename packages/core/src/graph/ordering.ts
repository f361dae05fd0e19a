import type { Note } from "./types.js";

/**
 * Orders strings by Unicode code point. Plain `<` compares UTF-16 code units,
 * which puts astral characters (emoji) before high BMP ones such as fullwidth forms.
 */
export function compareText(a: string, b: string): number {
  let i = 0;
  while (i < a.length && i < b.length) {
    const left = a.codePointAt(i) ?? 0;
    const right = b.codePointAt(i) ?? 0;
    if (left !== right) return left < right ? -1 : 1;
    i += left > 0xffff ? 2 : 1;
  }
  return Math.sign(a.length - b.length);
}

// (lower-cased title, slug) ascending
export function compareNotesByTitle(a: Pick<Note, "title" | "slug">, b: Pick<Note, "title" | "slug">): number {
  return compareText(a.title.toLowerCase(), b.title.toLowerCase()) || compareText(a.slug, b.slug);
}

export function sortNotesByTitle<T extends Pick<Note, "title" | "slug">>(notes: Iterable<T>): T[] {
  return [...notes].sort(compareNotesByTitle);
}
