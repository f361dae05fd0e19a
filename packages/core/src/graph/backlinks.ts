// Backlink pass
// - runs after every note is loaded so forward references resolve

import { compareText } from "./ordering.js";
import type { Note, NoteMap, NoteRef, Slug } from "./types.js";

export type BacklinkStats = {
  backlinks: number;
  danglingLinks: number;
};

export function toNoteRef(note: Note): NoteRef {
  return { slug: note.slug, title: note.title, outputPath: note.outputPath };
}

/**
 * Returns a new note map whose notes carry their sorted backlinks.
 *
 * Links to slugs outside the map are skipped. Self-links are kept.
 * Backlinks are ordered by referring title (case-insensitive); `Array#sort`
 * is stable, so ties stay in load order.
 */
export function attachBacklinks(notes: NoteMap): { notes: Map<Slug, Note>; stats: BacklinkStats } {
  const incoming = new Map<Slug, NoteRef[]>();
  for (const slug of notes.keys()) incoming.set(slug, []);

  let backlinks = 0;
  let danglingLinks = 0;
  for (const note of notes.values()) {
    for (const slug of note.outgoingSlugs) {
      const refs = incoming.get(slug);
      if (!refs) {
        danglingLinks += 1;
        continue;
      }
      refs.push(toNoteRef(note));
      backlinks += 1;
    }
  }

  const linked = new Map<Slug, Note>();
  for (const [slug, note] of notes) {
    const refs = incoming.get(slug) ?? [];
    refs.sort((a, b) => compareText(a.title.toLowerCase(), b.title.toLowerCase()));
    linked.set(slug, { ...note, backlinks: refs });
  }

  return { notes: linked, stats: { backlinks, danglingLinks } };
}
