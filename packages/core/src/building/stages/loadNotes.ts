import { DuplicateSlugError } from "../../errors.js";
import { buildNote } from "../../graph/note.js";
import type { Note, Slug } from "../../graph/types.js";
import { listMarkdownFiles, readUtf8File, statMarkdownFile } from "../../vault/filesystem.js";

import type { BuildKnowledgeBaseOptions, LoadedNotes } from "../types.js";

/**
 * Keys notes by slug. Two notes with the same slug raise `DuplicateSlugError`
 * instead of the later one replacing the earlier.
 */
export function indexNotesBySlug(notes: Iterable<Note>): Map<Slug, Note> {
  const bySlug = new Map<Slug, Note>();
  for (const note of notes) {
    const existing = bySlug.get(note.slug);
    if (existing) {
      throw new DuplicateSlugError(note.slug, existing.relativePath, note.relativePath);
    }
    bySlug.set(note.slug, note);
  }
  return bySlug;
}

export async function loadNotesStage(
  root: string,
  options: Pick<BuildKnowledgeBaseOptions, "render" | "excerptLength">,
): Promise<LoadedNotes> {
  const loaded: Note[] = [];

  for (const absPath of await listMarkdownFiles(root)) {
    const file = await statMarkdownFile(root, absPath);
    const text = await readUtf8File(file.absPath);

    loaded.push(
      buildNote(
        { absPath: file.absPath, relPath: file.relPath, text, mtimeMs: file.mtimeMs },
        {
          rootAbsPath: root,
          render: options.render,
          ...(options.excerptLength !== undefined ? { excerptLength: options.excerptLength } : {}),
        },
      ),
    );
  }

  return { root, notes: indexNotesBySlug(loaded) };
}
