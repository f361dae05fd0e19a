// Note construction
// - one document → one Note (backlinks are attached in a later pass)

import path from "node:path";

import { metadataTags, parseDocument, resolveTitle } from "../vault/frontMatter.js";
import { createExcerpt, DEFAULT_EXCERPT_LENGTH } from "../vault/plainText.js";
import {
  extractOutgoingSlugs,
  outputPathFromRelPath,
  rewriteInternalLinks,
  slugFromRelPath,
} from "./links.js";
import type { Note, RenderMarkdown } from "./types.js";

export type NoteSource = {
  absPath: string;
  relPath: string;
  text: string;
  mtimeMs?: number;
};

export type BuildNoteOptions = {
  rootAbsPath: string;
  render: RenderMarkdown;
  excerptLength?: number;
};

function fileStem(relPath: string): string {
  const base = path.posix.basename(relPath);
  const ext = path.posix.extname(base);
  return ext ? base.slice(0, -ext.length) : base;
}

export function buildNote(source: NoteSource, options: BuildNoteOptions): Note {
  const { metadata, body } = parseDocument(source.text);

  return {
    sourcePath: source.absPath,
    relativePath: source.relPath,
    slug: slugFromRelPath(source.relPath),
    title: resolveTitle(metadata, body, fileStem(source.relPath)),
    tags: metadataTags(metadata),
    body,
    renderedHtml: rewriteInternalLinks(options.render(body)),
    excerpt: createExcerpt(body, options.excerptLength ?? DEFAULT_EXCERPT_LENGTH),
    outputPath: outputPathFromRelPath(source.relPath),
    outgoingSlugs: extractOutgoingSlugs(body, path.dirname(source.absPath), options.rootAbsPath),
    backlinks: [],
    updatedAt: source.mtimeMs === undefined ? null : new Date(source.mtimeMs),
  };
}
