// Tag index
// - tag → notes grouping
// - tag → unique output path (`tags/<name>.html`)

import { ConfigurationError } from "../errors.js";
import { compareText, sortNotesByTitle } from "../graph/ordering.js";
import type { Note } from "../graph/types.js";

/** Hiragana, katakana, prolonged sound mark and common kanji. */
export const DEFAULT_TAG_SCRIPT_CHARS = "ぁ-んァ-ヴー一-龯";

export const TAG_PAGE_DIR = "tags";

export type TagGroups = Map<string, Note[]>;

export type TagPathOptions = {
  scriptChars?: string;
};

function compareTagKeys(a: string, b: string): number {
  return compareText(a.toLowerCase(), b.toLowerCase());
}

/**
 * Groups notes by each declared tag. Groups are keyed in case-insensitive tag
 * order and each group is sorted by (lower-cased title, slug).
 */
export function collectTags(notes: Iterable<Note>): TagGroups {
  const byTag = new Map<string, Note[]>();
  for (const note of notes) {
    for (const tag of note.tags) {
      const group = byTag.get(tag);
      if (group) {
        group.push(note);
      } else {
        byTag.set(tag, [note]);
      }
    }
  }

  const tags = [...byTag.keys()].sort(compareTagKeys);
  return new Map(tags.map((tag): [string, Note[]] => [tag, sortNotesByTitle(byTag.get(tag) ?? [])]));
}

// RFC 3986 unreserved characters stay as they are; everything else is %XX
function percentEncode(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

// Characters that would end or escape the surrounding character class
const CLASS_SYNTAX_CHARS = /[[\]\\]/;

// Ranges in the allow-list may still cover these; they never reach a file name
const PATH_SEPARATORS = /[/\\]/g;

export function isValidTagScriptChars(scriptChars: string): boolean {
  if (CLASS_SYNTAX_CHARS.test(scriptChars)) return false;
  try {
    new RegExp(`[${scriptChars}]`, "u");
    return true;
  } catch {
    return false;
  }
}

/**
 * Compiles the pattern of characters dropped from tag file names.
 * `scriptChars` is a character-class body such as `α-ω` without brackets or escapes.
 */
export function compileTagCharFilter(scriptChars: string = DEFAULT_TAG_SCRIPT_CHARS): RegExp {
  if (!isValidTagScriptChars(scriptChars)) {
    throw new ConfigurationError(`Invalid tag script characters: "${scriptChars}"`, { scriptChars });
  }
  return new RegExp(`[^0-9A-Za-z\\-_.${scriptChars}]+`, "gu");
}

function sanitizeTag(tag: string, disallowed: RegExp): string {
  let safe = tag.trim().replace(/\s+/g, "-");
  safe = safe.replace(disallowed, "").replace(PATH_SEPARATORS, "");
  if (!safe) safe = percentEncode(tag);
  return safe.toLowerCase();
}

/**
 * File-name identifier for a tag. Whitespace runs become `-`, characters
 * outside the allow-list are dropped, and the result is lower-cased. A tag
 * with nothing left falls back to its percent-encoded form.
 */
export function slugifyTag(tag: string, options: TagPathOptions = {}): string {
  return sanitizeTag(tag, compileTagCharFilter(options.scriptChars));
}

/**
 * Assigns every tag a distinct output path.
 *
 * Tags are visited in case-insensitive order (stable for ties) and a tag whose
 * identifier is already taken gets `-2`, `-3`, … appended. The suffix a tag
 * receives therefore depends on the tags sorted before it.
 */
export function buildTagPaths(tags: Iterable<string>, options: TagPathOptions = {}): Map<string, string> {
  const disallowed = compileTagCharFilter(options.scriptChars);
  const used = new Set<string>();
  const tagPaths = new Map<string, string>();

  for (const tag of [...tags].sort(compareTagKeys)) {
    if (tagPaths.has(tag)) continue;

    const base = sanitizeTag(tag, disallowed);
    let candidate = base;
    let counter = 1;
    while (used.has(candidate)) {
      counter += 1;
      candidate = `${base}-${counter}`;
    }
    used.add(candidate);
    tagPaths.set(tag, `${TAG_PAGE_DIR}/${candidate}.html`);
  }

  return tagPaths;
}
