import type { Note } from "../../graph/types.js";
import { buildTagPaths, collectTags, type TagGroups } from "../../tags/tagIndex.js";

export type IndexedTags = {
  tagGroups: TagGroups;
  tagPaths: Map<string, string>;
};

export function indexTagsStage(notes: Iterable<Note>, tagScriptChars?: string): IndexedTags {
  const tagGroups = collectTags(notes);
  const tagPaths = buildTagPaths(
    tagGroups.keys(),
    tagScriptChars !== undefined ? { scriptChars: tagScriptChars } : {},
  );
  return { tagGroups, tagPaths };
}
