import type { BacklinkStats } from "../graph/backlinks.js";
import type { Note, NoteMap, RenderMarkdown, Slug } from "../graph/types.js";
import type { SearchRecord } from "../search/searchRecords.js";
import type { TagGroups } from "../tags/tagIndex.js";

export type BuildLogger = {
  log?: (line: string) => void;
};

export type BuildKnowledgeBaseOptions = {
  sourceDir: string;
  render: RenderMarkdown;
  excerptLength?: number;
  baseUrl?: string;
  tagScriptChars?: string;
  logger?: BuildLogger;
};

export type KnowledgeBaseStats = BacklinkStats & {
  notes: number;
  tags: number;
};

export type KnowledgeBase = {
  root: string;
  notes: NoteMap;
  tagGroups: TagGroups;
  tagPaths: ReadonlyMap<string, string>;
  searchRecords: SearchRecord[];
  stats: KnowledgeBaseStats;
};

export type LoadedNotes = {
  root: string;
  notes: Map<Slug, Note>;
};
