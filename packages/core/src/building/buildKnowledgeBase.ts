// Knowledge base build pipeline
// - resolve root → load notes → backlinks → tags → search records
// - each stage starts only after the previous one has finished for every note

import { attachBacklinks } from "../graph/backlinks.js";
import { buildSearchRecords } from "../search/searchRecords.js";

import { indexTagsStage } from "./stages/indexTags.js";
import { loadNotesStage } from "./stages/loadNotes.js";
import { resolveCorpusStage } from "./stages/resolveCorpus.js";
import type { BuildKnowledgeBaseOptions, BuildLogger, KnowledgeBase } from "./types.js";

function logLine(logger: BuildLogger | undefined, line: string): void {
  logger?.log?.(line);
}

export async function buildKnowledgeBase(options: BuildKnowledgeBaseOptions): Promise<KnowledgeBase> {
  const root = await resolveCorpusStage(options.sourceDir);
  logLine(options.logger, `[kbforge] source=${root}`);

  const loaded = await loadNotesStage(root, options);
  logLine(options.logger, `[kbforge] notes=${loaded.notes.size}`);

  const linked = attachBacklinks(loaded.notes);
  const totalLinks = linked.stats.backlinks + linked.stats.danglingLinks;
  logLine(options.logger, `[kbforge] links=${linked.stats.backlinks}/${totalLinks}`);

  const { tagGroups, tagPaths } = indexTagsStage(linked.notes.values(), options.tagScriptChars);
  logLine(options.logger, `[kbforge] tags=${tagGroups.size}`);

  const searchRecords = buildSearchRecords(linked.notes.values(), options.baseUrl ?? "");

  return {
    root,
    notes: linked.notes,
    tagGroups,
    tagPaths,
    searchRecords,
    stats: {
      notes: linked.notes.size,
      tags: tagGroups.size,
      backlinks: linked.stats.backlinks,
      danglingLinks: linked.stats.danglingLinks,
    },
  };
}
