// Static site generation
// - builds the note graph first, then replaces the output directory

import { promises as fs } from "node:fs";
import path from "node:path";

import { buildKnowledgeBase, type BuildLogger, type RenderMarkdown } from "@kbforge/core";

import { readAsset, SITE_ASSETS } from "./assets.js";
import { SITE_PATHS, type SiteChrome } from "./render/layout.js";
import { createMarkdownRenderer } from "./render/markdown.js";
import {
  renderIndexPage,
  renderNotePage,
  renderSearchPage,
  renderTagPages,
  type RenderedPage,
} from "./render/pages.js";
import type { SiteOptions } from "./options.js";

export type GenerateSiteOptions = SiteOptions & {
  render?: RenderMarkdown;
  now?: () => Date;
  logger?: BuildLogger;
};

export type GenerateSiteSummary = {
  notes: number;
  tags: number;
  backlinks: number;
  files: number;
};

async function writeSiteFile(
  outputDir: string,
  sitePath: string,
  contents: string,
  logger: BuildLogger | undefined,
): Promise<void> {
  const absPath = path.join(outputDir, ...sitePath.split("/"));
  await fs.mkdir(path.dirname(absPath), { recursive: true });
  await fs.writeFile(absPath, contents, "utf8");
  logger?.log?.(`[write] ${sitePath}`);
}

export async function generateSite(options: GenerateSiteOptions): Promise<GenerateSiteSummary> {
  const kb = await buildKnowledgeBase({
    sourceDir: options.sourceDir,
    render: options.render ?? createMarkdownRenderer(),
    excerptLength: options.excerptLength,
    baseUrl: options.baseUrl,
    tagScriptChars: options.tagScriptChars,
    ...(options.logger ? { logger: options.logger } : {}),
  });

  const outputDir = path.resolve(options.outputDir);
  await fs.rm(outputDir, { recursive: true, force: true });
  await fs.mkdir(outputDir, { recursive: true });

  const chrome: SiteChrome = {
    siteTitle: options.siteTitle,
    lang: options.lang,
    generatedAt: (options.now ?? (() => new Date()))(),
  };

  let files = 0;
  const write = async (sitePath: string, contents: string) => {
    await writeSiteFile(outputDir, sitePath, contents, options.logger);
    files += 1;
  };

  for (const asset of SITE_ASSETS) {
    await write(asset.sitePath, await readAsset(asset.fileName));
  }
  await write(SITE_PATHS.searchIndex, JSON.stringify(kb.searchRecords, null, 2));

  const pages: RenderedPage[] = [
    renderIndexPage(chrome, kb.notes, kb.tagPaths),
    renderSearchPage(chrome),
    ...renderTagPages(chrome, kb.tagGroups, kb.tagPaths),
    ...Array.from(kb.notes.values(), (note) => renderNotePage(chrome, note, kb.tagPaths)),
  ];
  for (const page of pages) {
    await write(page.path, page.html);
  }

  return {
    notes: kb.stats.notes,
    tags: kb.stats.tags,
    backlinks: kb.stats.backlinks,
    files,
  };
}
