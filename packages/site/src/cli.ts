#!/usr/bin/env node
// kbforge CLI
// - markdown notes directory → static site with tags, search and backlinks

import { Command, InvalidArgumentError } from "commander";

import { loadEnv } from "@kbforge/core";

import { generateSite } from "./generateSite.js";
import { resolveSiteOptions } from "./options.js";

type CliFlags = {
  siteTitle?: string;
  baseUrl?: string;
  lang?: string;
  excerptLength?: number;
  tagScriptChars?: string;
  quiet?: boolean;
};

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}".`);
  }
  return n;
}

async function runBuildCommand(
  source: string | undefined,
  destination: string | undefined,
  flags: CliFlags,
): Promise<void> {
  const options = resolveSiteOptions(loadEnv(), {
    sourceDir: source,
    outputDir: destination,
    siteTitle: flags.siteTitle,
    baseUrl: flags.baseUrl,
    lang: flags.lang,
    excerptLength: flags.excerptLength,
    tagScriptChars: flags.tagScriptChars,
  });

  const logger = flags.quiet ? undefined : { log: (line: string) => console.log(line) };
  const summary = await generateSite({ ...options, ...(logger ? { logger } : {}) });

  logger?.log(`[summary] notes=${summary.notes}, tags=${summary.tags}, backlinks=${summary.backlinks}`);
}

const program = new Command();

program
  .name("kbforge")
  .description("Build a static knowledge base site (tags, search, backlinks) from markdown notes")
  .argument("[source]", "directory containing the markdown notes (default: KBFORGE_SOURCE_DIR)")
  .argument("[destination]", "directory the site is written to (default: KBFORGE_OUTPUT_DIR)")
  .option("--site-title <title>", "site-wide title")
  .option("--base-url <url>", "prefix for search index URLs when the site is served from a sub-path (e.g. /notes)")
  .option("--lang <code>", "value of <html lang>")
  .option("--excerpt-length <n>", "maximum excerpt length in characters", parsePositiveInt)
  .option("--tag-script-chars <chars>", "extra characters or ranges kept in tag file names (e.g. α-ω)")
  .option("--quiet", "suppress progress output");

program.action(async (source: string | undefined, destination: string | undefined, opts: CliFlags) => {
  try {
    await runBuildCommand(source, destination, opts);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[kbforge] error: ${message}`);
    process.exitCode = 1;
  }
});

await program.parseAsync(process.argv);
