// Environment variable loading
// - shared defaults for the site generator and its CLI

import { config as loadDotenv } from "dotenv";

import { ConfigurationError } from "./errors.js";
import { DEFAULT_TAG_SCRIPT_CHARS } from "./tags/tagIndex.js";
import { DEFAULT_EXCERPT_LENGTH } from "./vault/plainText.js";

export type KbforgeEnv = {
  sourceDir: string | undefined;
  outputDir: string | undefined;
  siteTitle: string;
  baseUrl: string;
  lang: string;
  excerptLength: number;
  tagScriptChars: string;
};

export const DEFAULT_SITE_TITLE = "My Knowledge Base";

function nonEmptyOrUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim() ?? "";
  return trimmed ? trimmed : undefined;
}

export function parseExcerptLength(raw: string | undefined, name = "KBFORGE_EXCERPT_LENGTH"): number {
  const value = (raw ?? "").trim();
  if (!value) return DEFAULT_EXCERPT_LENGTH;

  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new ConfigurationError(`Invalid ${name}: "${value}". Expected a positive integer.`, {
      [name]: value,
    });
  }
  return n;
}

export function readEnv(env: NodeJS.ProcessEnv = process.env): KbforgeEnv {
  return {
    sourceDir: nonEmptyOrUndefined(env.KBFORGE_SOURCE_DIR),
    outputDir: nonEmptyOrUndefined(env.KBFORGE_OUTPUT_DIR),
    siteTitle: nonEmptyOrUndefined(env.KBFORGE_SITE_TITLE) ?? DEFAULT_SITE_TITLE,
    baseUrl: (env.KBFORGE_BASE_URL ?? "").trim(),
    lang: nonEmptyOrUndefined(env.KBFORGE_LANG) ?? "en",
    excerptLength: parseExcerptLength(env.KBFORGE_EXCERPT_LENGTH),
    tagScriptChars: env.KBFORGE_TAG_SCRIPT_CHARS ?? DEFAULT_TAG_SCRIPT_CHARS,
  };
}

export function loadEnv(): KbforgeEnv {
  // .env is a development convenience; plain environment variables work on their own
  loadDotenv();
  return readEnv();
}
