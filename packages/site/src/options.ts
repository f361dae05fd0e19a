// Site generation options
// - CLI flags override environment defaults; the merged result is validated once

import { z } from "zod";

import { ConfigurationError, isValidTagScriptChars, type KbforgeEnv } from "@kbforge/core";

export const SiteOptionsSchema = z.object({
  sourceDir: z.string().trim().min(1, "source directory is required"),
  outputDir: z.string().trim().min(1, "destination directory is required"),
  siteTitle: z.string().trim().min(1),
  baseUrl: z.string().trim(),
  lang: z.string().trim().min(1),
  excerptLength: z.number().int().positive(),
  tagScriptChars: z
    .string()
    .refine(isValidTagScriptChars, "must be characters or ranges without brackets or backslashes"),
});

export type SiteOptions = z.infer<typeof SiteOptionsSchema>;

export type SiteOptionOverrides = {
  sourceDir?: string | undefined;
  outputDir?: string | undefined;
  siteTitle?: string | undefined;
  baseUrl?: string | undefined;
  lang?: string | undefined;
  excerptLength?: number | undefined;
  tagScriptChars?: string | undefined;
};

export function resolveSiteOptions(env: KbforgeEnv, overrides: SiteOptionOverrides): SiteOptions {
  const parsed = SiteOptionsSchema.safeParse({
    sourceDir: overrides.sourceDir ?? env.sourceDir ?? "",
    outputDir: overrides.outputDir ?? env.outputDir ?? "",
    siteTitle: overrides.siteTitle ?? env.siteTitle,
    baseUrl: overrides.baseUrl ?? env.baseUrl,
    lang: overrides.lang ?? env.lang,
    excerptLength: overrides.excerptLength ?? env.excerptLength,
    tagScriptChars: overrides.tagScriptChars ?? env.tagScriptChars,
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`Invalid options: ${issues.join("; ")}`, { issues });
  }
  return parsed.data;
}
