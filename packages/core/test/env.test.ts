// Environment loading tests

import { describe, expect, it } from "vitest";

import { DEFAULT_SITE_TITLE, readEnv } from "../src/env.js";
import { ConfigurationError } from "../src/errors.js";
import { DEFAULT_TAG_SCRIPT_CHARS } from "../src/tags/tagIndex.js";

describe("readEnv()", () => {
  it("applies defaults for unset variables", () => {
    expect(readEnv({})).toEqual({
      sourceDir: undefined,
      outputDir: undefined,
      siteTitle: DEFAULT_SITE_TITLE,
      baseUrl: "",
      lang: "en",
      excerptLength: 160,
      tagScriptChars: DEFAULT_TAG_SCRIPT_CHARS,
    });
  });

  it("reads and trims configured values", () => {
    const env = readEnv({
      KBFORGE_SOURCE_DIR: " ./notes ",
      KBFORGE_OUTPUT_DIR: "./site",
      KBFORGE_SITE_TITLE: "Garden",
      KBFORGE_BASE_URL: " /kb ",
      KBFORGE_LANG: "ja",
      KBFORGE_EXCERPT_LENGTH: "80",
      KBFORGE_TAG_SCRIPT_CHARS: "α-ω",
    });

    expect(env).toEqual({
      sourceDir: "./notes",
      outputDir: "./site",
      siteTitle: "Garden",
      baseUrl: "/kb",
      lang: "ja",
      excerptLength: 80,
      tagScriptChars: "α-ω",
    });
  });

  it("rejects a non-positive excerpt length", () => {
    expect(() => readEnv({ KBFORGE_EXCERPT_LENGTH: "0" })).toThrow(ConfigurationError);
    expect(() => readEnv({ KBFORGE_EXCERPT_LENGTH: "ten" })).toThrow(
      'Invalid KBFORGE_EXCERPT_LENGTH: "ten". Expected a positive integer.',
    );
  });
});
