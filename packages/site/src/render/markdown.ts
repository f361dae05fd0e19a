// Markdown → HTML rendering
// - GFM (tables, fenced code, autolinks) through marked

import { Marked } from "marked";

import type { RenderMarkdown } from "@kbforge/core";

export function createMarkdownRenderer(): RenderMarkdown {
  const marked = new Marked({ gfm: true });

  return (markdown) => {
    const html = marked.parse(markdown, { async: false });
    if (typeof html !== "string") {
      throw new Error("marked returned a Promise; async extensions are not supported");
    }
    return html;
  };
}
