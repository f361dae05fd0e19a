import { describe, expect, it } from "vitest";

import { buildNote } from "../src/graph/note.js";

const render = (): string => '<p><a href="../index.md">home</a> <a href="https://example.com/a.md">ext</a></p>';

describe("buildNote()", () => {
  it("derives identity, metadata and links from a document", () => {
    const note = buildNote(
      {
        absPath: "/corpus/guides/setup.md",
        relPath: "guides/setup.md",
        text: "---\ntitle: Setup Guide\ntags: ops, intro\n---\n\nSee [the index](../index.md) and [site](https://example.com).\n",
        mtimeMs: 0,
      },
      { rootAbsPath: "/corpus", render, excerptLength: 10 },
    );

    expect(note.slug).toBe("guides/setup");
    expect(note.outputPath).toBe("guides/setup.html");
    expect(note.title).toBe("Setup Guide");
    expect(note.tags).toEqual(["ops", "intro"]);
    expect(note.body).toBe("See [the index](../index.md) and [site](https://example.com).");
    expect(note.excerpt).toBe("See the i…");
    expect([...note.outgoingSlugs]).toEqual(["index"]);
    expect(note.renderedHtml).toBe(
      '<p><a href="../index.html">home</a> <a href="https://example.com/a.md">ext</a></p>',
    );
    expect(note.backlinks).toEqual([]);
    expect(note.updatedAt).toEqual(new Date(0));
  });

  it("falls back to the file stem when there is no title or heading", () => {
    const note = buildNote(
      { absPath: "/corpus/notes/plain.md", relPath: "notes/plain.md", text: "just text" },
      { rootAbsPath: "/corpus", render: () => "" },
    );

    expect(note.title).toBe("plain");
    expect(note.tags).toEqual([]);
    expect(note.excerpt).toBe("just text");
    expect(note.updatedAt).toBeNull();
  });
});
