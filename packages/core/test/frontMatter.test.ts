// Front matter parsing tests

import { describe, expect, it } from "vitest";

import {
  extractFirstHeading,
  metadataTags,
  parseDocument,
  parseMetadataLines,
  resolveTitle,
} from "../src/vault/frontMatter.js";

describe("parseDocument()", () => {
  it("returns the full text as body when there is no opening delimiter", () => {
    const text = "# Title\n\nbody\n";
    expect(parseDocument(text)).toEqual({ metadata: {}, body: text });
  });

  it("splits metadata from the body and trims leading blank lines", () => {
    const text = ["---", "title: Hello", "tags: a, b", "---", "", "", "# H1", "text", ""].join("\n");

    expect(parseDocument(text)).toEqual({
      metadata: { title: "Hello", tags: ["a", "b"] },
      body: "# H1\ntext",
    });
  });

  it("accepts CRLF line endings", () => {
    const text = "---\r\ntitle: Crlf\r\n---\r\nbody line\r\n";
    expect(parseDocument(text)).toEqual({ metadata: { title: "Crlf" }, body: "body line" });
  });

  it("treats every line as metadata when the block is never closed", () => {
    const text = "---\ntitle: Open\nstill: meta\n";
    expect(parseDocument(text)).toEqual({ metadata: { title: "Open", still: "meta" }, body: "" });
  });

  it("does not treat a later --- line as front matter", () => {
    const text = "intro\n---\ntitle: nope\n---\n";
    expect(parseDocument(text).metadata).toEqual({});
  });
});

describe("parseMetadataLines()", () => {
  it("lower-cases keys and keeps the first colon as the separator", () => {
    expect(parseMetadataLines(["  Title : Time: 10:30  ", "URL: https://example.test"])).toEqual({
      title: "Time: 10:30",
      url: "https://example.test",
    });
  });

  it("ignores blank lines, comments and lines without a colon", () => {
    expect(parseMetadataLines(["", "   ", "# comment: yes", "no colon here", "kind: memo"])).toEqual({
      kind: "memo",
    });
  });

  it("splits tags on commas, trims them and drops empty pieces without deduplicating", () => {
    expect(parseMetadataLines(["tags: x, , y ,x,"])).toEqual({ tags: ["x", "y", "x"] });
  });

  it("lets a later duplicate key win", () => {
    expect(parseMetadataLines(["title: first", "title: second"])).toEqual({ title: "second" });
  });
});

describe("metadataTags()", () => {
  it("returns an empty list when tags are absent", () => {
    expect(metadataTags({ title: "x" })).toEqual([]);
  });
});

describe("extractFirstHeading()", () => {
  it("strips leading # and space characters from the first heading line", () => {
    expect(extractFirstHeading("intro\n  ## Second level \nlater\n# Other")).toBe("Second level");
  });

  it("returns null when no line starts with #", () => {
    expect(extractFirstHeading("plain\ntext")).toBeNull();
  });
});

describe("resolveTitle()", () => {
  it("prefers the explicit title", () => {
    expect(resolveTitle({ title: "Explicit" }, "# Heading", "file")).toBe("Explicit");
  });

  it("falls back to the first heading, then to the file stem", () => {
    expect(resolveTitle({}, "# Heading", "file")).toBe("Heading");
    expect(resolveTitle({}, "no heading", "file")).toBe("file");
  });

  it("skips an empty title and an empty heading", () => {
    expect(resolveTitle({ title: "" }, "#\nbody", "stem")).toBe("stem");
  });
});
