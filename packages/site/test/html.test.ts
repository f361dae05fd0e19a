// HTML helper tests

import { describe, expect, it } from "vitest";

import { escapeHtml, formatDate, formatDateTime, relativeUrl } from "../src/render/html.js";

describe("escapeHtml()", () => {
  it("escapes markup and quote characters", () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#x27;s&lt;/a&gt;",
    );
  });
});

describe("relativeUrl()", () => {
  it("resolves from the directory of the current page", () => {
    expect(relativeUrl("index.html", "notes/a.html")).toBe("notes/a.html");
    expect(relativeUrl("tags/x.html", "notes/a.html")).toBe("../notes/a.html");
    expect(relativeUrl("notes/deep/b.html", "assets/style.css")).toBe("../../assets/style.css");
    expect(relativeUrl("notes/a.html", "notes/b.html")).toBe("b.html");
  });

  it("treats an extension-less path as a directory", () => {
    expect(relativeUrl("tags", "tags/x.html")).toBe("x.html");
  });
});

describe("formatDate()", () => {
  it("formats local dates with zero padding", () => {
    const date = new Date(2024, 0, 5, 7, 3);
    expect(formatDate(date)).toBe("2024-01-05");
    expect(formatDateTime(date)).toBe("2024-01-05 07:03");
  });
});
