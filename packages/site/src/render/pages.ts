// Page bodies
// - note list, search, tag index, per-tag and per-note pages

import type { Note, NoteMap, TagGroups } from "@kbforge/core";
import { sortNotesByTitle } from "@kbforge/core";

import { escapeHtml, formatDate, relativeUrl } from "./html.js";
import { renderPage, SITE_PATHS, type SiteChrome } from "./layout.js";

export type RenderedPage = {
  path: string;
  html: string;
};

function renderUpdated(note: Note): string {
  if (!note.updatedAt) return "";
  return `<time datetime="${note.updatedAt.toISOString()}">${formatDate(note.updatedAt)}</time>`;
}

function renderTagLinks(note: Note, fromPath: string, tagPaths: ReadonlyMap<string, string>): string {
  return note.tags
    .flatMap((tag) => {
      const tagPath = tagPaths.get(tag);
      if (!tagPath) return [];
      return [`<a class="tag" href="${relativeUrl(fromPath, tagPath)}">${escapeHtml(tag)}</a>`];
    })
    .join(" ");
}

export function renderIndexPage(
  chrome: SiteChrome,
  notes: NoteMap,
  tagPaths: ReadonlyMap<string, string>,
): RenderedPage {
  const currentPath = SITE_PATHS.index;
  const items = sortNotesByTitle(notes.values()).map((note) => {
    const href = relativeUrl(currentPath, note.outputPath);
    const tagsHtml = note.tags.length
      ? `<span class="tags">${renderTagLinks(note, currentPath, tagPaths)}</span>`
      : "";
    return (
      `<li><a class="note-link" href="${href}">${escapeHtml(note.title)}</a>` +
      `<div class="note-meta">${renderUpdated(note)}${tagsHtml}</div>` +
      `<p class="excerpt">${escapeHtml(note.excerpt)}</p></li>`
    );
  });
  if (items.length === 0) {
    items.push("<li>No notes found. Add markdown files to the source directory and build again.</li>");
  }

  const content = `
    <section>
      <h1>Notes</h1>
      <ul class="note-list">
        ${items.join("\n        ")}
      </ul>
    </section>`;

  return { path: currentPath, html: renderPage(chrome, { pageTitle: chrome.siteTitle, content, currentPath }) };
}

export function renderSearchPage(chrome: SiteChrome): RenderedPage {
  const currentPath = SITE_PATHS.search;
  const content = `
    <section>
      <h1>Search</h1>
      <div id="search-app" data-index-url="${relativeUrl(currentPath, SITE_PATHS.searchIndex)}">
        <input type="search" placeholder="Type a keyword" aria-label="Search terms">
        <div class="search-hint">Titles, tags and note text are searched.</div>
        <ul class="search-results"></ul>
      </div>
    </section>`;

  return {
    path: currentPath,
    html: renderPage(chrome, {
      pageTitle: "Search",
      content,
      currentPath,
      extraScripts: [SITE_PATHS.searchScript],
    }),
  };
}

export function renderTagPages(
  chrome: SiteChrome,
  tagGroups: TagGroups,
  tagPaths: ReadonlyMap<string, string>,
): RenderedPage[] {
  const pages: RenderedPage[] = [];
  const indexItems: string[] = [];

  for (const [tag, notes] of tagGroups) {
    const tagPath = tagPaths.get(tag);
    if (!tagPath) continue;

    indexItems.push(
      `<li><a href="${relativeUrl(SITE_PATHS.tagIndex, tagPath)}">${escapeHtml(tag)}</a> (${notes.length})</li>`,
    );

    const noteItems = notes.map(
      (note) =>
        `<li><a class="note-link" href="${relativeUrl(tagPath, note.outputPath)}">${escapeHtml(note.title)}</a></li>`,
    );
    const content = `
        <section>
          <h1>Tag: ${escapeHtml(tag)}</h1>
          <ul class="note-list">
            ${noteItems.join("\n            ")}
          </ul>
        </section>`;

    pages.push({
      path: tagPath,
      html: renderPage(chrome, { pageTitle: `Tag: ${tag}`, content, currentPath: tagPath }),
    });
  }

  const indexContent = `
    <section>
      <h1>Tags</h1>
      <ul class="tag-list">
        ${indexItems.length ? indexItems.join("\n        ") : "<li>No tags yet.</li>"}
      </ul>
    </section>`;

  pages.push({
    path: SITE_PATHS.tagIndex,
    html: renderPage(chrome, {
      pageTitle: "Tags",
      content: indexContent,
      currentPath: SITE_PATHS.tagIndex,
    }),
  });

  return pages;
}

export function renderNotePage(
  chrome: SiteChrome,
  note: Note,
  tagPaths: ReadonlyMap<string, string>,
): RenderedPage {
  const currentPath = note.outputPath;
  const tagsHtml = note.tags.length
    ? `<div class="note-tags">${renderTagLinks(note, currentPath, tagPaths)}</div>`
    : "";

  let backlinksHtml = "";
  if (note.backlinks.length) {
    const items = note.backlinks
      .map(
        (ref) =>
          `<li><a href="${relativeUrl(currentPath, ref.outputPath)}">${escapeHtml(ref.title)}</a></li>`,
      )
      .join("\n");
    backlinksHtml = `
          <section class="backlinks">
            <h2>Backlinks</h2>
            <ul>
              ${items}
            </ul>
          </section>`;
  }

  const content = `
        <article class="note">
          <header>
            <h1>${escapeHtml(note.title)}</h1>
            <div class="note-meta">${renderUpdated(note)}${tagsHtml}</div>
          </header>
          <section class="note-body">${note.renderedHtml}</section>
          ${backlinksHtml}
        </article>`;

  return { path: currentPath, html: renderPage(chrome, { pageTitle: note.title, content, currentPath }) };
}
