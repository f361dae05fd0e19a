// Page layout
// - shared header/nav/footer around every generated page

import { escapeHtml, formatDateTime, relativeUrl } from "./html.js";

export const SITE_PATHS = {
  index: "index.html",
  tagIndex: "tags/index.html",
  search: "search.html",
  searchIndex: "search-index.json",
  style: "assets/style.css",
  searchScript: "assets/search.js",
} as const;

export type SiteChrome = {
  siteTitle: string;
  lang: string;
  generatedAt: Date;
};

export type PageInput = {
  pageTitle: string;
  content: string;
  currentPath: string;
  extraScripts?: readonly string[];
};

const NAV_LINKS: ReadonlyArray<readonly [label: string, target: string]> = [
  ["Home", SITE_PATHS.index],
  ["Tags", SITE_PATHS.tagIndex],
  ["Search", SITE_PATHS.search],
];

export function renderPage(chrome: SiteChrome, page: PageInput): string {
  const styleHref = relativeUrl(page.currentPath, SITE_PATHS.style);
  const navHtml = NAV_LINKS.map(
    ([label, target]) => `<a href="${relativeUrl(page.currentPath, target)}">${label}</a>`,
  ).join("");
  const scriptsHtml = (page.extraScripts ?? [])
    .map((script) => `<script src="${relativeUrl(page.currentPath, script)}" defer></script>`)
    .join("");

  return `<!DOCTYPE html>
<html lang="${escapeHtml(chrome.lang)}">
  <head>
    <meta charset="utf-8">
    <meta name="viewport" content="width=device-width, initial-scale=1">
    <title>${escapeHtml(page.pageTitle)} | ${escapeHtml(chrome.siteTitle)}</title>
    <link rel="stylesheet" href="${styleHref}">
    ${scriptsHtml}
  </head>
  <body>
    <header class="site-header">
      <div class="site-title">${escapeHtml(chrome.siteTitle)}</div>
      <nav class="site-nav">${navHtml}</nav>
    </header>
    <main>
      ${page.content}
    </main>
    <footer class="site-footer">
      Generated ${formatDateTime(chrome.generatedAt)}
    </footer>
  </body>
</html>
`;
}
