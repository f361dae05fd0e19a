// Internal link resolution
// - markdown `[label](target)` links → corpus slugs
// - `.md` → `.html` href rewriting for rendered pages

import path from "node:path";

const LINK_PATTERN = /\[[^\]]+\]\(([^)]+)\)/g;
const ANCHOR_PATTERN = /href="([^"]+)"/g;

const NOTE_EXTENSION = ".md";

export function isExternalTarget(target: string): boolean {
  return target.includes("://") || target.startsWith("mailto:");
}

/**
 * Slug of a corpus-relative path: forward slashes, extension removed.
 */
export function slugFromRelPath(relPath: string): string {
  const posix = relPath.split(path.sep).join(path.posix.sep);
  const ext = path.posix.extname(posix);
  return ext ? posix.slice(0, -ext.length) : posix;
}

export function outputPathFromRelPath(relPath: string): string {
  return `${slugFromRelPath(relPath)}.html`;
}

/**
 * Resolves one link target to a slug, or null when the link is not an
 * internal note reference (anchor, external URL, asset, outside the root).
 */
export function resolveLinkTarget(target: string, noteDirAbsPath: string, rootAbsPath: string): string | null {
  if (!target || target.startsWith("#") || isExternalTarget(target)) return null;

  const cleaned = target.split("#", 1)[0] ?? "";
  if (!cleaned) return null;

  const ext = path.posix.extname(cleaned);
  let candidate = cleaned;
  if (!ext) {
    candidate = `${cleaned}${NOTE_EXTENSION}`;
  } else if (ext !== NOTE_EXTENSION) {
    return null;
  }

  const resolved = path.resolve(noteDirAbsPath, candidate);
  const rel = path.relative(path.resolve(rootAbsPath), resolved);
  if (!rel || rel === ".." || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) return null;

  return slugFromRelPath(rel);
}

export function extractLinkTargets(body: string): string[] {
  return Array.from(body.matchAll(LINK_PATTERN), (match) => match[1] ?? "");
}

export function extractOutgoingSlugs(
  body: string,
  noteDirAbsPath: string,
  rootAbsPath: string,
): Set<string> {
  const slugs = new Set<string>();
  for (const target of extractLinkTargets(body)) {
    const slug = resolveLinkTarget(target, noteDirAbsPath, rootAbsPath);
    if (slug !== null) slugs.add(slug);
  }
  return slugs;
}

/**
 * Rewrites `href="….md"` to `href="….html"` in rendered HTML.
 * Pure string rewriting; the target is not checked against the corpus.
 */
export function rewriteInternalLinks(html: string): string {
  return html.replace(ANCHOR_PATTERN, (whole: string, href: string) => {
    if (isExternalTarget(href)) return whole;
    if (!href.endsWith(NOTE_EXTENSION)) return whole;
    return `href="${href.slice(0, -NOTE_EXTENSION.length)}.html"`;
  });
}
