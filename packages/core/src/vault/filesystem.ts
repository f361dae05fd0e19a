// Corpus file system access
// - markdown listing, stat and UTF-8 reads for the note loader

import { promises as fs, type Stats } from "node:fs";
import path from "node:path";

import { CorpusNotFoundError, NotADirectoryError } from "../errors.js";
import { compareText } from "../graph/ordering.js";

export type CorpusMarkdownFile = {
  absPath: string;
  relPath: string;
  mtimeMs: number;
  size: number;
};

// Repository metadata only; hidden note folders are part of the corpus
export function isIgnoredDirName(name: string): boolean {
  return name === ".git";
}

// Exact `.md` suffix, matching the extension link resolution accepts
export function isMarkdownFileName(name: string): boolean {
  return name.endsWith(".md");
}

// Corpus-relative path with forward slashes on every platform
export function toPosixRelPath(rootPath: string, absPath: string): string {
  return path.relative(rootPath, absPath).split(path.sep).join(path.posix.sep);
}

export async function assertCorpusDirectory(rootPath: string): Promise<void> {
  let stat: Stats;
  try {
    stat = await fs.stat(rootPath);
  } catch (error) {
    if (isErrnoCode(error, "ENOENT")) throw new CorpusNotFoundError(rootPath);
    throw error;
  }

  if (!stat.isDirectory()) throw new NotADirectoryError(rootPath);
}

function isErrnoCode(error: unknown, code: string): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === code;
}

/**
 * Lists every markdown file under the corpus root.
 *
 * Ordering is by corpus-relative POSIX path so that rebuilds of an unchanged
 * corpus enumerate notes identically on every platform.
 */
export async function listMarkdownFiles(rootPath: string): Promise<string[]> {
  const results: string[] = [];

  async function walk(currentDirAbsPath: string) {
    const entries = await fs.readdir(currentDirAbsPath, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.isDirectory()) {
        if (isIgnoredDirName(entry.name)) continue;
        await walk(path.join(currentDirAbsPath, entry.name));
        continue;
      }

      if (!entry.isFile()) continue;
      if (!isMarkdownFileName(entry.name)) continue;

      results.push(path.join(currentDirAbsPath, entry.name));
    }
  }

  await walk(rootPath);

  const keyed = results.map((absPath) => ({ absPath, key: toPosixRelPath(rootPath, absPath) }));
  keyed.sort((a, b) => compareText(a.key, b.key));
  return keyed.map((item) => item.absPath);
}

export async function statMarkdownFile(
  rootPath: string,
  absPath: string,
): Promise<CorpusMarkdownFile> {
  const stat = await fs.stat(absPath);

  return {
    absPath,
    relPath: toPosixRelPath(rootPath, absPath),
    mtimeMs: stat.mtimeMs,
    size: stat.size,
  };
}

export async function readUtf8File(absPath: string): Promise<string> {
  return await fs.readFile(absPath, "utf8");
}
