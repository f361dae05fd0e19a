// Corpus file system tests

import { afterEach, describe, expect, it } from "vitest";

import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { CorpusNotFoundError, NotADirectoryError } from "../src/errors.js";
import {
  assertCorpusDirectory,
  listMarkdownFiles,
  statMarkdownFile,
} from "../src/vault/filesystem.js";

let tempDir: string | null = null;

async function mkTempDir(): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "kbforge-"));
  tempDir = dir;
  return dir;
}

async function writeFile(absPath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(absPath), { recursive: true });
  await fs.writeFile(absPath, content, "utf8");
}

afterEach(async () => {
  if (!tempDir) return;
  await fs.rm(tempDir, { recursive: true, force: true });
  tempDir = null;
});

describe("listMarkdownFiles()", () => {
  it("lists .md files in relative-path order, including hidden folders but not .git", async () => {
    const root = await mkTempDir();

    await writeFile(path.join(root, "notes/b.md"), "# B");
    await writeFile(path.join(root, "notes/a.md"), "# A");
    await writeFile(path.join(root, "notes/nested/c.md"), "# C");
    await writeFile(path.join(root, "notes/readme.txt"), "not markdown");
    await writeFile(path.join(root, "Upper.MD"), "# not a note");
    await writeFile(path.join(root, ".drafts/idea.md"), "# Idea");
    await writeFile(path.join(root, "vendor/lib.md"), "# Lib");

    await writeFile(path.join(root, ".git/ignored.md"), "# ignored");

    const absPaths = await listMarkdownFiles(root);
    const relPaths = absPaths.map((p) => path.relative(root, p).split(path.sep).join("/"));

    expect(relPaths).toEqual([".drafts/idea.md", "notes/a.md", "notes/b.md", "notes/nested/c.md", "vendor/lib.md"]);
  });
});

describe("statMarkdownFile()", () => {
  it("returns the corpus-relative POSIX path and file size", async () => {
    const root = await mkTempDir();
    const absPath = path.join(root, "notes", "a.md");
    await writeFile(absPath, "hello");

    const stat = await statMarkdownFile(root, absPath);

    expect(stat.relPath).toBe("notes/a.md");
    expect(stat.size).toBe(5);
    expect(stat.mtimeMs).toBeGreaterThan(0);
  });
});

describe("assertCorpusDirectory()", () => {
  it("rejects a missing root", async () => {
    const root = await mkTempDir();
    const missing = path.join(root, "missing");

    await expect(assertCorpusDirectory(missing)).rejects.toBeInstanceOf(CorpusNotFoundError);
  });

  it("rejects a file used as root", async () => {
    const root = await mkTempDir();
    const file = path.join(root, "note.md");
    await writeFile(file, "x");

    await expect(assertCorpusDirectory(file)).rejects.toBeInstanceOf(NotADirectoryError);
  });

  it("accepts a directory", async () => {
    const root = await mkTempDir();
    await expect(assertCorpusDirectory(root)).resolves.toBeUndefined();
  });
});
