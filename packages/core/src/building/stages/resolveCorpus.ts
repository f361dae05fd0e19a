import path from "node:path";

import { assertCorpusDirectory } from "../../vault/filesystem.js";

export async function resolveCorpusStage(sourceDir: string): Promise<string> {
  const root = path.resolve(sourceDir);
  await assertCorpusDirectory(root);
  return root;
}
