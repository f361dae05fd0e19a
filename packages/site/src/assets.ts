import { promises as fs } from "node:fs";
import { fileURLToPath } from "node:url";

import { SITE_PATHS } from "./render/layout.js";

// Bundled asset files live in `<package>/assets`, next to both src/ and dist/
const ASSET_DIR_URL = new URL("../assets/", import.meta.url);

export const SITE_ASSETS: ReadonlyArray<{ sitePath: string; fileName: string }> = [
  { sitePath: SITE_PATHS.style, fileName: "style.css" },
  { sitePath: SITE_PATHS.searchScript, fileName: "search.js" },
];

export async function readAsset(fileName: string): Promise<string> {
  return await fs.readFile(fileURLToPath(new URL(fileName, ASSET_DIR_URL)), "utf8");
}
