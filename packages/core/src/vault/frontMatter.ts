// Front matter parsing
// - line-oriented `key: value` block between `---` delimiters
// - malformed lines are skipped, never thrown

export type FrontMatterValue = string | string[];

export type FrontMatter = Record<string, FrontMatterValue>;

export type ParsedDocument = {
  metadata: FrontMatter;
  body: string;
};

const DELIMITER = "---";

function splitLines(input: string): string[] {
  const lines = input.split(/\r\n|\r|\n/);
  // A trailing newline does not open an extra empty line
  if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/**
 * Splits raw document text into metadata and body.
 *
 * Text that does not open with a `---` line is returned untouched as the body.
 * An opening delimiter that is never closed turns every remaining line into
 * metadata and leaves the body empty.
 */
export function parseDocument(text: string): ParsedDocument {
  const lines = splitLines(text);
  if (lines.length === 0 || (lines[0] ?? "").trim() !== DELIMITER) {
    return { metadata: {}, body: text };
  }

  const metaLines: string[] = [];
  const bodyLines: string[] = [];
  let insideMeta = true;
  for (const line of lines.slice(1)) {
    if (insideMeta && line.trim() === DELIMITER) {
      insideMeta = false;
      continue;
    }
    if (insideMeta) {
      metaLines.push(line);
    } else {
      bodyLines.push(line);
    }
  }

  return {
    metadata: parseMetadataLines(metaLines),
    body: bodyLines.join("\n").replace(/^\n+/, ""),
  };
}

export function parseMetadataLines(lines: readonly string[]): FrontMatter {
  const metadata: FrontMatter = {};
  for (const raw of lines) {
    const line = raw.trim();
    if (!line || line.startsWith("#")) continue;

    const colon = line.indexOf(":");
    if (colon === -1) continue;

    const key = line.slice(0, colon).trim().toLowerCase();
    const value = line.slice(colon + 1).trim();
    if (key === "tags") {
      metadata[key] = splitTags(value);
    } else {
      metadata[key] = value;
    }
  }
  return metadata;
}

export function splitTags(value: string): string[] {
  return value
    .split(",")
    .map((tag) => tag.trim())
    .filter(Boolean);
}

export function metadataString(metadata: FrontMatter, key: string): string | null {
  const value = metadata[key];
  return typeof value === "string" && value ? value : null;
}

export function metadataTags(metadata: FrontMatter): string[] {
  const value = metadata.tags;
  return Array.isArray(value) ? [...value] : [];
}

/**
 * First line that starts with `#`, with the leading `#` and space characters removed.
 */
export function extractFirstHeading(body: string): string | null {
  for (const line of body.split(/\r\n|\r|\n/)) {
    const stripped = line.trim();
    if (stripped.startsWith("#")) return stripped.replace(/^[# ]+/, "");
  }
  return null;
}

// explicit title > first heading > file base name
export function resolveTitle(metadata: FrontMatter, body: string, fileStem: string): string {
  return metadataString(metadata, "title") || extractFirstHeading(body) || fileStem;
}
