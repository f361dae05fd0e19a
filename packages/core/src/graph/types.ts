// Note graph records
// - flat arena keyed by slug; references between notes are slugs, never objects

export type Slug = string;

export type NoteRef = {
  readonly slug: Slug;
  readonly title: string;
  readonly outputPath: string;
};

export type Note = {
  readonly sourcePath: string;
  readonly relativePath: string;
  readonly slug: Slug;
  readonly title: string;
  readonly tags: readonly string[];
  readonly body: string;
  readonly renderedHtml: string;
  readonly excerpt: string;
  readonly outputPath: string;
  readonly outgoingSlugs: ReadonlySet<Slug>;
  readonly backlinks: readonly NoteRef[];
  readonly updatedAt: Date | null;
};

export type NoteMap = ReadonlyMap<Slug, Note>;

/**
 * Markdown rendering capability supplied by the caller.
 */
export type RenderMarkdown = (markdown: string) => string;
