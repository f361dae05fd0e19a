// Build error taxonomy
// - fatal conditions only; dangling links and malformed front matter are not errors

export type KbforgeErrorCode =
  | "CORPUS_NOT_FOUND"
  | "NOT_A_DIRECTORY"
  | "DUPLICATE_SLUG"
  | "INVALID_CONFIG";

export type KbforgeErrorOptions = {
  context?: Record<string, unknown>;
  cause?: unknown;
};

/**
 * Base class for every error that aborts a build.
 */
export class KbforgeError extends Error {
  readonly code: KbforgeErrorCode;
  readonly context: Record<string, unknown>;

  constructor(code: KbforgeErrorCode, message: string, options: KbforgeErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.context = options.context ?? {};
  }
}

export class CorpusNotFoundError extends KbforgeError {
  constructor(readonly sourceDir: string) {
    super("CORPUS_NOT_FOUND", `Source directory does not exist: ${sourceDir}`, {
      context: { sourceDir },
    });
  }
}

export class NotADirectoryError extends KbforgeError {
  constructor(readonly sourceDir: string) {
    super("NOT_A_DIRECTORY", `Source is not a directory: ${sourceDir}`, {
      context: { sourceDir },
    });
  }
}

export class DuplicateSlugError extends KbforgeError {
  constructor(
    readonly slug: string,
    readonly firstRelPath: string,
    readonly secondRelPath: string,
  ) {
    super(
      "DUPLICATE_SLUG",
      `Two documents share the slug "${slug}": ${firstRelPath} and ${secondRelPath}`,
      { context: { slug, firstRelPath, secondRelPath } },
    );
  }
}

export class ConfigurationError extends KbforgeError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super("INVALID_CONFIG", message, { context });
  }
}
