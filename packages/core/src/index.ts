export * from "./errors.js";
export * from "./env.js";

export * from "./vault/filesystem.js";
export * from "./vault/frontMatter.js";
export * from "./vault/plainText.js";

export * from "./graph/types.js";
export * from "./graph/ordering.js";
export * from "./graph/links.js";
export * from "./graph/note.js";
export * from "./graph/backlinks.js";

export * from "./tags/tagIndex.js";
export * from "./search/searchRecords.js";

export * from "./building/types.js";
export * from "./building/buildKnowledgeBase.js";
