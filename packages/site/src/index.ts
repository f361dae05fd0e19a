export * from "./options.js";
export * from "./generateSite.js";
export * from "./render/html.js";
export * from "./render/layout.js";
export * from "./render/markdown.js";
export * from "./render/pages.js";
