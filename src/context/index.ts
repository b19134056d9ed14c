export * from "./change.js";
export * from "./render.js";
export * from "./diff-window.js";
export * from "./compression.js";
export * from "./builder.js";
