export * from "./errors.js";
export * from "./config.js";
export * from "./context/index.js";
export * from "./prompt/builder.js";
export * from "./tokenizer/index.js";
export * from "./tools/build-prompt.js";
export * from "./tools/count-tokens.js";
export { createServer, runServer } from "./server.js";
export type { ServerOptions } from "./server.js";
