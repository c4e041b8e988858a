// packages/core/src/index.ts
export * from "./env.js";
export * from "./logger.js";
export * from "./dialogue/context.js";
export * from "./dialogue/types.js";
export * from "./dialogue/schema.js";
export * from "./dialogue/ollama.js";
export * from "./search/types.js";
export * from "./search/extract.js";
export * from "./search/format.js";
export * from "./cart/ordinal.js";
export * from "./store/types.js";
export * from "./store/memoryStore.js";
export * from "./store/fileStore.js";
export * from "./channel/types.js";
export * from "./channel/parse.js";
export * from "./agent/session/state.js";
export * from "./agent/session/customer.js";
export * from "./agent/router.js";
export * from "./agent/run.js";
