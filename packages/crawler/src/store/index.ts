export type { Store } from "./types.js";
export { MemoryStore } from "./memory.js";
export { JsonFileStore } from "./json-file.js";
