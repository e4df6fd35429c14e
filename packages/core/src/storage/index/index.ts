export type {
  IndexedFile,
  ReferenceIdentifier,
  ReferenceImportResult,
  ClearResult,
} from "./types.js";
export { initializeDatabase } from "./schema.js";
export { createIndexStore, type IndexStore } from "./store.js";
