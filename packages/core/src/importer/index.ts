export {
  IdentifierTableSchema,
  findIdentifierColumn,
  importIdentifierTable,
  importIdentifierValues,
  type IdentifierTable,
  type ImportDeps,
  type ImportOptions,
  type TableImportOptions,
  type ImportReport,
} from "./import.js";
