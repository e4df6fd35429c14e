export interface IndexedFile {
  path: string // absolute, unique across the store
  name: string // file name as found on disk
  discoveredAt: string // ISO 8601
}

export interface ReferenceIdentifier {
  text: string // unique, compared case-insensitively
  importedAt: string // ISO 8601
}

export interface ReferenceImportResult {
  inserted: number
  skipped: number
}

export interface ClearResult {
  files: number
  referenceIds: number
}
