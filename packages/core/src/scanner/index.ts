export {
  scanDirectory,
  scanAndStore,
  type DiscoveredFile,
  type ScanOptions,
  type ScanDeps,
  type ScanReport,
} from "./scan.js";
