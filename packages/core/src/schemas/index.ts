export {
  AppConfigSchema,
  ThresholdSchema,
  DEFAULTS,
  MIN_THRESHOLD,
  MAX_THRESHOLD,
  type AppConfig,
  type LoggingConfig,
  type ScanConfig,
  type SearchConfig,
} from "./app-config.js";
