export {
  FinderError,
  StorageError,
  ScanError,
  ValidationError,
  ConfigError,
  BusyError,
  describeError,
  errorMessage,
  type ErrorDescription,
} from "./catalog.js";
