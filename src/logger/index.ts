export {
  debug,
  info,
  warn,
  error,
  withContext,
  formatLine,
  resolveLogLevel,
} from "./logger";
