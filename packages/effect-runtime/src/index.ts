export { ConfigFrom, ConfigFromFile } from "./layers.js";

export {
  prettyLogger,
  loggerLayer,
  formatLogMessage,
  withSpan,
  parseLogLevel,
} from "./logging.js";
