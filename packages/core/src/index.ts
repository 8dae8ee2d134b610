/**
 * @tapegrad/core -- shared types, scalar contract, errors and config.
 */
export type { Field } from "./field.js";
export { realField } from "./field.js";

export {
  type NodeStorage,
  type LogLevelName,
  type GradientCheckConfig,
  type AutodiffConfig,
  nodeStorages,
  isNodeStorage,
  defaultAutodiffConfig,
} from "./types.js";

export {
  AutogradError,
  NoRootNodesError,
  IndexOutOfRangeError,
  NodeDumpCancelledError,
  ConfigError,
} from "./errors.js";

export {
  parseAutodiffConfig,
  validateAutodiffConfig,
  loadAutodiffConfig,
} from "./config.js";

export { AutodiffConfigService } from "./interfaces.js";
