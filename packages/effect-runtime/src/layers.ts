/**
 * Effect layers for dependency injection.
 *
 * The autodiff config is provided either as a value or loaded from a JSON
 * file.
 */
import { Layer } from "effect";
import {
  AutodiffConfigService,
  loadAutodiffConfig,
  type AutodiffConfig,
} from "@tapegrad/core";

// ── Config Layer ───────────────────────────────────────────────────────────

export const ConfigFrom = (config: AutodiffConfig) =>
  Layer.succeed(AutodiffConfigService, config);

/** Fails with ConfigError when the file cannot be read, parsed or validated. */
export const ConfigFromFile = (path: string) =>
  Layer.effect(AutodiffConfigService, loadAutodiffConfig(path));
