/**
 * Tapes configured from the AutodiffConfigService.
 */
import { Effect } from "effect";
import { AutodiffConfigService, type AutodiffConfig, type Field } from "@tapegrad/core";
import { GradientTape } from "./gradient-tape.js";
import { HessianTape } from "./hessian-tape.js";
import type { TapeOptions } from "./tape.js";

export function tapeOptionsFrom(config: AutodiffConfig): TapeOptions {
  return {
    tracking: config.tracking,
    storage: config.storage,
    capacity: config.initialCapacity,
  };
}

export const gradientTapeFromConfig = <T>(field: Field<T>) =>
  Effect.map(AutodiffConfigService, (config) => new GradientTape(field, tapeOptionsFrom(config)));

export const hessianTapeFromConfig = <T>(field: Field<T>) =>
  Effect.map(AutodiffConfigService, (config) => new HessianTape(field, tapeOptionsFrom(config)));
