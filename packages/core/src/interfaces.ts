/**
 * Service tags (ports) shared across packages.
 */
import { Context } from "effect";
import type { AutodiffConfig } from "./types.js";

// ── Config ─────────────────────────────────────────────────────────────────
export class AutodiffConfigService extends Context.Tag("AutodiffConfigService")<
  AutodiffConfigService,
  AutodiffConfig
>() {}
