/**
 * Logging and tracing integration.
 *
 * A compact console logger for the CLI and diagnostics, plus span helpers
 * for timing accumulation sweeps.
 */
import { Effect, Layer, Logger, LogLevel } from "effect";

// ── Message formatting ─────────────────────────────────────────────────────

/** Effect hands loggers an array of the values passed to `Effect.log*`. */
export function formatLogMessage(message: unknown): string {
  const parts = Array.isArray(message) ? message : [message];
  return parts.map((p) => (typeof p === "string" ? p : JSON.stringify(p))).join(" ");
}

// ── Pretty logger ──────────────────────────────────────────────────────────

export const prettyLogger = Logger.make(({ logLevel, message, date }) => {
  const ts = date.toISOString().slice(11, 23);
  const lvl = logLevel.label.toUpperCase().padEnd(5);
  console.log(`[${ts}] ${lvl} ${formatLogMessage(message)}`);
});

/** Replace the default logger with `prettyLogger` and set the minimum level. */
export function loggerLayer(level: LogLevel.LogLevel | string): Layer.Layer<never> {
  const minimum = typeof level === "string" ? parseLogLevel(level) : level;
  return Layer.merge(
    Logger.replace(Logger.defaultLogger, prettyLogger),
    Logger.minimumLogLevel(minimum),
  );
}

// ── Span helpers ───────────────────────────────────────────────────────────

export function withSpan<A, E, R>(name: string, effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> {
  return Effect.withSpan(name)(effect);
}

// ── Log level from string ──────────────────────────────────────────────────

export function parseLogLevel(level: string): LogLevel.LogLevel {
  switch (level.toLowerCase()) {
    case "debug": return LogLevel.Debug;
    case "info": return LogLevel.Info;
    case "warn":
    case "warning": return LogLevel.Warning;
    case "error": return LogLevel.Error;
    default: return LogLevel.Info;
  }
}
