import pino from "pino";

let rootLogger: pino.Logger | null = null;

/**
 * Initialize the root logger. Call once at startup; later calls replace it.
 * Levels are printed uppercase with ISO timestamps.
 */
export function initLogger(level: string): pino.Logger {
  rootLogger = pino({
    level,
    formatters: {
      level: (label: string) => ({ level: label.toUpperCase() }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
  return rootLogger;
}

/**
 * Child logger tagged with a component name. Falls back to a root logger at
 * LOG_LEVEL (or info) when initLogger has not run yet.
 */
export function getLogger(component: string): pino.Logger {
  const root = rootLogger ?? initLogger(process.env.LOG_LEVEL ?? "info");
  return root.child({ component });
}

export type Logger = pino.Logger;
