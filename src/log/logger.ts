import type { UIHandle } from "../types/contracts.js";

export interface Logger {
  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
}

export const COLOR = {
  reset: "\x1b[0m",
  gray: (s: string) => `\x1b[90m${s}${COLOR.reset}`,
  red: (s: string) => `\x1b[31m${s}${COLOR.reset}`,
  cyan: (s: string) => `\x1b[36m${s}${COLOR.reset}`,
  green: (s: string) => `\x1b[32m${s}${COLOR.reset}`,
  yellow: (s: string) => `\x1b[33m${s}${COLOR.reset}`,
  magenta: (s: string) => `\x1b[35m${s}${COLOR.reset}`,
};

export const fmtMs = (ms: number) => `${Math.round(ms)}ms`;

export interface LogSwitches {
  quiet: boolean;
  steps: boolean;
  tools: boolean;
}

export function logSwitchesFromEnv(env: NodeJS.ProcessEnv = process.env): LogSwitches {
  const quiet = env.QUIET === "1";
  return {
    quiet,
    steps: !quiet && (env.LOG_STEPS ?? "1") !== "0",
    tools: !quiet && (env.LOG_TOOLS ?? "0") === "1",
  };
}

function fieldsSuffix(fields?: Record<string, unknown>): string {
  if (!fields || Object.keys(fields).length === 0) return "";
  let preview = JSON.stringify(fields);
  if (preview.length > 140) preview = preview.slice(0, 140) + "…";
  return " " + COLOR.gray(preview);
}

/**
 * Console logger. Debug lines (step timings, tool calls) only show with
 * LOG_TOOLS=1; QUIET=1 silences everything but errors.
 */
export function createConsoleLogger(switches: LogSwitches = logSwitchesFromEnv()): Logger {
  return {
    debug(message, fields) {
      if (switches.tools) console.log(COLOR.gray(`  · ${message}`) + fieldsSuffix(fields));
    },
    info(message, fields) {
      if (switches.steps) console.log(message + fieldsSuffix(fields));
    },
    warn(message, fields) {
      if (!switches.quiet) console.warn(COLOR.yellow(message) + fieldsSuffix(fields));
    },
    error(message, fields) {
      console.error(COLOR.red(message) + fieldsSuffix(fields));
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export function createConsoleUI(switches: LogSwitches = logSwitchesFromEnv()): UIHandle {
  return {
    title(text) {
      if (!switches.quiet) console.log(`\n${COLOR.cyan("▶")} ${text}`);
    },
    info(text) {
      if (switches.steps) console.log(COLOR.gray(text));
    },
    success(text) {
      if (!switches.quiet) console.log(COLOR.green(text));
    },
    warning(text) {
      if (!switches.quiet) console.log(COLOR.yellow(text));
    },
    error(text) {
      console.error(COLOR.red(text));
    },
  };
}
