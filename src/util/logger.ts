import chalk from "chalk";
import type { LogFields, Logger } from "../types.js";

type Level = "debug" | "info" | "warn" | "error";

const LEVEL_STYLE: Record<Level, (s: string) => string> = {
  debug: chalk.dim,
  info: chalk.green,
  warn: chalk.yellow,
  error: chalk.red,
};

function timestamp(d: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
  );
}

function formatValue(v: unknown): string {
  if (typeof v === "string") return /\s/.test(v) ? JSON.stringify(v) : v;
  if (v instanceof Error) return JSON.stringify(v.message);
  return JSON.stringify(v) ?? String(v);
}

export function formatFields(fields?: LogFields): string {
  if (!fields) return "";
  return Object.entries(fields)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${chalk.cyan(k)}=${formatValue(v)}`)
    .join(" ");
}

export function createConsoleLogger(opts: { verbose?: boolean; now?: () => Date } = {}): Logger {
  const now = opts.now ?? (() => new Date());

  const emit = (level: Level, msg: string, fields?: LogFields) => {
    const extra = formatFields(fields);
    const line = `${chalk.dim(timestamp(now()))} [${LEVEL_STYLE[level](level.padEnd(5))}] ${msg}${extra ? ` ${extra}` : ""}`;
    if (level === "error" || level === "warn") console.error(line);
    else console.log(line);
  };

  return {
    debug: (msg, fields) => {
      if (opts.verbose) emit("debug", msg, fields);
    },
    info: (msg, fields) => emit("info", msg, fields),
    warn: (msg, fields) => emit("warn", msg, fields),
    error: (msg, fields) => emit("error", msg, fields),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
