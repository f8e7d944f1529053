// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];
const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let threshold: LogLevel = parseLevel(process.env.LOG_LEVEL);

export function parseLevel(value: string | undefined): LogLevel {
  const normalized = value?.toLowerCase();
  return LEVELS.find((level) => level === normalized) ?? "info";
}

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

function emit(level: LogLevel, component: string, message: string, meta: unknown): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
  const line = JSON.stringify({ level, component, message, meta, ts: Date.now() });
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
}

export function createLogger(component: string): Logger {
  return {
    debug: (message, meta) => emit("debug", component, message, meta),
    info: (message, meta) => emit("info", component, message, meta),
    warn: (message, meta) => emit("warn", component, message, meta),
    error: (message, meta) => emit("error", component, message, meta)
  };
}

export const log = createLogger("intent-mesh");

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
