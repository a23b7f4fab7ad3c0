/*
UNO MIDI MCP - An MCP Server for the Arduino UNO R4 WiFi MIDI sequencer
Copyright (C) 2025 Christian Gleissner

Licensed under the GNU General Public License v2.0 or later.
See <https://www.gnu.org/licenses/> for details.
*/

import { Buffer } from "node:buffer";
import type { ToolLogger } from "./tools/types.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const DEFAULT_LEVEL: LogLevel = "info";
const ACTIVE_LEVEL = normaliseLevel(process.env.LOG_LEVEL) ?? DEFAULT_LEVEL;
const ACTIVE_THRESHOLD = LEVEL_ORDER[ACTIVE_LEVEL];
const IS_TEST_ENV = process.env.NODE_ENV === "test";

const LOGGER_CACHE = new Map<string, PrefixedLogger>();

type ConsoleMethod = (...args: unknown[]) => void;

export interface PrefixedLogger extends ToolLogger {
  readonly prefix: string;
  isDebugEnabled(): boolean;
}

export function loggerFor(prefix: string): PrefixedLogger {
  const cached = LOGGER_CACHE.get(prefix);
  if (cached) {
    return cached;
  }

  const prefixed = createPrefixedLogger(prefix);
  LOGGER_CACHE.set(prefix, prefixed);
  return prefixed;
}

function createPrefixedLogger(prefix: string): PrefixedLogger {
  const render = (level: LogLevel, message: string, details?: Record<string, unknown>) => {
    if (shouldSkip(level)) {
      return;
    }
    const write = selectConsole(level);
    const label = `[${prefix}] ${message}`;
    if (details && Object.keys(details).length > 0) {
      write(label, details);
    } else {
      write(label);
    }
  };

  return {
    prefix,
    debug(message, details) {
      render("debug", message, details);
    },
    info(message, details) {
      render("info", message, details);
    },
    warn(message, details) {
      render("warn", message, details);
    },
    error(message, details) {
      render("error", message, details);
    },
    isDebugEnabled() {
      return !shouldSkip("debug");
    },
  };
}

function shouldSkip(level: LogLevel): boolean {
  if (IS_TEST_ENV) {
    return true;
  }
  return LEVEL_ORDER[level] < ACTIVE_THRESHOLD;
}

function selectConsole(level: LogLevel): ConsoleMethod {
  switch (level) {
    case "debug":
      return console.debug.bind(console);
    case "info":
      return console.info.bind(console);
    case "warn":
      return console.warn.bind(console);
    case "error":
      return console.error.bind(console);
  }
}

export function normaliseLevel(raw?: string): LogLevel | undefined {
  if (!raw) return undefined;
  const lowered = raw.trim().toLowerCase();
  if (lowered === "debug" || lowered === "info" || lowered === "warn" || lowered === "error") {
    return lowered;
  }
  return undefined;
}

export function payloadByteLength(payload: unknown): number {
  if (payload === null || payload === undefined) {
    return 0;
  }
  if (Buffer.isBuffer(payload)) {
    return payload.byteLength;
  }
  if (typeof payload === "string") {
    return Buffer.byteLength(payload, "utf8");
  }
  if (typeof payload === "object") {
    try {
      return Buffer.byteLength(JSON.stringify(payload) ?? "", "utf8");
    } catch {
      return Buffer.byteLength(String(payload), "utf8");
    }
  }
  if (typeof payload === "number" || typeof payload === "boolean" || typeof payload === "bigint") {
    return Buffer.byteLength(String(payload), "utf8");
  }
  return 0;
}

/** Debug-friendly copy: JSON text bodies are parsed, buffers hex encoded. */
export function formatPayloadForDebug(payload: unknown): unknown {
  if (payload === null || payload === undefined) {
    return payload;
  }
  if (Buffer.isBuffer(payload)) {
    return payload.toString("hex");
  }
  if (typeof payload === "string") {
    const trimmed = payload.trim();
    if (trimmed.startsWith("{") || trimmed.startsWith("[")) {
      try {
        return JSON.parse(trimmed);
      } catch {
        return payload;
      }
    }
    return payload;
  }
  if (typeof payload === "object") {
    try {
      return JSON.parse(JSON.stringify(payload));
    } catch {
      return payload;
    }
  }
  return payload;
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    const message = error.message || error.name || "Error";
    return collapseWhitespace(message);
  }
  if (error === null || error === undefined) {
    return "unknown error";
  }
  return collapseWhitespace(String(error));
}

function collapseWhitespace(input: string): string {
  return input.replace(/\s+/g, " ").trim();
}
