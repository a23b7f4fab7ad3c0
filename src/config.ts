/*
UNO MIDI MCP - An MCP Server for the Arduino UNO R4 WiFi MIDI sequencer
Copyright (C) 2025 Christian Gleissner

Licensed under the GNU General Public License v2.0 or later.
See <https://www.gnu.org/licenses/> for details.
*/

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { InvalidConfigurationError } from "./tools/errors.js";

export const TRANSPORT_MODES = ["stdio", "streamable-http"] as const;

export type TransportMode = (typeof TRANSPORT_MODES)[number];

export interface UnoBridgeConfig {
  /** Base URL of the UNO REST API, scheme included. */
  baseUrl: string;
  timeoutMs: number;
  transport: TransportMode;
  httpHost: string;
  httpPort: number;
}

export interface LoadConfigOptions {
  argv?: readonly string[];
  env?: NodeJS.ProcessEnv;
}

/** Shape of `.unobridge.json`. */
interface FileConfig {
  baseUrl?: string;
  timeoutSeconds?: number | string;
  transport?: string;
  http?: { host?: string; port?: number | string };
}

interface CliConfig {
  baseUrl?: string;
  timeout?: string;
  transport?: string;
  host?: string;
  port?: string;
}

export const DEFAULT_TIMEOUT_SECONDS = 5;
export const DEFAULT_HTTP_HOST = "127.0.0.1";
export const DEFAULT_HTTP_PORT = 3000;

const REPO_CONFIG_PATH = join(dirname(fileURLToPath(import.meta.url)), "..", ".unobridge.json");

/**
 * Resolve settings from CLI flags, then environment, then the JSON config file.
 * Throws {@link InvalidConfigurationError} when the base URL is missing or a
 * value cannot be used.
 */
export function loadConfig(options: LoadConfigOptions = {}): UnoBridgeConfig {
  const env = options.env ?? process.env;
  const cli = parseCliArgs(options.argv ?? []);
  const file = readConfigFile(env);

  const baseUrl = firstDefined(
    configuredString(cli.baseUrl),
    configuredString(env.UNO_R4_BASE_URL),
    configuredString(file.baseUrl),
  );
  if (!baseUrl) {
    throw new InvalidConfigurationError("--base-url or UNO_R4_BASE_URL must be provided");
  }

  const timeoutSeconds = parseTimeout(
    firstDefined(configuredString(cli.timeout), configuredString(env.UNO_R4_TIMEOUT), configuredValue(file.timeoutSeconds)),
  );

  const transport = parseTransport(
    firstDefined(configuredString(cli.transport), configuredString(env.MCP_TRANSPORT), configuredString(file.transport)),
  );

  const httpHost =
    firstDefined(configuredString(cli.host), configuredString(env.MCP_HTTP_HOST), configuredString(file.http?.host)) ??
    DEFAULT_HTTP_HOST;

  const httpPort = parsePort(
    firstDefined(configuredString(cli.port), configuredString(env.MCP_HTTP_PORT), configuredValue(file.http?.port)),
  );

  return {
    baseUrl,
    timeoutMs: Math.round(timeoutSeconds * 1000),
    transport,
    httpHost,
    httpPort,
  };
}

export function parseCliArgs(argv: readonly string[]): CliConfig {
  const cli: CliConfig = {};

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    const [flag, inline] = splitFlag(arg);
    const takeValue = (): string | undefined => {
      if (inline !== undefined) return inline;
      const next = argv[index + 1];
      if (next === undefined || next.startsWith("--")) return undefined;
      index += 1;
      return next;
    };

    switch (flag) {
      case "--base-url":
      case "--arduino-base-url":
        cli.baseUrl = takeValue();
        break;
      case "--timeout":
        cli.timeout = takeValue();
        break;
      case "--transport":
        cli.transport = takeValue();
        break;
      case "--http":
        cli.transport = "streamable-http";
        break;
      case "--host":
        cli.host = takeValue();
        break;
      case "--port":
        cli.port = takeValue();
        break;
      default:
        break;
    }
  }

  return cli;
}

function splitFlag(arg: string): [string, string | undefined] {
  const eq = arg.indexOf("=");
  if (arg.startsWith("--") && eq !== -1) {
    return [arg.slice(0, eq), arg.slice(eq + 1)];
  }
  return [arg, undefined];
}

function readConfigFile(env: NodeJS.ProcessEnv): FileConfig {
  const candidates = env.UNO_BRIDGE_CONFIG
    ? [env.UNO_BRIDGE_CONFIG]
    : [env.HOME ? join(env.HOME, ".unobridge.json") : undefined, REPO_CONFIG_PATH];

  for (const path of candidates) {
    if (!path) continue;
    let text: string;
    try {
      text = readFileSync(path, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) continue;
      throw error;
    }
    return parseConfigFile(text, path);
  }
  return {};
}

function parseConfigFile(text: string, path: string): FileConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new InvalidConfigurationError(`Config file ${path} is not valid JSON`, { cause: error, details: { path } });
  }
  if (!isRecord(raw)) {
    throw new InvalidConfigurationError(`Config file ${path} must contain a JSON object`, { details: { path } });
  }

  const http = isRecord(raw.http) ? raw.http : undefined;
  return {
    baseUrl: typeof raw.baseUrl === "string" ? raw.baseUrl : undefined,
    timeoutSeconds: numberOrString(raw.timeoutSeconds),
    transport: typeof raw.transport === "string" ? raw.transport : undefined,
    http: http
      ? { host: typeof http.host === "string" ? http.host : undefined, port: numberOrString(http.port) }
      : undefined,
  };
}

function parseTimeout(raw: string | undefined): number {
  if (raw === undefined) {
    return DEFAULT_TIMEOUT_SECONDS;
  }
  const seconds = Number(raw);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidConfigurationError(`Timeout must be a positive number of seconds (received "${raw}")`, {
      details: { timeout: raw },
    });
  }
  return seconds;
}

function parseTransport(raw: string | undefined): TransportMode {
  if (raw === undefined) {
    return "stdio";
  }
  const lowered = raw.toLowerCase();
  const match = TRANSPORT_MODES.find((mode) => mode === lowered);
  if (!match) {
    throw new InvalidConfigurationError(
      `Unsupported transport "${raw}" (expected one of ${TRANSPORT_MODES.join(", ")})`,
      { details: { transport: raw } },
    );
  }
  return match;
}

function parsePort(raw: string | undefined): number {
  if (raw === undefined) {
    return DEFAULT_HTTP_PORT;
  }
  const port = Number(raw);
  if (!Number.isInteger(port) || port <= 0 || port > 65_535) {
    throw new InvalidConfigurationError(`HTTP port must be an integer between 1 and 65535 (received "${raw}")`, {
      details: { port: raw },
    });
  }
  return port;
}

function configuredString(value: unknown): string | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function configuredValue(value: number | string | undefined): string | undefined {
  return typeof value === "number" ? String(value) : configuredString(value);
}

function numberOrString(value: unknown): number | string | undefined {
  return typeof value === "number" || typeof value === "string" ? value : undefined;
}

function firstDefined<T>(...values: Array<T | undefined>): T | undefined {
  for (const value of values) {
    if (value !== undefined) return value;
  }
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR");
}
