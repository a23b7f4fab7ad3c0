/*
UNO MIDI MCP - An MCP Server for the Arduino UNO R4 WiFi MIDI sequencer
Copyright (C) 2025 Christian Gleissner

Licensed under the GNU General Public License v2.0 or later.
See <https://www.gnu.org/licenses/> for details.
*/

import { Agent as HttpAgent } from "node:http";
import { Agent as HttpsAgent } from "node:https";
import axios, { type AxiosInstance } from "axios";
import { createLoggingHttpClient } from "./loggingHttpClient.js";
import { formatErrorMessage, type PrefixedLogger } from "./logger.js";
import { RequestQueue } from "./requestQueue.js";
import { toSequencePayload, type SequenceRequest } from "./sequence.js";
import {
  DeviceRejectionError,
  DeviceResponseError,
  DeviceUnavailableError,
  InvalidConfigurationError,
  NotInitializedError,
} from "./tools/errors.js";

export const SEQUENCE_PATH = "/sequence";
export const STATUS_PATH = "/status";
export const DEFAULT_TIMEOUT_MS = 5_000;

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** Whatever JSON the firmware answers with; its schema belongs to the device. */
export type DeviceResponse = JsonValue;

/** What the tool layer needs from the device connection. */
export interface SequenceBridge {
  readonly baseUrl: string;
  submitSequence(request: SequenceRequest): Promise<DeviceResponse>;
  getStatus(): Promise<DeviceResponse>;
  close(): void;
}

export interface UnoBridgeClientOptions {
  /** Per-request deadline. */
  readonly timeoutMs?: number;
  readonly logger?: PrefixedLogger;
}

type Operation = "sequence" | "status";

/**
 * HTTP client for the UNO R4 WiFi sequencer firmware. One instance per process;
 * requests are sent one at a time and never retried.
 */
export class UnoBridgeClient implements SequenceBridge {
  readonly baseUrl: string;
  readonly timeoutMs: number;
  private readonly http: AxiosInstance;
  private readonly httpAgent = new HttpAgent({ keepAlive: true });
  private readonly httpsAgent = new HttpsAgent({ keepAlive: true });
  private readonly queue = new RequestQueue();
  private closed = false;

  constructor(baseUrl: string, options: UnoBridgeClientOptions = {}) {
    const trimmed = baseUrl.trim();
    if (!/^https?:\/\//i.test(trimmed) || !hasHost(trimmed)) {
      throw new InvalidConfigurationError(
        `UNO base URL must include the scheme and host, e.g. http://192.168.1.42 (received "${baseUrl}")`,
        { details: { baseUrl } },
      );
    }

    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new InvalidConfigurationError(`HTTP timeout must be a positive number of milliseconds (received ${timeoutMs})`, {
        details: { timeoutMs },
      });
    }

    this.baseUrl = trimmed.replace(/\/+$/, "");
    this.timeoutMs = timeoutMs;
    this.http = createLoggingHttpClient(
      {
        baseURL: this.baseUrl,
        timeout: timeoutMs,
        httpAgent: this.httpAgent,
        httpsAgent: this.httpsAgent,
        // Bodies are parsed here so error text reaches callers verbatim.
        responseType: "text",
        headers: { Accept: "application/json" },
      },
      options.logger,
    );
  }

  get pendingRequests(): number {
    return this.queue.pending;
  }

  async submitSequence(request: SequenceRequest): Promise<DeviceResponse> {
    return this.send("POST", SEQUENCE_PATH, "sequence", toSequencePayload(request));
  }

  async getStatus(): Promise<DeviceResponse> {
    return this.send("GET", STATUS_PATH, "status");
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }

  private async send(method: "GET" | "POST", path: string, operation: Operation, body?: unknown): Promise<DeviceResponse> {
    if (this.closed) {
      throw new NotInitializedError("UNO bridge client has been closed");
    }

    return this.queue.run(async () => {
      let text: string;
      try {
        const response = await this.http.request<unknown>({ method, url: path, data: body });
        text = bodyText(response.data);
      } catch (error) {
        throw this.classifyFailure(error, operation);
      }
      return parseDeviceBody(text, `${method} ${path}`);
    });
  }

  private classifyFailure(error: unknown, operation: Operation): unknown {
    if (!axios.isAxiosError(error)) {
      return error;
    }

    const response = error.response;
    if (!response) {
      return new DeviceUnavailableError(`Failed to contact device at ${this.baseUrl}: ${formatErrorMessage(error)}`, {
        cause: error,
        details: { baseUrl: this.baseUrl, code: error.code ?? null },
      });
    }

    const detail = bodyText(response.data).trim();
    const reason = detail || formatErrorMessage(error);

    if (operation === "sequence" && response.status === 400) {
      return new DeviceRejectionError(`Device rejected the sequence: ${reason}`, {
        cause: error,
        details: { status: response.status, detail },
      });
    }

    return new DeviceResponseError(`Device returned ${response.status} ${response.statusText}: ${reason}`, {
      cause: error,
      details: { baseUrl: this.baseUrl, status: response.status, statusText: response.statusText, detail },
    });
  }
}

function hasHost(url: string): boolean {
  try {
    return new URL(url).host !== "";
  } catch {
    return false;
  }
}

function bodyText(data: unknown): string {
  if (typeof data === "string") {
    return data;
  }
  if (data === undefined || data === null) {
    return "";
  }
  return String(data);
}

function parseDeviceBody(text: string, exchange: string): DeviceResponse {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return {};
  }
  try {
    return JSON.parse(trimmed);
  } catch (error) {
    const excerpt = trimmed.length > 120 ? `${trimmed.slice(0, 120)}…` : trimmed;
    throw new DeviceResponseError(`Device returned invalid JSON for ${exchange}: ${excerpt}`, {
      cause: error,
      details: { body: excerpt },
    });
  }
}
