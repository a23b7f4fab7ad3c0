/*
UNO MIDI MCP - An MCP Server for the Arduino UNO R4 WiFi MIDI sequencer
Copyright (C) 2025 Christian Gleissner

Licensed under the GNU General Public License v2.0 or later.
See <https://www.gnu.org/licenses/> for details.
*/

import axios, {
  type AxiosError,
  type AxiosInstance,
  type AxiosResponse,
  type CreateAxiosDefaults,
  type InternalAxiosRequestConfig,
} from "axios";
import { formatErrorMessage, formatPayloadForDebug, loggerFor, payloadByteLength, type PrefixedLogger } from "./logger.js";

type RequestMeta = {
  startedAt: number;
  method: string;
  path: string;
  body?: unknown;
};

/**
 * axios instance that logs one summary line per exchange (warn on failure) and
 * full bodies when debug logging is on. Errors are re-thrown untouched.
 */
export function createLoggingHttpClient(
  config: CreateAxiosDefaults,
  logger: PrefixedLogger = loggerFor("uno"),
): AxiosInstance {
  const instance = axios.create(config);
  const inFlight = new WeakMap<InternalAxiosRequestConfig, RequestMeta>();

  instance.interceptors.request.use((request) => {
    inFlight.set(request, {
      startedAt: Date.now(),
      method: (request.method ?? "get").toUpperCase(),
      path: resolvePath(request),
      body: request.data,
    });
    return request;
  });

  instance.interceptors.response.use(
    (response) => {
      handleResponse(response, inFlight.get(response.config), logger);
      inFlight.delete(response.config);
      return response;
    },
    (error: AxiosError) => {
      const meta = error.config ? inFlight.get(error.config) : undefined;
      handleError(error, meta, logger);
      if (error.config) {
        inFlight.delete(error.config);
      }
      return Promise.reject(error);
    },
  );

  return instance;
}

function handleResponse(response: AxiosResponse, meta: RequestMeta | undefined, logger: PrefixedLogger): void {
  const latency = meta ? Date.now() - meta.startedAt : 0;
  const method = meta?.method ?? (response.config.method ?? "get").toUpperCase();
  const path = meta?.path ?? resolvePath(response.config);
  const bytes = payloadByteLength(response.data);

  logger.info(`${method} ${path} status=${response.status} bytes=${bytes} latencyMs=${latency}`);

  if (logger.isDebugEnabled()) {
    logger.debug(`request ${method} ${path}`, { body: formatPayloadForDebug(meta?.body) });
    logger.debug(`response ${method} ${path}`, {
      status: response.status,
      body: formatPayloadForDebug(response.data),
    });
  }
}

function handleError(error: AxiosError, meta: RequestMeta | undefined, logger: PrefixedLogger): void {
  const config = error.config;
  if (!config) {
    logger.error(`UNKNOWN UNKNOWN status=ERR bytes=0 latencyMs=0 error=${formatErrorMessage(error)}`);
    return;
  }

  const latency = meta ? Date.now() - meta.startedAt : 0;
  const method = meta?.method ?? (config.method ?? "get").toUpperCase();
  const path = meta?.path ?? resolvePath(config);
  const response = error.response;
  const status = response?.status ?? "ERR";
  const bytes = response ? payloadByteLength(response.data) : 0;
  const message = formatErrorMessage(error);

  logger.warn(`${method} ${path} status=${status} bytes=${bytes} latencyMs=${latency} error=${message}`);

  if (logger.isDebugEnabled()) {
    logger.debug(`request ${method} ${path}`, { body: formatPayloadForDebug(meta?.body) });
    logger.debug(`error ${method} ${path}`, {
      status,
      code: error.code,
      body: response ? formatPayloadForDebug(response.data) : null,
      message,
    });
  }
}

function resolvePath(config: InternalAxiosRequestConfig): string {
  if (config.url) return config.url;
  if (config.baseURL) return config.baseURL;
  return "UNKNOWN";
}
