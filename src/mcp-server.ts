/*
UNO MIDI MCP - An MCP Server for the Arduino UNO R4 WiFi MIDI sequencer
Copyright (C) 2025 Christian Gleissner

Licensed under the GNU General Public License v2.0 or later.
See <https://www.gnu.org/licenses/> for details.
*/

import { createServer, type IncomingMessage, type Server as HttpServer, type ServerResponse } from "node:http";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { loadConfig, type UnoBridgeConfig } from "./config.js";
import { UnoBridgeClient, type SequenceBridge } from "./unoClient.js";
import { toolRegistry } from "./tools/registry.js";
import { InvalidConfigurationError, unknownErrorResult } from "./tools/errors.js";
import { createToolTrace } from "./tools/trace.js";
import type { JsonSchema, ToolRunResult } from "./tools/types.js";
import { formatErrorMessage, formatPayloadForDebug, loggerFor, payloadByteLength } from "./logger.js";

export const SERVER_NAME = "uno-midi-bridge";
export const SERVER_VERSION = "0.1.0";
export const SERVER_INSTRUCTIONS =
  "Uploads MIDI note sequences to an Arduino UNO R4 WiFi over HTTP and keeps track of its playback status.";
export const MCP_HTTP_PATH = "/mcp";

export interface ServerRuntimeContext {
  /** Null only when start-up has not constructed the bridge. */
  readonly client: SequenceBridge | null;
}

type ToolInputSchema = {
  [key: string]: unknown;
  type: "object";
  properties?: Record<string, JsonSchema>;
  required?: string[];
};

export function createMcpServer(runtime: ServerRuntimeContext): Server {
  const toolLogger = loggerFor("tool");

  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
        logging: {},
      },
      instructions: SERVER_INSTRUCTIONS,
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    const startedAt = Date.now();
    const response = {
      tools: toolRegistry.list().map((descriptor) => ({
        name: descriptor.name,
        description: descriptor.description,
        inputSchema: toInputSchema(descriptor.inputSchema),
        _meta: { ...descriptor.metadata },
      })),
    };

    const latency = Date.now() - startedAt;
    const bytes = payloadByteLength(response);
    toolLogger.info(`list tools count=${response.tools.length} bytes=${bytes} latencyMs=${latency}`);

    if (toolLogger.isDebugEnabled()) {
      toolLogger.debug("list tools response", { response: formatPayloadForDebug(response) });
    }

    return response;
  });

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name } = request.params;
    const args = request.params.arguments ?? {};
    const startedAt = Date.now();
    if (toolLogger.isDebugEnabled()) {
      toolLogger.debug("tool request", {
        name,
        arguments: formatPayloadForDebug(args),
      });
    }

    try {
      const result = await toolRegistry.invoke(name, args, {
        client: runtime.client,
        logger: toolLogger,
        trace: createToolTrace(extra.sendNotification, toolLogger),
      });

      const response = toCallToolResult(result);
      const latency = Date.now() - startedAt;
      const bytes = payloadByteLength(response);
      const status = result.isError ? "error" : "ok";

      toolLogger.info(`call tool name=${name} status=${status} bytes=${bytes} latencyMs=${latency}`);

      if (toolLogger.isDebugEnabled()) {
        toolLogger.debug("tool response", {
          name,
          response: formatPayloadForDebug(response),
        });
      }

      return response;
    } catch (error) {
      const latency = Date.now() - startedAt;
      const response = toCallToolResult(unknownErrorResult(error));
      const bytes = payloadByteLength(response);

      toolLogger.error(`call tool name=${name} status=failed bytes=${bytes} latencyMs=${latency} error=${formatErrorMessage(error)}`);

      return response;
    }
  });

  return server;
}

function toInputSchema(schema: JsonSchema | undefined): ToolInputSchema {
  return {
    type: "object",
    ...(schema?.description ? { description: schema.description } : {}),
    properties: { ...(schema?.properties ?? {}) },
    ...(schema?.required && schema.required.length > 0 ? { required: [...schema.required] } : {}),
    ...(schema?.additionalProperties !== undefined ? { additionalProperties: schema.additionalProperties } : {}),
  };
}

export function toCallToolResult(result: ToolRunResult): {
  content: Array<{ type: "text"; text: string }>;
  structuredContent?: Record<string, unknown>;
  isError?: boolean;
  _meta?: Record<string, unknown>;
} {
  return {
    content: result.content.map((item) => ({ type: item.type, text: item.text })),
    ...(result.structuredContent !== undefined ? { structuredContent: result.structuredContent } : {}),
    ...(result.isError ? { isError: true } : {}),
    ...(result.metadata !== undefined ? { _meta: result.metadata } : {}),
  };
}

/** One GET /status at start-up so a wrong address shows up in the log early. */
export async function logConnectivity(client: SequenceBridge): Promise<boolean> {
  const deviceLogger = loggerFor("uno");
  try {
    const status = await client.getStatus();
    deviceLogger.info(`Connectivity check succeeded for UNO at ${client.baseUrl}`, {
      status: formatPayloadForDebug(status),
    });
    return true;
  } catch (error) {
    deviceLogger.warn(`Connectivity check failed for UNO at ${client.baseUrl}: ${formatErrorMessage(error)}`);
    return false;
  }
}

async function startStdio(runtime: ServerRuntimeContext, onClose: () => void): Promise<Server> {
  const server = createMcpServer(runtime);
  server.onclose = onClose;
  await server.connect(new StdioServerTransport());
  return server;
}

/** Stateless Streamable HTTP: a fresh server/transport pair per request. */
export async function startHttpServer(
  runtime: ServerRuntimeContext,
  options: { host: string; port: number },
): Promise<HttpServer> {
  const httpLogger = loggerFor("http");

  const httpServer = createServer((req, res) => {
    const path = (req.url ?? "/").split("?")[0];
    if (path !== MCP_HTTP_PATH) {
      res.writeHead(404, { "Content-Type": "text/plain" });
      res.end("Not found");
      return;
    }

    handleHttpRequest(runtime, req, res).catch((error: unknown) => {
      httpLogger.error(`${req.method ?? "?"} ${path} failed error=${formatErrorMessage(error)}`);
      if (!res.headersSent) {
        res.writeHead(500, { "Content-Type": "application/json" });
        res.end(JSON.stringify({ jsonrpc: "2.0", error: { code: -32603, message: "Internal server error" }, id: null }));
      }
    });
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(options.port, options.host, () => {
      httpServer.off("error", reject);
      resolve();
    });
  });

  httpLogger.info(`listening on http://${options.host}:${options.port}${MCP_HTTP_PATH}`);
  return httpServer;
}

async function handleHttpRequest(runtime: ServerRuntimeContext, req: IncomingMessage, res: ServerResponse): Promise<void> {
  const server = createMcpServer(runtime);
  const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
  res.on("close", () => {
    void Promise.allSettled([transport.close(), server.close()]);
  });
  await server.connect(transport);
  await transport.handleRequest(req, res);
}

/** Runs every closer once, whichever exit path asks first. */
export function createShutdown(closers: ReadonlyArray<() => unknown>): () => Promise<void> {
  let pending: Promise<void> | null = null;
  return () => {
    if (!pending) {
      pending = (async () => {
        for (const close of closers) {
          await close();
        }
      })();
    }
    return pending;
  };
}

export async function main(argv: readonly string[]): Promise<void> {
  const logger = loggerFor("server");

  let config: UnoBridgeConfig;
  let client: UnoBridgeClient;
  try {
    config = loadConfig({ argv });
    client = new UnoBridgeClient(config.baseUrl, { timeoutMs: config.timeoutMs });
  } catch (error) {
    if (error instanceof InvalidConfigurationError) {
      console.error(`Error: ${error.message}`);
      process.exitCode = 2;
      return;
    }
    throw error;
  }

  console.error(`Starting ${SERVER_NAME} MCP server (device ${client.baseUrl}, transport ${config.transport})...`);

  const runtime: ServerRuntimeContext = { client };
  const closers: Array<() => unknown> = [];
  const shutdown = createShutdown(closers);
  const exitAfterShutdown = (reason: string) => {
    logger.info(`shutting down (${reason})`);
    shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error(`shutdown failed error=${formatErrorMessage(error)}`);
        process.exit(1);
      },
    );
  };

  if (config.transport === "streamable-http") {
    const httpServer = await startHttpServer(runtime, { host: config.httpHost, port: config.httpPort });
    closers.push(
      () =>
        new Promise<void>((resolve) => {
          httpServer.closeAllConnections();
          httpServer.close(() => resolve());
        }),
    );
  } else {
    const server = await startStdio(runtime, () => exitAfterShutdown("stdio closed"));
    closers.push(() => {
      server.onclose = undefined;
      return server.close();
    });
  }
  closers.push(() => client.close());

  process.once("SIGINT", () => exitAfterShutdown("SIGINT"));
  process.once("SIGTERM", () => exitAfterShutdown("SIGTERM"));
  process.once("exit", () => client.close());

  await logConnectivity(client);

  console.error(`${SERVER_NAME} MCP server running on ${config.transport}`);
}
