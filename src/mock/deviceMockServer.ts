/*
UNO MIDI MCP - An MCP Server for the Arduino UNO R4 WiFi MIDI sequencer
Copyright (C) 2025 Christian Gleissner

Licensed under the GNU General Public License v2.0 or later.
See <https://www.gnu.org/licenses/> for details.
*/

import http, { type IncomingMessage, type ServerResponse } from "node:http";

export interface RecordedRequest {
  readonly method: string;
  readonly path: string;
  readonly contentType?: string;
  readonly body: string;
}

export interface CannedResponse {
  readonly status: number;
  readonly body: string;
  readonly contentType?: string;
  readonly delayMs?: number;
}

export interface DeviceMockServerOptions {
  host?: string;
  port?: number;
}

/**
 * Stand-in for the UNO sequencer firmware: accepts `POST /sequence`, answers
 * `GET /status`, and records every request. Responses can be overridden per
 * path to simulate rejections, faults and slow replies.
 */
export class DeviceMockServer {
  private readonly host: string;
  private readonly requestedPort: number | undefined;
  private server: http.Server | null = null;
  private readonly overrides = new Map<string, CannedResponse>();
  private readonly timers = new Set<NodeJS.Timeout>();
  private readonly recorded: RecordedRequest[] = [];
  private loadedEvents = 0;
  private channel = 1;
  private active = 0;
  private maxActive = 0;

  constructor(options?: DeviceMockServerOptions) {
    this.host = options?.host ?? "127.0.0.1";
    this.requestedPort = options?.port;
  }

  get requests(): readonly RecordedRequest[] {
    return this.recorded;
  }

  /** Highest number of requests the mock was serving at the same time. */
  get maxConcurrentRequests(): number {
    return this.maxActive;
  }

  get baseUrl(): string {
    return `http://${this.host}:${this.port}`;
  }

  get port(): number {
    const address = this.server?.address();
    if (!address || typeof address === "string") {
      throw new Error("DeviceMockServer is not listening");
    }
    return address.port;
  }

  respondWith(path: string, response: CannedResponse): void {
    this.overrides.set(path, response);
  }

  async start(): Promise<{ port: number; baseUrl: string }> {
    if (this.server) throw new Error("DeviceMockServer already started");
    const server = http.createServer((req, res) => this.handle(req, res));
    this.server = server;
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.requestedPort ?? 0, this.host, () => {
        server.off("error", reject);
        resolve();
      });
    });
    return { port: this.port, baseUrl: this.baseUrl };
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  private handle(req: IncomingMessage, res: ServerResponse): void {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => {
      const method = (req.method ?? "GET").toUpperCase();
      const path = (req.url ?? "/").split("?")[0] ?? "/";
      const body = Buffer.concat(chunks).toString("utf8");
      this.recorded.push({ method, path, contentType: req.headers["content-type"], body });

      this.active += 1;
      this.maxActive = Math.max(this.maxActive, this.active);

      const reply = this.overrides.get(path) ?? this.route(method, path, body);
      const send = () => {
        this.active -= 1;
        res.writeHead(reply.status, { "Content-Type": reply.contentType ?? "application/json" });
        res.end(reply.body);
      };

      if (reply.delayMs && reply.delayMs > 0) {
        const timer = setTimeout(() => {
          this.timers.delete(timer);
          send();
        }, reply.delayMs);
        this.timers.add(timer);
      } else {
        // Yield once so overlapping requests would be visible in maxActive.
        setImmediate(send);
      }
    });
  }

  private route(method: string, path: string, body: string): CannedResponse {
    if (method === "POST" && path === "/sequence") {
      return this.acceptSequence(body);
    }
    if (method === "GET" && path === "/status") {
      return json(200, {
        playing: false,
        channel: this.channel,
        loadedEvents: this.loadedEvents,
        wifi: { connected: true },
      });
    }
    return { status: 404, body: "not found", contentType: "text/plain" };
  }

  private acceptSequence(body: string): CannedResponse {
    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch {
      return { status: 400, body: "invalid json", contentType: "text/plain" };
    }
    if (typeof parsed !== "object" || parsed === null || !("sequence" in parsed) || !Array.isArray(parsed.sequence)) {
      return { status: 400, body: "missing sequence", contentType: "text/plain" };
    }
    this.loadedEvents = parsed.sequence.length;
    if ("channel" in parsed && typeof parsed.channel === "number") {
      this.channel = parsed.channel;
    }
    return json(200, { status: "ok", loaded: this.loadedEvents, channel: this.channel });
  }
}

function json(status: number, payload: unknown): CannedResponse {
  return { status, body: JSON.stringify(payload), contentType: "application/json" };
}

export async function startDeviceMockServer(options?: DeviceMockServerOptions): Promise<DeviceMockServer> {
  const mock = new DeviceMockServer(options);
  await mock.start();
  return mock;
}
