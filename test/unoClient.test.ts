import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DeviceMockServer, startDeviceMockServer } from "../src/mock/deviceMockServer.js";
import { UnoBridgeClient } from "../src/unoClient.js";
import { createSequenceRequest } from "../src/sequence.js";
import {
  DeviceRejectionError,
  DeviceResponseError,
  DeviceUnavailableError,
  InvalidConfigurationError,
  NotInitializedError,
} from "../src/tools/errors.js";

describe("UnoBridgeClient", () => {
  let mock: DeviceMockServer;
  let client: UnoBridgeClient;

  beforeEach(async () => {
    mock = await startDeviceMockServer();
    client = new UnoBridgeClient(mock.baseUrl, { timeoutMs: 2_000 });
  });

  afterEach(async () => {
    client.close();
    await mock.stop();
  });

  it("posts the sequence as JSON", async () => {
    const request = createSequenceRequest([{ type: "note", ticks: 24, note: 60 }]);

    const result = await client.submitSequence(request);

    expect(result).toEqual({ status: "ok", loaded: 1, channel: 1 });
    expect(mock.requests).toHaveLength(1);
    const [recorded] = mock.requests;
    expect(recorded?.method).toBe("POST");
    expect(recorded?.path).toBe("/sequence");
    expect(recorded?.contentType).toContain("application/json");
    expect(recorded?.body).toBe('{"channel":1,"sequence":[{"type":"note","ticks":24,"note":60,"velocity":100}]}');
  });

  it("returns the status body unchanged", async () => {
    mock.respondWith("/status", { status: 200, body: '{"playing":true,"bpm":120,"extra":[1,2]}' });

    await expect(client.getStatus()).resolves.toEqual({ playing: true, bpm: 120, extra: [1, 2] });
    expect(mock.requests[0]?.method).toBe("GET");
  });

  it("maps an empty success body to an empty object", async () => {
    mock.respondWith("/sequence", { status: 200, body: "" });
    await expect(client.submitSequence(createSequenceRequest([{ type: "rest", ticks: 24 }]))).resolves.toEqual({});
  });

  it("turns a 400 on upload into a rejection carrying the device text", async () => {
    mock.respondWith("/sequence", { status: 400, body: "bad note", contentType: "text/plain" });

    const failure = client.submitSequence(createSequenceRequest([{ type: "note", ticks: 24, note: 60 }]));

    await expect(failure).rejects.toBeInstanceOf(DeviceRejectionError);
    await expect(failure).rejects.toThrow("Device rejected the sequence: bad note");
  });

  it("reports other HTTP failures with status and body", async () => {
    mock.respondWith("/status", { status: 500, body: "boom", contentType: "text/plain" });

    const failure = client.getStatus();

    await expect(failure).rejects.toBeInstanceOf(DeviceResponseError);
    await expect(failure).rejects.toThrow("Device returned 500 Internal Server Error: boom");
  });

  it("does not treat a 400 on status as a rejection", async () => {
    mock.respondWith("/status", { status: 400, body: "nope", contentType: "text/plain" });
    await expect(client.getStatus()).rejects.toBeInstanceOf(DeviceResponseError);
  });

  it("reports invalid JSON from the device", async () => {
    mock.respondWith("/status", { status: 200, body: "<html>", contentType: "text/html" });
    await expect(client.getStatus()).rejects.toThrow("Device returned invalid JSON for GET /status: <html>");
  });

  it("reports timeouts as transport failures", async () => {
    const slowClient = new UnoBridgeClient(mock.baseUrl, { timeoutMs: 100 });
    mock.respondWith("/status", { status: 200, body: "{}", delayMs: 1_000 });

    try {
      const failure = slowClient.getStatus();
      await expect(failure).rejects.toBeInstanceOf(DeviceUnavailableError);
      await expect(failure).rejects.toThrow(`Failed to contact device at ${mock.baseUrl}: timeout of 100ms exceeded`);
    } finally {
      slowClient.close();
    }
  });

  it("reports refused connections as transport failures", async () => {
    const idle = new DeviceMockServer();
    await idle.start();
    const deadUrl = idle.baseUrl;
    await idle.stop();

    const deadClient = new UnoBridgeClient(deadUrl, { timeoutMs: 1_000 });
    try {
      const failure = deadClient.getStatus();
      await expect(failure).rejects.toBeInstanceOf(DeviceUnavailableError);
      await expect(failure).rejects.toThrow(`Failed to contact device at ${deadUrl}: `);
    } finally {
      deadClient.close();
    }
  });

  it("sends overlapping calls one at a time, in order", async () => {
    mock.respondWith("/status", { status: 200, body: '{"playing":false}', delayMs: 50 });

    const calls = [
      client.submitSequence(createSequenceRequest([{ type: "rest", ticks: 1 }])),
      client.getStatus(),
      client.submitSequence(createSequenceRequest([{ type: "rest", ticks: 2 }, { type: "rest", ticks: 2 }])),
    ];
    expect(client.pendingRequests).toBe(3);

    await Promise.all(calls);

    expect(mock.maxConcurrentRequests).toBe(1);
    expect(mock.requests.map((request) => `${request.method} ${request.path}`)).toEqual([
      "POST /sequence",
      "GET /status",
      "POST /sequence",
    ]);
    expect(client.pendingRequests).toBe(0);
  });

  it("keeps serving after a failed request", async () => {
    mock.respondWith("/sequence", { status: 400, body: "bad", contentType: "text/plain" });

    const rejected = client.submitSequence(createSequenceRequest([{ type: "rest", ticks: 1 }]));
    const status = client.getStatus();

    await expect(rejected).rejects.toBeInstanceOf(DeviceRejectionError);
    await expect(status).resolves.toEqual({ playing: false, channel: 1, loadedEvents: 0, wifi: { connected: true } });
  });

  it("refuses calls after close", async () => {
    client.close();
    client.close();
    await expect(client.getStatus()).rejects.toBeInstanceOf(NotInitializedError);
    expect(mock.requests).toHaveLength(0);
  });

  it("trims trailing slashes from the base URL", () => {
    const trimmed = new UnoBridgeClient(`${mock.baseUrl}///`);
    expect(trimmed.baseUrl).toBe(mock.baseUrl);
    trimmed.close();
  });

  it.each(["192.168.1.42", "ftp://uno.local", "", "http://", "https:///"])("rejects base URL %j", (baseUrl) => {
    expect(() => new UnoBridgeClient(baseUrl)).toThrow(InvalidConfigurationError);
    expect(() => new UnoBridgeClient(baseUrl)).toThrow(`UNO base URL must include the scheme and host, e.g. http://192.168.1.42 (received "${baseUrl}")`);
  });

  it("rejects a non-positive timeout", () => {
    expect(() => new UnoBridgeClient("http://uno.local", { timeoutMs: 0 })).toThrow(InvalidConfigurationError);
  });
});
