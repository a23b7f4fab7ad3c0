import { describe, expect, it } from "vitest";
import { sequencerModule } from "../src/tools/sequencer.js";
import { toolRegistry } from "../src/tools/registry.js";
import type { SequenceRequest } from "../src/sequence.js";
import type { DeviceResponse, SequenceBridge } from "../src/unoClient.js";
import type { ToolExecutionContext, ToolLogger } from "../src/tools/types.js";
import { DeviceRejectionError, DeviceUnavailableError } from "../src/tools/errors.js";

class FakeBridge implements SequenceBridge {
  readonly baseUrl = "http://uno.test";
  readonly submitted: SequenceRequest[] = [];
  statusCalls = 0;
  failure: Error | null = null;

  async submitSequence(request: SequenceRequest): Promise<DeviceResponse> {
    if (this.failure) throw this.failure;
    this.submitted.push(request);
    return { status: "ok", loaded: request.sequence.length };
  }

  async getStatus(): Promise<DeviceResponse> {
    this.statusCalls += 1;
    if (this.failure) throw this.failure;
    return { playing: true, tempo: 120 };
  }

  close(): void {}
}

const silentLogger: ToolLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

function createContext(client: SequenceBridge | null) {
  const traces: Array<[string, string]> = [];
  const ctx: ToolExecutionContext = {
    client,
    logger: silentLogger,
    trace: {
      info: (message) => traces.push(["info", message]),
      debug: (message) => traces.push(["debug", message]),
    },
  };
  return { ctx, traces };
}

function errorMetadata(result: { metadata?: Record<string, unknown> }) {
  return result.metadata?.error;
}

describe("sequencer module", () => {
  it("describes load_sequence and get_status", () => {
    const names = sequencerModule.describeTools().map((tool) => tool.name);
    expect(names).toEqual(["load_sequence", "get_status"]);
    expect(toolRegistry.list().map((tool) => tool.name)).toEqual(["load_sequence", "get_status"]);
  });

  it("tags tools with the module domain", () => {
    const [loadSequence] = sequencerModule.describeTools();
    expect(loadSequence?.metadata.domain).toBe("sequencer");
    expect(loadSequence?.metadata.tags).toEqual(["midi", "uno", "sequence", "upload"]);
    expect(loadSequence?.metadata.workflowHints?.[0]).toBe(
      "Durations are MIDI clock ticks: 24 per quarter note, 12 per eighth, 96 per 4/4 bar.",
    );
    expect(Object.keys(loadSequence?.metadata ?? {})).toEqual(["domain", "summary", "examples", "tags", "workflowHints"]);
  });
});

describe("load_sequence", () => {
  it("submits a normalised request and returns the device reply", async () => {
    const bridge = new FakeBridge();
    const { ctx, traces } = createContext(bridge);

    const result = await toolRegistry.invoke(
      "load_sequence",
      {
        channel: 2,
        sequence: [
          { type: "note", ticks: 24, note: 60 },
          { type: "rest", ticks: 12, note: 61 },
        ],
      },
      ctx,
    );

    expect(result.isError).toBeUndefined();
    expect(result.structuredContent).toEqual({ status: "ok", loaded: 2 });
    expect(result.content[0]?.text).toBe(JSON.stringify({ status: "ok", loaded: 2 }, null, 2));
    expect(bridge.submitted).toEqual([
      {
        channel: 2,
        sequence: [
          { type: "note", ticks: 24, note: 60, velocity: 100 },
          { type: "rest", ticks: 12 },
        ],
      },
    ]);
    expect(traces).toEqual([
      ["info", "Uploading 2 events to http://uno.test on channel 2."],
      ["debug", 'Device response: {"status":"ok","loaded":2}'],
    ]);
  });

  it("fails before validation when the bridge is missing", async () => {
    const { ctx } = createContext(null);
    const result = await toolRegistry.invoke("load_sequence", { sequence: [] }, ctx);

    expect(result.isError).toBe(true);
    expect(result.content[0]?.text).toBe("UNO bridge client has not been initialised; start the server first");
    expect(errorMetadata(result)).toEqual({ kind: "configuration", code: "not_initialized" });
  });

  it("rejects invalid events without contacting the device", async () => {
    const bridge = new FakeBridge();
    const { ctx, traces } = createContext(bridge);

    const result = await toolRegistry.invoke(
      "load_sequence",
      { sequence: [{ type: "note", ticks: 24, note: 60 }, { type: "note", ticks: 24 }] },
      ctx,
    );

    expect(result.isError).toBe(true);
    expect(result.content[0]?.text).toBe("'note' is required when type is 'note' (at $.sequence[1].note)");
    expect(errorMetadata(result)).toMatchObject({ kind: "validation", code: "missing_required_field" });
    expect(bridge.submitted).toEqual([]);
    expect(traces).toEqual([]);
  });

  it.each([
    [{ type: "note", ticks: 24, note: 200 }, "'note' must be between 0 and 127 (received 200) (at $.sequence[2].note)", { field: "note", value: 200 }],
    [{ type: "note", ticks: 24, note: 60, velocity: 0 }, "'velocity' must be between 1 and 127 (received 0) (at $.sequence[2].velocity)", { field: "velocity", value: 0 }],
    [{ type: "note", ticks: 0, note: 60 }, "'ticks' must be ≥ 1 (received 0) (at $.sequence[2].ticks)", { field: "ticks", value: 0 }],
    [{ type: "chord", ticks: 24 }, "Event type must be 'note' or 'rest' (at $.sequence[2].type)", { received: "chord" }],
  ] satisfies Array<[Record<string, unknown>, string, Record<string, unknown>]>)("reports the index of invalid event %o", async (event, message, details) => {
    const bridge = new FakeBridge();
    const { ctx } = createContext(bridge);
    const valid = { type: "note", ticks: 24, note: 60 };

    const result = await toolRegistry.invoke("load_sequence", { sequence: [valid, valid, event, valid] }, ctx);

    expect(result.isError).toBe(true);
    expect(result.content[0]?.text).toBe(message);
    expect(errorMetadata(result)).toMatchObject({ kind: "validation", details: { ...details, index: 2 } });
    expect(bridge.submitted).toEqual([]);
  });

  it.each([
    ["note", 0],
    ["note", -24],
    ["rest", 0],
    ["rest", -24],
  ] satisfies Array<[string, number]>)("rejects a %s lasting %i ticks", async (type, ticks) => {
    const bridge = new FakeBridge();
    const { ctx } = createContext(bridge);

    const result = await toolRegistry.invoke("load_sequence", { sequence: [{ type, ticks, note: 60 }] }, ctx);

    expect(result.content[0]?.text).toBe(`'ticks' must be ≥ 1 (received ${ticks}) (at $.sequence[0].ticks)`);
    expect(errorMetadata(result)).toMatchObject({ code: "out_of_range", details: { index: 0 } });
    expect(bridge.submitted).toEqual([]);
  });

  it("rejects out-of-range channels", async () => {
    const { ctx } = createContext(new FakeBridge());
    const result = await toolRegistry.invoke("load_sequence", { channel: 0, sequence: [{ type: "rest", ticks: 1 }] }, ctx);

    expect(result.content[0]?.text).toBe("'channel' must be between 1 and 16 (received 0) (at $.channel)");
  });

  it("rejects sequences longer than 64 events", async () => {
    const bridge = new FakeBridge();
    const { ctx } = createContext(bridge);
    const sequence = Array.from({ length: 65 }, () => ({ type: "rest", ticks: 1 }));

    const result = await toolRegistry.invoke("load_sequence", { sequence }, ctx);

    expect(result.content[0]?.text).toBe("'sequence' may contain at most 64 items (received 65) (at $.sequence)");
    expect(bridge.submitted).toEqual([]);
  });

  it("rejects unknown arguments", async () => {
    const { ctx } = createContext(new FakeBridge());
    const result = await toolRegistry.invoke("load_sequence", { sequence: [{ type: "rest", ticks: 1 }], tempo: 120 }, ctx);

    expect(errorMetadata(result)).toEqual({ kind: "validation", path: "$.tempo", code: "unexpected_property" });
  });

  it("surfaces device rejections", async () => {
    const bridge = new FakeBridge();
    bridge.failure = new DeviceRejectionError("Device rejected the sequence: bad note");
    const { ctx } = createContext(bridge);

    const result = await toolRegistry.invoke("load_sequence", { sequence: [{ type: "rest", ticks: 1 }] }, ctx);

    expect(result.isError).toBe(true);
    expect(result.content[0]?.text).toBe("Device rejected the sequence: bad note");
    expect(errorMetadata(result)).toEqual({ kind: "rejection", code: "device_rejected" });
  });

  it("wraps unexpected failures", async () => {
    const bridge = new FakeBridge();
    bridge.failure = new Error("socket exploded");
    const { ctx } = createContext(bridge);

    const result = await toolRegistry.invoke("load_sequence", { sequence: [{ type: "rest", ticks: 1 }] }, ctx);

    expect(result.content[0]?.text).toBe("socket exploded");
    expect(errorMetadata(result)).toEqual({ kind: "unknown" });
  });
});

describe("get_status", () => {
  it("returns the device status unchanged", async () => {
    const bridge = new FakeBridge();
    const { ctx, traces } = createContext(bridge);

    const result = await toolRegistry.invoke("get_status", {}, ctx);

    expect(result.structuredContent).toEqual({ playing: true, tempo: 120 });
    expect(traces).toEqual([["debug", 'Status: {"playing":true,"tempo":120}']]);
  });

  it("reports transport failures", async () => {
    const bridge = new FakeBridge();
    bridge.failure = new DeviceUnavailableError("Failed to contact device at http://uno.test: connect ECONNREFUSED");
    const { ctx } = createContext(bridge);

    const result = await toolRegistry.invoke("get_status", undefined, ctx);

    expect(result.isError).toBe(true);
    expect(errorMetadata(result)).toEqual({ kind: "execution", code: "transport_failure" });
  });

  it("reports a missing bridge", async () => {
    const { ctx } = createContext(null);
    const result = await toolRegistry.invoke("get_status", {}, ctx);
    expect(errorMetadata(result)).toEqual({ kind: "configuration", code: "not_initialized" });
  });
});

describe("toolRegistry", () => {
  it("throws for unknown tools", async () => {
    const { ctx } = createContext(null);
    await expect(toolRegistry.invoke("play", {}, ctx)).rejects.toThrow("Unknown tool: play");
  });
});
