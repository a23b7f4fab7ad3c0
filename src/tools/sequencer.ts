/*
UNO MIDI MCP - An MCP Server for the Arduino UNO R4 WiFi MIDI sequencer
Copyright (C) 2025 Christian Gleissner

Licensed under the GNU General Public License v2.0 or later.
See <https://www.gnu.org/licenses/> for details.
*/

import {
  createSequenceRequest,
  DEFAULT_CHANNEL,
  EVENT_TYPES,
  MAX_CHANNEL,
  MAX_EVENTS,
  MAX_NOTE,
  MAX_VELOCITY,
  MIN_CHANNEL,
  MIN_NOTE,
  MIN_VELOCITY,
  TICKS_PER_QUARTER_NOTE,
  totalTicks,
} from "../sequence.js";
import type { DeviceResponse, SequenceBridge } from "../unoClient.js";
import { defineToolModule, type ToolExecutionContext } from "./types.js";
import { arraySchema, describedSchema, integerSchema, objectSchema, optionalSchema, stringSchema } from "./schema.js";
import { jsonResult } from "./responses.js";
import { NotInitializedError, ToolError, toolErrorResult, unknownErrorResult } from "./errors.js";

// Shape and JSON types only; ranges and the note/rest rules are decided by
// createSequenceRequest so failures carry the event index.
const midiEventSchema = objectSchema({
  description: "Single step in a monophonic MIDI sequence.",
  properties: {
    type: describedSchema(stringSchema({
      description: "Event type. Use 'note' for sounding events or 'rest' for silence.",
    }), { enum: EVENT_TYPES }),
    ticks: describedSchema(integerSchema({
      description: `Duration in MIDI clock ticks (${TICKS_PER_QUARTER_NOTE} ticks = quarter note).`,
    }), { minimum: 1 }),
    note: optionalSchema(describedSchema(integerSchema({
      description: "MIDI note number (0-127). Required when type='note'; ignored for rests.",
    }), { minimum: MIN_NOTE, maximum: MAX_NOTE })),
    velocity: optionalSchema(describedSchema(integerSchema({
      description: "MIDI velocity (1-127). Defaults to 100 when omitted for notes; ignored for rests.",
    }), { minimum: MIN_VELOCITY, maximum: MAX_VELOCITY })),
  },
  required: ["type", "ticks"],
});

export const loadSequenceArgsSchema = objectSchema({
  description: "Upload an ordered note/rest sequence to the UNO for playback.",
  properties: {
    channel: integerSchema({
      description: "Target MIDI channel for playback (1-16).",
      minimum: MIN_CHANNEL,
      maximum: MAX_CHANNEL,
      default: DEFAULT_CHANNEL,
      examples: [1],
    }),
    sequence: arraySchema(midiEventSchema, {
      description: "Ordered list of note/rest events described in MIDI clock ticks.",
      minItems: 1,
      maxItems: MAX_EVENTS,
    }),
  },
  required: ["sequence"],
});

export const getStatusArgsSchema = objectSchema({
  description: "No arguments.",
  properties: {},
});

function requireClient(ctx: ToolExecutionContext): SequenceBridge {
  if (!ctx.client) {
    throw new NotInitializedError();
  }
  return ctx.client;
}

/**
 * Validate the arguments into a sequence request and hand it to the device.
 * Invalid input never reaches the network.
 */
export async function loadSequence(args: unknown, ctx: ToolExecutionContext): Promise<DeviceResponse> {
  const client = requireClient(ctx);
  const parsed = loadSequenceArgsSchema.parse(args ?? {});
  const request = createSequenceRequest(parsed.sequence, parsed.channel);

  ctx.logger.debug("sequence request", {
    channel: request.channel,
    events: request.sequence.length,
    totalTicks: totalTicks(request),
  });
  ctx.trace.info(`Uploading ${request.sequence.length} events to ${client.baseUrl} on channel ${request.channel}.`);

  const result = await client.submitSequence(request);
  ctx.trace.debug(`Device response: ${JSON.stringify(result)}`);
  return result;
}

export async function getStatus(ctx: ToolExecutionContext): Promise<DeviceResponse> {
  const client = requireClient(ctx);
  const status = await client.getStatus();
  ctx.trace.debug(`Status: ${JSON.stringify(status)}`);
  return status;
}

export const sequencerModule = defineToolModule({
  domain: "sequencer",
  summary: "Upload MIDI note sequences to the UNO R4 WiFi and read back its playback status.",
  defaultTags: ["midi", "uno"],
  workflowHints: [
    `Durations are MIDI clock ticks: ${TICKS_PER_QUARTER_NOTE} per quarter note, ${TICKS_PER_QUARTER_NOTE / 2} per eighth, ${TICKS_PER_QUARTER_NOTE * 4} per 4/4 bar.`,
  ],
  tools: [
    {
      name: "load_sequence",
      description: "Buffer a MIDI sequence on the Arduino for clock-synchronised playback.",
      summary: "Validates up to 64 note/rest events and POSTs them to the UNO's /sequence endpoint.",
      inputSchema: loadSequenceArgsSchema.jsonSchema,
      tags: ["sequence", "upload"],
      examples: [
        {
          name: "Two notes and a rest",
          description: "C4 then E4 as quarter notes, followed by a quarter rest, on channel 1",
          arguments: {
            channel: 1,
            sequence: [
              { type: "note", ticks: 24, note: 60 },
              { type: "note", ticks: 24, note: 64, velocity: 90 },
              { type: "rest", ticks: 24 },
            ],
          },
        },
      ],
      workflowHints: [
        "Notes need a 'note' number; omit velocity to use 100.",
        "Report the device's acknowledgement back to the user verbatim.",
      ],
      async execute(args, ctx) {
        try {
          return jsonResult(await loadSequence(args, ctx));
        } catch (error) {
          if (error instanceof ToolError) {
            return toolErrorResult(error);
          }
          return unknownErrorResult(error);
        }
      },
    },
    {
      name: "get_status",
      description: "Read the UNO's current transport and network status.",
      summary: "GETs the UNO's /status endpoint and returns the JSON unchanged.",
      inputSchema: getStatusArgsSchema.jsonSchema,
      tags: ["status"],
      async execute(args, ctx) {
        try {
          getStatusArgsSchema.parse(args ?? {});
          return jsonResult(await getStatus(ctx));
        } catch (error) {
          if (error instanceof ToolError) {
            return toolErrorResult(error);
          }
          return unknownErrorResult(error);
        }
      },
    },
  ],
});
