/*
UNO MIDI MCP - An MCP Server for the Arduino UNO R4 WiFi MIDI sequencer
Copyright (C) 2025 Christian Gleissner

Licensed under the GNU General Public License v2.0 or later.
See <https://www.gnu.org/licenses/> for details.
*/

import {
  EmptyCollectionError,
  MissingRequiredFieldError,
  OutOfRangeError,
  TooManyItemsError,
  ToolValidationError,
} from "./tools/errors.js";

export const DEFAULT_CHANNEL = 1;
export const MIN_CHANNEL = 1;
export const MAX_CHANNEL = 16;
export const MAX_EVENTS = 64;
export const DEFAULT_VELOCITY = 100;
export const MIN_NOTE = 0;
export const MAX_NOTE = 127;
export const MIN_VELOCITY = 1;
export const MAX_VELOCITY = 127;
/** MIDI clock resolution used by the UNO sequencer. */
export const TICKS_PER_QUARTER_NOTE = 24;

export const EVENT_TYPES = ["note", "rest"] as const;

export type MidiEventType = (typeof EVENT_TYPES)[number];

/** Event fields as a caller supplies them; `null` counts as absent. */
export interface MidiEventInput {
  readonly type: string;
  readonly ticks: number;
  readonly note?: number | null;
  readonly velocity?: number | null;
}

export interface NoteEvent {
  readonly type: "note";
  readonly ticks: number;
  readonly note: number;
  readonly velocity: number;
}

export interface RestEvent {
  readonly type: "rest";
  readonly ticks: number;
}

export type MidiEvent = NoteEvent | RestEvent;

export type EventResult =
  | { readonly ok: true; readonly event: MidiEvent }
  | { readonly ok: false; readonly error: ToolValidationError };

export interface SequenceRequest {
  readonly channel: number;
  readonly sequence: readonly MidiEvent[];
}

export interface SequencePayloadEvent {
  type: MidiEventType;
  ticks: number;
  note?: number;
  velocity?: number;
}

/** JSON body of `POST /sequence`. */
export interface SequencePayload {
  channel: number;
  sequence: SequencePayloadEvent[];
}

/** Where an event sits in the caller's arguments; copied into error context. */
export interface EventLocation {
  readonly path?: string;
  readonly index?: number;
}

/**
 * Validate one event and bring it into canonical shape: notes always leave with
 * a velocity, rests never carry note data.
 */
export function normalizeEvent(input: MidiEventInput, location: EventLocation = {}): EventResult {
  try {
    return { ok: true, event: buildEvent(input, location) };
  } catch (error) {
    if (error instanceof ToolValidationError) {
      return { ok: false, error };
    }
    throw error;
  }
}

export function parseEvent(input: MidiEventInput, location: EventLocation = {}): MidiEvent {
  const result = normalizeEvent(input, location);
  if (!result.ok) {
    throw result.error;
  }
  return result.event;
}

function buildEvent(input: MidiEventInput, location: EventLocation): MidiEvent {
  const path = location.path ?? "$";
  const context = location.index !== undefined ? { index: location.index } : undefined;

  const type = input.type;
  if (!isEventType(type)) {
    throw new ToolValidationError("Event type must be 'note' or 'rest'", {
      path: `${path}.type`,
      details: { allowed: EVENT_TYPES, received: type, ...context },
    });
  }

  const ticks = requireInteger(input.ticks, "ticks", path, context);
  if (ticks < 1) {
    throw new OutOfRangeError("ticks", ticks, { minimum: 1 }, { path: `${path}.ticks`, details: context });
  }

  const note = optionalInRange(input.note, "note", { minimum: MIN_NOTE, maximum: MAX_NOTE }, path, context);
  const velocity = optionalInRange(input.velocity, "velocity", { minimum: MIN_VELOCITY, maximum: MAX_VELOCITY }, path, context);

  if (type === "rest") {
    return Object.freeze({ type, ticks });
  }

  if (note === undefined) {
    throw new MissingRequiredFieldError("note", {
      path: `${path}.note`,
      reason: "'note' is required when type is 'note'",
      details: context,
    });
  }

  return Object.freeze({ type, ticks, note, velocity: velocity ?? DEFAULT_VELOCITY });
}

function isEventType(value: unknown): value is MidiEventType {
  return EVENT_TYPES.some((candidate) => candidate === value);
}

function requireInteger(value: unknown, field: string, path: string, context?: Record<string, unknown>): number {
  if (value === undefined || value === null) {
    throw new MissingRequiredFieldError(field, { path: `${path}.${field}`, details: context });
  }
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new ToolValidationError(`'${field}' must be an integer`, {
      path: `${path}.${field}`,
      code: "invalid_type",
      details: { received: value, ...context },
    });
  }
  return value;
}

function optionalInRange(
  value: number | null | undefined,
  field: string,
  bounds: { minimum: number; maximum: number },
  path: string,
  context?: Record<string, unknown>,
): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  const integer = requireInteger(value, field, path, context);
  if (integer < bounds.minimum || integer > bounds.maximum) {
    throw new OutOfRangeError(field, integer, bounds, { path: `${path}.${field}`, details: context });
  }
  return integer;
}

/**
 * Build the request for one upload. Fails on the first invalid event, naming
 * its index; nothing is partially accepted.
 */
export function createSequenceRequest(
  sequence: readonly MidiEventInput[],
  channel: number = DEFAULT_CHANNEL,
): SequenceRequest {
  if (!Number.isInteger(channel) || channel < MIN_CHANNEL || channel > MAX_CHANNEL) {
    throw new OutOfRangeError("channel", channel, { minimum: MIN_CHANNEL, maximum: MAX_CHANNEL }, { path: "$.channel" });
  }

  const events = sequence.map((input, index) => parseEvent(input, { path: `$.sequence[${index}]`, index }));

  if (events.length === 0) {
    throw new EmptyCollectionError("sequence", { path: "$.sequence" });
  }
  if (events.length > MAX_EVENTS) {
    throw new TooManyItemsError("sequence", MAX_EVENTS, events.length, { path: "$.sequence" });
  }

  return Object.freeze({ channel, sequence: Object.freeze(events) });
}

export function toSequencePayload(request: SequenceRequest): SequencePayload {
  return {
    channel: request.channel,
    sequence: request.sequence.map((event) =>
      event.type === "note"
        ? { type: event.type, ticks: event.ticks, note: event.note, velocity: event.velocity }
        : { type: event.type, ticks: event.ticks },
    ),
  };
}

export function totalTicks(request: SequenceRequest): number {
  return request.sequence.reduce((sum, event) => sum + event.ticks, 0);
}
