/*
UNO MIDI MCP - An MCP Server for the Arduino UNO R4 WiFi MIDI sequencer
Copyright (C) 2025 Christian Gleissner

Licensed under the GNU General Public License v2.0 or later.
See <https://www.gnu.org/licenses/> for details.
*/

import type { ToolRunResult } from "./types.js";
import { textResult } from "./responses.js";

/**
 * validation: caller input was malformed, nothing was sent.
 * rejection: the device received the request and refused it (HTTP 400).
 * execution: the device could not be reached or answered with a failure.
 * configuration: set-up or ordering problem on our side.
 */
export type ToolErrorKind = "validation" | "rejection" | "execution" | "configuration" | "unknown";

export interface ToolErrorMetadata {
  readonly kind: ToolErrorKind;
  readonly path?: string;
  readonly code?: string;
  readonly details?: Record<string, unknown>;
}

export interface ToolErrorOptions {
  readonly path?: string;
  readonly code?: string;
  readonly details?: Record<string, unknown>;
  readonly cause?: unknown;
}

export class ToolError extends Error {
  readonly kind: ToolErrorKind;
  readonly path?: string;
  readonly code?: string;
  readonly details?: Record<string, unknown>;

  constructor(message: string, kind: ToolErrorKind, options?: ToolErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    this.kind = kind;
    this.path = options?.path;
    this.code = options?.code;
    this.details = options?.details;
  }
}

export class ToolValidationError extends ToolError {
  constructor(message: string, options?: ToolErrorOptions) {
    super(message, "validation", { ...options, code: options?.code ?? "invalid_value" });
  }
}

export class MissingRequiredFieldError extends ToolValidationError {
  readonly field: string;

  constructor(field: string, options?: { path?: string; reason?: string; details?: Record<string, unknown> }) {
    super(options?.reason ?? `'${field}' is required`, {
      path: options?.path,
      code: "missing_required_field",
      details: { field, ...options?.details },
    });
    this.field = field;
  }
}

export interface RangeBounds {
  readonly minimum?: number;
  readonly maximum?: number;
}

export class OutOfRangeError extends ToolValidationError {
  readonly field: string;
  readonly value: unknown;
  readonly bounds: RangeBounds;

  constructor(field: string, value: unknown, bounds: RangeBounds, options?: { path?: string; details?: Record<string, unknown> }) {
    super(`'${field}' must be ${describeBounds(bounds)} (received ${String(value)})`, {
      path: options?.path,
      code: "out_of_range",
      details: { field, value, ...bounds, ...options?.details },
    });
    this.field = field;
    this.value = value;
    this.bounds = bounds;
  }
}

export class EmptyCollectionError extends ToolValidationError {
  readonly field: string;

  constructor(field: string, options?: { path?: string }) {
    super(`'${field}' must contain at least one item`, {
      path: options?.path,
      code: "empty_collection",
      details: { field, minItems: 1 },
    });
    this.field = field;
  }
}

export class TooManyItemsError extends ToolValidationError {
  readonly field: string;
  readonly maximum: number;

  constructor(field: string, maximum: number, received: number, options?: { path?: string }) {
    super(`'${field}' may contain at most ${maximum} items (received ${received})`, {
      path: options?.path,
      code: "too_many_items",
      details: { field, maxItems: maximum, received },
    });
    this.field = field;
    this.maximum = maximum;
  }
}

export class DeviceRejectionError extends ToolError {
  constructor(message: string, options?: { details?: Record<string, unknown>; cause?: unknown }) {
    super(message, "rejection", { ...options, code: "device_rejected" });
  }
}

export class ToolExecutionError extends ToolError {
  constructor(message: string, options?: { code?: string; details?: Record<string, unknown>; cause?: unknown }) {
    super(message, "execution", options);
  }
}

/** No HTTP response at all: refused, unresolvable, reset or timed out. */
export class DeviceUnavailableError extends ToolExecutionError {
  constructor(message: string, options?: { details?: Record<string, unknown>; cause?: unknown }) {
    super(message, { ...options, code: "transport_failure" });
  }
}

export class DeviceResponseError extends ToolExecutionError {
  constructor(message: string, options?: { details?: Record<string, unknown>; cause?: unknown }) {
    super(message, { ...options, code: "device_error" });
  }
}

export class InvalidConfigurationError extends ToolError {
  constructor(message: string, options?: { details?: Record<string, unknown>; cause?: unknown }) {
    super(message, "configuration", { ...options, code: "invalid_configuration" });
  }
}

export class NotInitializedError extends ToolError {
  constructor(message = "UNO bridge client has not been initialised; start the server first") {
    super(message, "configuration", { code: "not_initialized" });
  }
}

function describeBounds(bounds: RangeBounds): string {
  if (bounds.minimum !== undefined && bounds.maximum !== undefined) {
    return `between ${bounds.minimum} and ${bounds.maximum}`;
  }
  if (bounds.minimum !== undefined) {
    return `≥ ${bounds.minimum}`;
  }
  if (bounds.maximum !== undefined) {
    return `≤ ${bounds.maximum}`;
  }
  return "in range";
}

export function toolErrorResult(error: ToolError): ToolRunResult {
  const metadata: ToolErrorMetadata = {
    kind: error.kind,
    ...(error.path !== undefined ? { path: error.path } : {}),
    ...(error.code !== undefined ? { code: error.code } : {}),
    ...(error.details !== undefined ? { details: error.details } : {}),
  };

  const message = error.path ? `${error.message} (at ${error.path})` : error.message;

  const base = textResult(message, { error: metadata });
  return { ...base, isError: true };
}

export function unknownErrorResult(error: unknown): ToolRunResult {
  if (error instanceof ToolError) {
    return toolErrorResult(error);
  }

  const metadata: ToolErrorMetadata = { kind: "unknown" };

  const message = error instanceof Error ? error.message : String(error);

  const base = textResult(message, { error: metadata });
  return { ...base, isError: true };
}
