/*
UNO MIDI MCP - An MCP Server for the Arduino UNO R4 WiFi MIDI sequencer
Copyright (C) 2025 Christian Gleissner

Licensed under the GNU General Public License v2.0 or later.
See <https://www.gnu.org/licenses/> for details.
*/

import type { ToolRunResult } from "./types.js";

export function textResult(
  text: string,
  metadata?: Record<string, unknown>,
): ToolRunResult {
  return {
    content: [
      {
        type: "text",
        text,
      },
    ],
    metadata,
  };
}

/**
 * Pretty-printed JSON as text content. Plain objects are also passed through as
 * `structuredContent`, which MCP only allows for objects.
 */
export function jsonResult(
  data: unknown,
  metadata?: Record<string, unknown>,
): ToolRunResult {
  const text =
    typeof data === "string"
      ? data
      : (() => {
          try {
            return JSON.stringify(data, null, 2) ?? String(data);
          } catch {
            return String(data);
          }
        })();

  return {
    content: [
      {
        type: "text",
        text,
      },
    ],
    ...(isJsonObject(data) ? { structuredContent: data } : {}),
    metadata,
  };
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
