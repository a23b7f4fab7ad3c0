/*
UNO MIDI MCP - An MCP Server for the Arduino UNO R4 WiFi MIDI sequencer
Copyright (C) 2025 Christian Gleissner

Licensed under the GNU General Public License v2.0 or later.
See <https://www.gnu.org/licenses/> for details.
*/

import type { ServerNotification } from "@modelcontextprotocol/sdk/types.js";
import { formatErrorMessage } from "../logger.js";
import type { ToolLogger, ToolTrace } from "./types.js";

export type NotificationSender = (notification: ServerNotification) => Promise<void>;

export const TRACE_LOGGER_NAME = "uno-bridge";

/**
 * Trace messages go to the local log and, when a sender is available, to the
 * MCP client as `notifications/message`. Delivery failures are only logged.
 */
export function createToolTrace(send: NotificationSender | undefined, logger: ToolLogger): ToolTrace {
  const emit = (level: "info" | "debug", message: string) => {
    logger[level](message);
    if (!send) {
      return;
    }
    try {
      send({
        method: "notifications/message",
        params: { level, logger: TRACE_LOGGER_NAME, data: message },
      }).catch((error: unknown) => {
        logger.debug("trace delivery failed", { error: formatErrorMessage(error) });
      });
    } catch (error) {
      logger.debug("trace delivery failed", { error: formatErrorMessage(error) });
    }
  };

  return {
    info(message) {
      emit("info", message);
    },
    debug(message) {
      emit("debug", message);
    },
  };
}
