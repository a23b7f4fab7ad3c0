#!/usr/bin/env node
/*
UNO MIDI MCP - An MCP Server for the Arduino UNO R4 WiFi MIDI sequencer
Copyright (C) 2025 Christian Gleissner

Licensed under the GNU General Public License v2.0 or later.
See <https://www.gnu.org/licenses/> for details.
*/

/**
 * CLI entry point. Console redirection has to load before anything logs.
 */
import "./bootstrap/stdio-logger.js";
import { main } from "./mcp-server.js";

main(process.argv.slice(2)).catch((error: unknown) => {
  console.error("Fatal error in MCP server:", error);
  process.exit(1);
});
