/*
UNO MIDI MCP - An MCP Server for the Arduino UNO R4 WiFi MIDI sequencer
Copyright (C) 2025 Christian Gleissner

Licensed under the GNU General Public License v2.0 or later.
See <https://www.gnu.org/licenses/> for details.
*/

import { Console } from "node:console";

// stdout carries JSON-RPC frames under the stdio transport; every console
// method must write to stderr instead.
const stderrConsole = new Console({ stdout: process.stderr, stderr: process.stderr });

console.log = stderrConsole.log.bind(stderrConsole);
console.info = stderrConsole.info.bind(stderrConsole);
console.debug = stderrConsole.debug.bind(stderrConsole);
console.warn = stderrConsole.warn.bind(stderrConsole);
console.error = stderrConsole.error.bind(stderrConsole);
console.dir = stderrConsole.dir.bind(stderrConsole);
console.trace = stderrConsole.trace.bind(stderrConsole);
console.table = stderrConsole.table.bind(stderrConsole);
console.group = stderrConsole.group.bind(stderrConsole);
console.groupCollapsed = stderrConsole.groupCollapsed.bind(stderrConsole);
console.groupEnd = stderrConsole.groupEnd.bind(stderrConsole);
console.time = stderrConsole.time.bind(stderrConsole);
console.timeEnd = stderrConsole.timeEnd.bind(stderrConsole);
console.timeLog = stderrConsole.timeLog.bind(stderrConsole);
console.count = stderrConsole.count.bind(stderrConsole);
console.countReset = stderrConsole.countReset.bind(stderrConsole);
console.assert = stderrConsole.assert.bind(stderrConsole);
