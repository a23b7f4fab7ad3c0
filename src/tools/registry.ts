/*
UNO MIDI MCP - An MCP Server for the Arduino UNO R4 WiFi MIDI sequencer
Copyright (C) 2025 Christian Gleissner

Licensed under the GNU General Public License v2.0 or later.
See <https://www.gnu.org/licenses/> for details.
*/

import type { ToolDescriptor, ToolExecutionContext, ToolModule, ToolRunResult } from "./types.js";
import { sequencerModule } from "./sequencer.js";

interface RegisteredTool {
  readonly module: ToolModule;
  readonly descriptor: ToolDescriptor;
}

const modules: readonly ToolModule[] = [sequencerModule];

const toolMap: Map<string, RegisteredTool> = new Map();

for (const module of modules) {
  for (const descriptor of module.describeTools()) {
    if (toolMap.has(descriptor.name)) {
      throw new Error(`Duplicate tool name detected while registering modules: ${descriptor.name}`);
    }
    toolMap.set(descriptor.name, { module, descriptor });
  }
}

export const toolRegistry = {
  list(): readonly ToolDescriptor[] {
    return Array.from(toolMap.values(), (entry) => entry.descriptor);
  },

  async invoke(name: string, args: unknown, ctx: ToolExecutionContext): Promise<ToolRunResult> {
    const entry = toolMap.get(name);
    if (!entry) {
      throw new Error(`Unknown tool: ${name}`);
    }
    return entry.module.invoke(name, args, ctx);
  },
};
