/*
UNO MIDI MCP - An MCP Server for the Arduino UNO R4 WiFi MIDI sequencer
Copyright (C) 2025 Christian Gleissner

Licensed under the GNU General Public License v2.0 or later.
See <https://www.gnu.org/licenses/> for details.
*/

import type { SequenceBridge } from "../unoClient.js";

export type JsonSchema = {
  readonly type?: string | readonly string[];
  readonly description?: string;
  readonly properties?: Record<string, JsonSchema>;
  readonly required?: readonly string[];
  readonly enum?: readonly (string | number | boolean)[];
  readonly items?: JsonSchema;
  readonly additionalProperties?: boolean | JsonSchema;
  readonly default?: unknown;
  readonly examples?: readonly unknown[];
  readonly minimum?: number;
  readonly maximum?: number;
  readonly minItems?: number;
  readonly maxItems?: number;
};

export interface ToolExample {
  readonly name: string;
  readonly description: string;
  readonly arguments: Record<string, unknown>;
}

export interface ToolLogger {
  debug(message: string, details?: Record<string, unknown>): void;
  info(message: string, details?: Record<string, unknown>): void;
  warn(message: string, details?: Record<string, unknown>): void;
  error(message: string, details?: Record<string, unknown>): void;
}

/** Messages meant for the calling agent rather than the server log. */
export interface ToolTrace {
  info(message: string): void;
  debug(message: string): void;
}

export interface ToolExecutionContext {
  /** Null until start-up has constructed the bridge. */
  readonly client: SequenceBridge | null;
  readonly logger: ToolLogger;
  readonly trace: ToolTrace;
}

export interface ToolResponseContentText {
  readonly type: "text";
  readonly text: string;
}

export type ToolResponseContent = ToolResponseContentText;

export interface ToolRunResult {
  readonly content: readonly ToolResponseContent[];
  readonly structuredContent?: Record<string, unknown>;
  readonly metadata?: Record<string, unknown>;
  readonly isError?: boolean;
}

export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  readonly summary?: string;
  readonly inputSchema?: JsonSchema;
  readonly examples?: readonly ToolExample[];
  readonly tags?: readonly string[];
  readonly workflowHints?: readonly string[];
  readonly execute: (args: unknown, ctx: ToolExecutionContext) => Promise<ToolRunResult>;
}

export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  readonly inputSchema?: JsonSchema;
  readonly metadata: {
    readonly domain: string;
    readonly summary: string;
    readonly examples?: readonly ToolExample[];
    readonly tags: readonly string[];
    readonly workflowHints?: readonly string[];
  };
}

export interface ToolModuleConfig {
  readonly domain: string;
  readonly summary: string;
  readonly defaultTags?: readonly string[];
  readonly workflowHints?: readonly string[];
  readonly tools: readonly ToolDefinition[];
}

export interface ToolModule {
  readonly domain: string;
  readonly summary: string;
  readonly defaultTags: readonly string[];
  describeTools(): readonly ToolDescriptor[];
  invoke(name: string, args: unknown, ctx: ToolExecutionContext): Promise<ToolRunResult>;
}

export function defineToolModule(config: ToolModuleConfig): ToolModule {
  const defaultTags: readonly string[] = Object.freeze([...(config.defaultTags ?? [])]);
  const defaultWorkflowHints: readonly string[] = Object.freeze([...(config.workflowHints ?? [])]);

  const toolMap = new Map(config.tools.map((tool) => [tool.name, tool]));

  return {
    domain: config.domain,
    summary: config.summary,
    defaultTags,
    describeTools(): readonly ToolDescriptor[] {
      return config.tools.map((tool) => {
        const workflowHints = mergeUnique(defaultWorkflowHints, tool.workflowHints);

        const metadata: ToolDescriptor["metadata"] = {
          domain: config.domain,
          summary: tool.summary ?? tool.description,
          examples: tool.examples,
          tags: mergeUnique(defaultTags, tool.tags),
          ...(workflowHints.length > 0 ? { workflowHints } : {}),
        };

        return {
          name: tool.name,
          description: tool.description,
          inputSchema: tool.inputSchema,
          metadata,
        } satisfies ToolDescriptor;
      });
    },
    async invoke(name, args, ctx) {
      const tool = toolMap.get(name);
      if (!tool) {
        throw new Error(`Unknown tool: ${name}`);
      }
      return tool.execute(args, ctx);
    },
  };
}

function mergeUnique(
  base: readonly string[],
  extra?: readonly string[],
): readonly string[] {
  if (!extra || extra.length === 0) {
    return base;
  }

  const set = new Set(base);
  for (const item of extra) {
    set.add(item);
  }

  return Array.from(set);
}
