/**
 * Shape shared by every tool definition: a name, a JSON-schema parameter
 * block, and an async `execute` that returns text content plus a small
 * machine-readable `details` summary.
 */

export interface ToolContent {
  type: string;
  text: string;
}

export interface ToolResult {
  content: ToolContent[];
  details?: unknown;
}

export interface ToolDefinition {
  name: string;
  label: string;
  description: string;
  parameters: Record<string, unknown>;
  execute: (toolCallId: string, args: unknown) => Promise<ToolResult>;
}
