/**
 * Barrel file: exports all tool definitions for loadshare.
 *
 * Each tool follows the pattern: createXxxToolDefinition() → ToolDefinition
 */

// ─── Structural ─────────────────────────────────────────────────────────────
import { createLoadDistributionToolDefinition } from "./structural/load-distribution.js";
import { createTributaryZonesToolDefinition } from "./structural/tributary-zones.js";
import type { ToolDefinition } from "./types.js";

// ─── Re-export all individual creators ──────────────────────────────────────
export { createLoadDistributionToolDefinition, createTributaryZonesToolDefinition };
export type { ToolContent, ToolDefinition, ToolResult } from "./types.js";

// ─── Convenience: build all tools at once ───────────────────────────────────

export function createAllToolDefinitions(): ToolDefinition[] {
  return [
    // Structural
    createLoadDistributionToolDefinition(),
    createTributaryZonesToolDefinition(),
  ];
}

export function findToolDefinition(name: string): ToolDefinition | undefined {
  return createAllToolDefinitions().find((t) => t.name === name);
}
