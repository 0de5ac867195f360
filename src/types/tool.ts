/**
 * Tool Domain Types
 *
 * SCOPE: the closed set of tool adapters the LLM may call, the requests it
 * issues and the results fed back to it.
 */

/**
 * Closed set of tool adapters. Adding a tool means adding a name here and an
 * adapter with its schema in src/tools/adapters.
 */
export const TOOL_NAMES = ['search', 'parse', 'enrich', 'locate'] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(value: string): value is ToolName {
  return TOOL_NAMES.some((name) => name === value);
}

/**
 * Reasons a tool call can fail. All of them are fed back to the LLM.
 */
export type ToolFailureReason =
  | 'INVALID_TOOL_ARGUMENTS'
  | 'TOOL_TIMEOUT'
  | 'TOOL_FAILURE';

/**
 * A tool call issued by one LLM turn
 */
export interface ToolCallRequest {
  /** Call identifier generated by the LLM turn */
  id: string;
  /** Tool name as emitted by the LLM (may be outside the known set) */
  name: string;
  args: Record<string, unknown>;
}

interface ToolResultBase {
  /** Foreign key to ToolCallRequest.id */
  callId: string;
  tool: string;
  durationMs: number;
}

export interface ToolSuccess extends ToolResultBase {
  status: 'success';
  output: Record<string, unknown>;
}

export interface ToolFailure extends ToolResultBase {
  status: 'failure';
  reason: ToolFailureReason;
  message: string;
}

export type ToolResult = ToolSuccess | ToolFailure;

/**
 * Tool definition exposed to the LLM (JSON Schema for its arguments)
 */
export interface ToolDefinition {
  name: ToolName;
  description: string;
  inputSchema: Record<string, unknown>;
}
