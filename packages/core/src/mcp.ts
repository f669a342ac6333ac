/**
 * MCP tool response helpers.
 */

import type { Result } from "./result.js";

export type TextContent = {
  type: "text";
  text: string;
};

/**
 * Tool response shape. A type alias (not an interface) so it stays
 * assignable to the SDK's open-ended CallToolResult.
 */
export type ToolResponse<T extends Record<string, unknown> = Record<string, unknown>> = {
  content: TextContent[];
  structuredContent?: T;
  isError?: boolean;
};

export function textResponse(text: string): ToolResponse {
  return { content: [{ type: "text", text }] };
}

/**
 * Failure response: the text is prefixed with "Error: " and flagged isError.
 */
export function errorResponse(message: string): ToolResponse<{ success: false; error: string }> {
  return {
    content: [{ type: "text", text: `Error: ${message}` }],
    structuredContent: { success: false, error: message },
    isError: true,
  };
}

/**
 * Success response with text and structured data.
 */
export function successResponse<T extends Record<string, unknown>>(
  text: string,
  data: T
): ToolResponse<T & { success: true }> {
  return {
    content: [{ type: "text", text }],
    structuredContent: { ...data, success: true },
  };
}

/**
 * Convert a Result to a tool response: formatter on success, error response otherwise.
 */
export function resultToResponse<T, E extends string | Error>(
  result: Result<T, E>,
  formatter: (value: T) => ToolResponse
): ToolResponse {
  if (result.ok) {
    return formatter(result.value);
  }
  const error: string | Error = result.error;
  const message = error instanceof Error ? error.message : error;
  return errorResponse(message);
}
