/**
 * Shared helpers for building MCP tool results.
 */

// Type aliases rather than interfaces: the SDK's result types are
// index-signatured, and only object type aliases are implicitly indexable.
export type TextContent = {
  type: 'text';
  text: string;
};

export type ToolResult = {
  content: TextContent[];
  isError?: boolean;
};

export function textResult(text: string): ToolResult {
  return { content: [{ type: 'text', text }] };
}

/**
 * Structured results are sent as pretty-printed JSON text.
 */
export function jsonResult(data: unknown): ToolResult {
  return textResult(JSON.stringify(data, null, 2));
}

export function errorResult(text: string): ToolResult {
  return { content: [{ type: 'text', text }], isError: true };
}
