import type { InvocationResult } from "../codex/bridge.js";
import {
  CodexBridgeError,
  CodexExecutionError,
  CodexTimeoutError,
  formatSeconds,
  SessionNotFoundError,
} from "../codex/errors.js";

const PARTIAL_OUTPUT_PREVIEW = 1000;

/** Tool result as returned to the MCP SDK. */
export interface ToolTextResponse {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: true;
  structuredContent?: Record<string, unknown>;
}

/**
 * Human-readable rendering of a successful invocation: the response text,
 * then any errors, then the thread id footer.
 */
export function formatInvocationText(result: InvocationResult): string {
  const parts: string[] = [];
  if (result.agent_messages) {
    parts.push(result.agent_messages);
  }
  if (result.errors && result.errors.length > 0) {
    parts.push(`\n\n**Errors:**\n${result.errors.join("\n")}`);
  }
  if (result.threadId) {
    parts.push(`\n\n---\n*Thread ID: ${result.threadId}*`);
  }
  return parts.length > 0 ? parts.join("") : "No response from Codex.";
}

export function invocationResponse(result: InvocationResult): ToolTextResponse {
  return {
    content: [{ type: "text", text: formatInvocationText(result) }],
    structuredContent: { ...result },
  };
}

/** Maps a failure onto the text shown to the MCP client. */
export function formatErrorText(error: unknown): string {
  if (error instanceof CodexTimeoutError) {
    let text = `**Timeout Error:** Codex execution timed out after ${formatSeconds(error.timeoutMs)} seconds.`;
    if (error.partialOutput) {
      text += `\n\n**Partial Output:**\n${error.partialOutput.slice(0, PARTIAL_OUTPUT_PREVIEW)}...`;
    }
    return text;
  }
  if (error instanceof SessionNotFoundError) {
    return `**Session Not Found:** Thread ID '${error.threadId}' not found. Please start a new session with 'codex' tool.`;
  }
  if (error instanceof CodexExecutionError) {
    let text = `**Execution Error:** ${error.message}`;
    if (error.stderr) {
      text += `\n\n**Stderr:**\n${error.stderr}`;
    }
    return text;
  }
  if (error instanceof CodexBridgeError) {
    return `**Error:** ${error.message}`;
  }
  const message = error instanceof Error ? error.message : String(error);
  return `**Unexpected Error:** ${message}`;
}

export function errorResponse(error: unknown): ToolTextResponse {
  return { isError: true, content: [{ type: "text", text: formatErrorText(error) }] };
}
