import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

import type { CodexBridge } from "../codex/bridge.js";
import { CodexBridgeError, SANDBOX_MODES } from "../codex/errors.js";
import type { StructuredLogger } from "../logger.js";
import { errorResponse, invocationResponse, type ToolTextResponse } from "./responses.js";

const TimeoutShape = z
  .number()
  .int()
  .positive()
  .optional()
  .describe("Timeout in seconds (defaults to the server setting, 600 unless configured).");

export const CodexInputShape = {
  prompt: z.string().min(1).describe("The task or question for Codex to process"),
  cwd: z.string().min(1).optional().describe("Working directory for the session. Defaults to the server's directory."),
  sandbox: z
    .string()
    .optional()
    .describe(`Sandbox mode: ${SANDBOX_MODES.map((mode) => `'${mode}'`).join(", ")} (default 'read-only')`),
  model: z.string().min(1).optional().describe("Optional model name override"),
  timeout: TimeoutShape,
};

export const CodexReplyInputShape = {
  threadId: z.string().min(1).describe("The thread id returned by a previous codex call"),
  prompt: z.string().min(1).describe("The follow-up message or question"),
  timeout: TimeoutShape,
};

export const SessionDeleteInputShape = {
  threadId: z.string().min(1).describe("The thread id of the session to forget"),
};

/**
 * Runs a tool body, turning any thrown value into an `isError` result and
 * logging it with the error's code, hint and details when it carries them.
 */
async function runTool(
  toolName: string,
  logger: StructuredLogger,
  body: () => Promise<ToolTextResponse>,
): Promise<ToolTextResponse> {
  try {
    return await body();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    if (error instanceof CodexBridgeError) {
      logger.error(`${toolName}_failed`, { code: error.code, hint: error.hint, message, details: error.details });
    } else {
      logger.error(`${toolName}_failed`, { code: "E-UNEXPECTED", message });
    }
    return errorResponse(error);
  }
}

/** Registers the Codex tools on `server`. */
export function registerCodexTools(server: McpServer, bridge: CodexBridge, logger: StructuredLogger): void {
  server.registerTool(
    "codex",
    {
      title: "Codex",
      description:
        "Create a new Codex session and execute a coding task. Codex can analyse code, answer questions " +
        "and propose changes. Use this tool to start a new conversation.",
      inputSchema: CodexInputShape,
    },
    async (input) =>
      runTool("codex", logger, async () => {
        logger.info("tool_call", { tool: "codex", cwd: input.cwd ?? null, sandbox: input.sandbox ?? null });
        const result = await bridge.startSession({
          prompt: input.prompt,
          ...(input.cwd !== undefined ? { cwd: input.cwd } : {}),
          ...(input.sandbox !== undefined ? { sandbox: input.sandbox } : {}),
          ...(input.model !== undefined ? { model: input.model } : {}),
          ...(input.timeout !== undefined ? { timeoutSec: input.timeout } : {}),
        });
        return invocationResponse(result);
      }),
  );

  server.registerTool(
    "codex-reply",
    {
      title: "Codex reply",
      description:
        "Continue an existing Codex conversation with a follow-up message. Requires the threadId " +
        "returned by a previous codex call.",
      inputSchema: CodexReplyInputShape,
    },
    async (input) =>
      runTool("codex-reply", logger, async () => {
        logger.info("tool_call", { tool: "codex-reply", thread_id: input.threadId });
        const result = await bridge.replyToSession({
          threadId: input.threadId,
          prompt: input.prompt,
          ...(input.timeout !== undefined ? { timeoutSec: input.timeout } : {}),
        });
        return invocationResponse(result);
      }),
  );

  server.registerTool(
    "codex-sessions",
    {
      title: "Codex sessions",
      description: "List the stored Codex sessions, most recently active first.",
      inputSchema: {},
    },
    async () =>
      runTool("codex-sessions", logger, async () => {
        const sessions = await bridge.listSessions();
        const text =
          sessions.length === 0
            ? "No stored sessions."
            : sessions
                .map(
                  (session) =>
                    `- ${session.threadId} (${session.turnCount} turns, last active ${session.lastActive}, ` +
                    `cwd ${session.cwd}, sandbox ${session.sandbox})`,
                )
                .join("\n");
        return { content: [{ type: "text", text }], structuredContent: { sessions } };
      }),
  );

  server.registerTool(
    "codex-session-delete",
    {
      title: "Delete Codex session",
      description: "Forget a stored Codex session by thread id.",
      inputSchema: SessionDeleteInputShape,
    },
    async (input) =>
      runTool("codex-session-delete", logger, async () => {
        await bridge.deleteSession(input.threadId);
        return { content: [{ type: "text", text: `Session ${input.threadId} deleted.` }] };
      }),
  );
}
