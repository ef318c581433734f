import type { StructuredLogger } from "../logger.js";
import {
  AggregateResult,
  classifyEventType,
  completedItemSchema,
  contentPartSchema,
  errorEventSchema,
  eventEnvelopeSchema,
  threadStartedSchema,
  type CodexEvent,
  type CompletedItem,
} from "./events.js";

/** Logging surface used by the parser; tests pass a recording logger. */
export type ParserLogger = Pick<StructuredLogger, "debug" | "info" | "warn">;

const PREVIEW_LENGTH = 100;

/**
 * Decodes one line of `codex exec --json` output. Blank lines yield `null`
 * silently; malformed JSON or non-object values yield `null` with a warning.
 */
export function decodeLine(line: string, logger?: ParserLogger): CodexEvent | null {
  const rawText = line.trim();
  if (rawText.length === 0) {
    return null;
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(rawText);
  } catch (error) {
    logger?.warn("codex_event_decode_failed", {
      preview: rawText.slice(0, PREVIEW_LENGTH),
      reason: error instanceof Error ? error.message : String(error),
    });
    return null;
  }

  const envelope = eventEnvelopeSchema.safeParse(decoded);
  if (!envelope.success || Array.isArray(decoded)) {
    logger?.warn("codex_event_not_object", { preview: rawText.slice(0, PREVIEW_LENGTH) });
    return null;
  }

  const fields = envelope.data;
  const type = typeof fields.type === "string" ? fields.type : "unknown";
  return { type, kind: classifyEventType(type), fields, rawText };
}

/**
 * Folds one event into the aggregate. The event is recorded in `rawEvents`
 * before dispatch.
 */
export function foldEvent(event: CodexEvent, into: AggregateResult, logger?: ParserLogger): void {
  into.rawEvents.push(event);

  switch (event.kind) {
    case "thread.started": {
      const payload = threadStartedSchema.safeParse(event.fields);
      if (payload.success) {
        const threadId = payload.data.thread_id || payload.data.threadId;
        if (threadId) {
          into.threadId = threadId;
          logger?.info("codex_thread_started", { thread_id: threadId });
        }
      }
      return;
    }
    case "item.completed": {
      const item = completedItemSchema.safeParse(event.fields.item ?? {});
      if (item.success) {
        foldCompletedItem(item.data, into);
      } else {
        logger?.debug("codex_item_ignored", { reason: "malformed_item" });
      }
      return;
    }
    case "turn.completed":
    case "response.completed":
      if (!into.completed) {
        into.markCompleted();
        logger?.info("codex_turn_completed", { event: event.type });
      }
      return;
    case "error": {
      const message = extractErrorMessage(event);
      into.errors.push(message);
      logger?.warn("codex_error_event", { message });
      return;
    }
    case "unrecognized":
      logger?.debug("codex_event_unhandled", { type: event.type });
      return;
    default: {
      const unreachable: never = event.kind;
      throw new Error(`Unhandled event kind: ${String(unreachable)}`);
    }
  }
}

function foldCompletedItem(item: CompletedItem, into: AggregateResult): void {
  switch (item.type) {
    case "message":
      if (item.role === "assistant") {
        foldAssistantContent(item.content ?? [], into);
      }
      return;
    case "agent_message":
      if (item.text) {
        into.agentMessages.push(item.text);
      }
      return;
    case "reasoning":
      if (item.text) {
        into.reasoning.push(item.text);
      }
      return;
    case "function_call":
      into.toolCalls.push({
        name: item.name ?? "",
        arguments: item.arguments ?? {},
        callId: item.call_id ?? "",
      });
      return;
    case "function_call_output":
      if (item.call_id && item.output) {
        into.commandExecutions.push({ callId: item.call_id, output: item.output });
      }
      return;
    default:
      return;
  }
}

function foldAssistantContent(parts: readonly unknown[], into: AggregateResult): void {
  for (const raw of parts) {
    const parsed = contentPartSchema.safeParse(raw);
    if (!parsed.success) {
      continue;
    }
    const part = parsed.data;
    if (typeof part === "string") {
      if (part) {
        into.agentMessages.push(part);
      }
      continue;
    }
    if (part.type === "text" && part.text) {
      into.agentMessages.push(part.text);
    } else if (part.type === "reasoning") {
      const text = part.text || part.content;
      if (text) {
        into.reasoning.push(text);
      }
    }
  }
}

function extractErrorMessage(event: CodexEvent): string {
  const payload = errorEventSchema.safeParse(event.fields);
  if (payload.success) {
    const { message, error } = payload.data;
    if (typeof message === "string" && message) {
      return message;
    }
    if (typeof error === "string" && error) {
      return error;
    }
    if (error && typeof error === "object" && "message" in error && typeof error.message === "string" && error.message) {
      return error.message;
    }
  }
  return JSON.stringify(event.fields);
}

/**
 * Stateful front over {@link decodeLine} and {@link foldEvent}. One parser
 * serves exactly one invocation.
 */
export class CodexEventParser {
  readonly result = new AggregateResult();

  constructor(private readonly logger?: ParserLogger) {}

  /** Decodes and folds one line. Returns the event, or `null` when the line was skipped. */
  parseLine(line: string): CodexEvent | null {
    const event = decodeLine(line, this.logger);
    if (event) {
      foldEvent(event, this.result, this.logger);
    }
    return event;
  }

  /** Folds every line of a complete output and returns the aggregate. */
  parseStream(text: string): AggregateResult {
    for (const line of text.split(/\r?\n/)) {
      this.parseLine(line);
    }
    return this.result;
  }
}
