import { z } from "zod";

/** Event kinds the aggregator acts upon. Anything else folds as `unrecognized`. */
export const CODEX_EVENT_KINDS = [
  "thread.started",
  "item.completed",
  "turn.completed",
  "response.completed",
  "error",
] as const;

export type KnownCodexEventKind = (typeof CODEX_EVENT_KINDS)[number];

export type CodexEventKind = KnownCodexEventKind | "unrecognized";

export function classifyEventType(type: string): CodexEventKind {
  return CODEX_EVENT_KINDS.find((kind) => kind === type) ?? "unrecognized";
}

/** One decoded line of `codex exec --json` output. */
export interface CodexEvent {
  /** Raw `type` discriminator, `"unknown"` when absent or not a string. */
  readonly type: string;
  readonly kind: CodexEventKind;
  readonly fields: Readonly<Record<string, unknown>>;
  readonly rawText: string;
}

export interface ToolCall {
  readonly name: string;
  readonly arguments: unknown;
  readonly callId: string;
}

export interface CommandExecution {
  readonly callId: string;
  readonly output: string;
}

/**
 * Cumulative state of one invocation. A single parser owns and mutates it;
 * `completed` only ever moves from `false` to `true`.
 */
export class AggregateResult {
  threadId: string | undefined;
  readonly agentMessages: string[] = [];
  readonly reasoning: string[] = [];
  readonly toolCalls: ToolCall[] = [];
  readonly commandExecutions: CommandExecution[] = [];
  readonly errors: string[] = [];
  readonly rawEvents: CodexEvent[] = [];
  private completedFlag = false;

  get completed(): boolean {
    return this.completedFlag;
  }

  markCompleted(): void {
    this.completedFlag = true;
  }

  /** Agent messages joined by blank lines; empty when none were received. */
  responseText(): string {
    return this.agentMessages.join("\n\n");
  }

  /** Whether the invocation produced enough to be returned despite a failure. */
  hasUsefulOutput(): boolean {
    return this.agentMessages.length > 0 || this.threadId !== undefined;
  }
}

/** Payload envelope shared by every event line. */
export const eventEnvelopeSchema = z.record(z.unknown());

export const threadStartedSchema = z
  .object({
    thread_id: z.string().optional(),
    threadId: z.string().optional(),
  })
  .passthrough();

export const contentPartSchema = z.union([
  z.string(),
  z
    .object({
      type: z.string().optional(),
      text: z.string().optional(),
      content: z.string().optional(),
    })
    .passthrough(),
]);

export const completedItemSchema = z
  .object({
    type: z.string().optional(),
    role: z.string().optional(),
    text: z.string().optional(),
    content: z.array(z.unknown()).optional(),
    name: z.string().optional(),
    arguments: z.unknown().optional(),
    call_id: z.string().optional(),
    output: z.string().optional(),
  })
  .passthrough();

export type CompletedItem = z.infer<typeof completedItemSchema>;

export const errorEventSchema = z
  .object({
    message: z.unknown().optional(),
    error: z.unknown().optional(),
  })
  .passthrough();
