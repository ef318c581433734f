import type { Readable } from "node:stream";

import { runtimeTimers } from "../runtime/timers.js";
import type { CodexEventParser, ParserLogger } from "./eventParser.js";

/** Default interval at which the stderr loop re-checks the completion flag. */
export const DEFAULT_POLL_INTERVAL_MS = 500;

type LineRead =
  | { kind: "line"; line: string }
  | { kind: "end" }
  | { kind: "idle" }
  | { kind: "aborted" };

/**
 * Splits a readable stream into UTF-8 lines and hands them out one at a
 * time. Chunks are buffered until a newline arrives; the trailing partial
 * line is flushed when the stream ends.
 */
class LineChannel {
  private buffer = "";
  private readonly pending: string[] = [];
  private ended = false;
  private failure: Error | null = null;
  private wake: (() => void) | null = null;

  private readonly onData = (chunk: string | Buffer) => {
    this.buffer += typeof chunk === "string" ? chunk : chunk.toString("utf8");
    let newlineIndex = this.buffer.indexOf("\n");
    while (newlineIndex !== -1) {
      this.pending.push(this.buffer.slice(0, newlineIndex).replace(/\r$/, ""));
      this.buffer = this.buffer.slice(newlineIndex + 1);
      newlineIndex = this.buffer.indexOf("\n");
    }
    this.notify();
  };

  private readonly onEnd = () => {
    if (this.buffer.length > 0) {
      this.pending.push(this.buffer.replace(/\r$/, ""));
      this.buffer = "";
    }
    this.ended = true;
    this.notify();
  };

  private readonly onError = (error: Error) => {
    this.failure = error;
    this.ended = true;
    this.notify();
  };

  constructor(private readonly stream: Readable) {
    stream.setEncoding("utf8");
    stream.on("data", this.onData);
    stream.once("end", this.onEnd);
    stream.once("close", this.onEnd);
    stream.once("error", this.onError);
  }

  /**
   * Waits for the next line. Resolves `idle` when `pollMs` elapses first and
   * `aborted` when `signal` fires. Throws the stream's error once buffered
   * lines are exhausted.
   */
  async next(signal: AbortSignal | undefined, pollMs?: number): Promise<LineRead> {
    for (;;) {
      if (signal?.aborted) {
        return { kind: "aborted" };
      }
      const line = this.pending.shift();
      if (line !== undefined) {
        return { kind: "line", line };
      }
      if (this.failure) {
        throw this.failure;
      }
      if (this.ended) {
        return { kind: "end" };
      }
      const woke = await this.waitForActivity(signal, pollMs);
      if (!woke) {
        return { kind: "idle" };
      }
    }
  }

  detach(): void {
    this.stream.off("data", this.onData);
    this.stream.off("end", this.onEnd);
    this.stream.off("close", this.onEnd);
    // Late errors are absorbed once detached.
    this.stream.off("error", this.onError);
    this.stream.on("error", ignoreLateError);
    this.notify();
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  /** Resolves `true` on new activity or abort, `false` when the poll interval elapsed. */
  private waitForActivity(signal: AbortSignal | undefined, pollMs: number | undefined): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      const timer = pollMs === undefined ? null : runtimeTimers.setTimeout(() => finish(false), pollMs);
      const onAbort = () => finish(true);
      const finish = (woke: boolean) => {
        if (timer !== null) {
          runtimeTimers.clearTimeout(timer);
        }
        signal?.removeEventListener("abort", onAbort);
        if (this.wake === wakeUp) {
          this.wake = null;
        }
        resolve(woke);
      };
      const wakeUp = () => finish(true);
      this.wake = wakeUp;
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}

function ignoreLateError(): void {
  // The invocation already settled; nothing consumes this stream any more.
}

export interface StreamReaderOptions {
  /** Primary channel carrying one JSON event per line. */
  readonly stdout: Readable;
  /** Secondary channel collected for diagnostics. */
  readonly stderr: Readable;
  readonly parser: CodexEventParser;
  /** Interrupts both loops; the supervisor wires its deadline here. */
  readonly signal?: AbortSignal;
  readonly pollIntervalMs?: number;
  readonly logger?: ParserLogger;
}

export interface StreamReadOutcome {
  /** Raw stdout lines read, in order, including the completion line. */
  readonly stdoutLines: string[];
  readonly stderrLines: string[];
  /** Whether the completion marker was observed. */
  readonly completed: boolean;
  /** Whether the abort signal interrupted the read. */
  readonly aborted: boolean;
  /** Whether stdout reached end-of-stream on its own. */
  readonly stdoutEnded: boolean;
}

/**
 * Drains stdout and stderr concurrently. The stdout loop folds every line
 * through the parser and stops right after the completion marker; the stderr
 * loop polls so it notices completion within one interval even when the
 * child writes nothing there, and gives up after one idle interval once
 * stdout is done.
 */
export async function readCodexStreams(options: StreamReaderOptions): Promise<StreamReadOutcome> {
  const { parser, signal, logger } = options;
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const stdoutLines: string[] = [];
  const stderrLines: string[] = [];
  const primary = new LineChannel(options.stdout);
  const secondary = new LineChannel(options.stderr);
  let stdoutEnded = false;
  let stdoutDone = false;
  let aborted = false;

  const readPrimary = async (): Promise<void> => {
    for (;;) {
      const read = await primary.next(signal);
      if (read.kind === "aborted") {
        aborted = true;
        return;
      }
      if (read.kind !== "line") {
        stdoutEnded = read.kind === "end";
        return;
      }
      stdoutLines.push(read.line);
      parser.parseLine(read.line);
      if (parser.result.completed) {
        logger?.debug("codex_stream_completed", { lines: stdoutLines.length });
        return;
      }
    }
  };

  const readSecondary = async (): Promise<void> => {
    while (!parser.result.completed) {
      const read = await secondary.next(signal, pollIntervalMs);
      if (read.kind === "aborted") {
        aborted = true;
        return;
      }
      if (read.kind === "end") {
        return;
      }
      if (read.kind === "line") {
        stderrLines.push(read.line);
      } else if (stdoutDone) {
        // An idle poll after stdout finished means stderr has nothing left to say.
        return;
      }
    }
  };

  try {
    const [primaryOutcome, secondaryOutcome] = await Promise.allSettled([
      readPrimary().finally(() => {
        stdoutDone = true;
      }),
      readSecondary(),
    ]);
    if (primaryOutcome.status === "rejected") {
      throw primaryOutcome.reason;
    }
    if (secondaryOutcome.status === "rejected") {
      throw secondaryOutcome.reason;
    }
  } finally {
    primary.detach();
    secondary.detach();
  }

  return {
    stdoutLines,
    stderrLines,
    completed: parser.result.completed,
    aborted,
    stdoutEnded,
  };
}
