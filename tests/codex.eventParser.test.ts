import { describe, it } from "mocha";
import { expect } from "chai";

import { CodexEventParser, decodeLine, foldEvent } from "../src/codex/eventParser.js";
import { AggregateResult } from "../src/codex/events.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

function line(payload: Record<string, unknown>): string {
  return JSON.stringify(payload);
}

describe("codex event parser", () => {
  describe("decodeLine", () => {
    it("returns null for blank lines without logging", () => {
      const logger = new RecordingLogger();
      expect(decodeLine("   \t ", logger)).to.equal(null);
      expect(logger.entries).to.have.length(0);
    });

    it("drops malformed JSON with a warning carrying a preview", () => {
      const logger = new RecordingLogger();
      const noisy = `{not json ${"x".repeat(200)}`;
      expect(decodeLine(noisy, logger)).to.equal(null);
      expect(logger.messages("warn")).to.deep.equal(["codex_event_decode_failed"]);
      const payload = logger.entries[0]?.payload;
      expect(payload).to.have.property("preview", noisy.slice(0, 100));
    });

    it("treats non-object JSON values like decode failures", () => {
      const logger = new RecordingLogger();
      expect(decodeLine("[1,2,3]", logger)).to.equal(null);
      expect(decodeLine("42", logger)).to.equal(null);
      expect(decodeLine('"text"', logger)).to.equal(null);
      expect(logger.messages("warn")).to.deep.equal([
        "codex_event_not_object",
        "codex_event_not_object",
        "codex_event_not_object",
      ]);
    });

    it("defaults the type to unknown when the discriminator is missing or not a string", () => {
      expect(decodeLine('{"foo":1}')).to.include({ type: "unknown", kind: "unrecognized" });
      expect(decodeLine('{"type":7}')).to.include({ type: "unknown", kind: "unrecognized" });
    });

    it("keeps the trimmed raw text and classifies known kinds", () => {
      const event = decodeLine('  {"type":"turn.completed"}\r');
      expect(event).to.deep.equal({
        type: "turn.completed",
        kind: "turn.completed",
        fields: { type: "turn.completed" },
        rawText: '{"type":"turn.completed"}',
      });
    });
  });

  describe("foldEvent", () => {
    it("records the thread id from thread_id, falling back to threadId", () => {
      const parser = new CodexEventParser();
      parser.parseLine(line({ type: "thread.started", thread_id: "thr-1" }));
      expect(parser.result.threadId).to.equal("thr-1");

      const camel = new CodexEventParser();
      camel.parseLine(line({ type: "thread.started", threadId: "thr-2" }));
      expect(camel.result.threadId).to.equal("thr-2");
    });

    it("extracts text and reasoning parts from assistant messages", () => {
      const parser = new CodexEventParser();
      parser.parseLine(
        line({
          type: "item.completed",
          item: {
            type: "message",
            role: "assistant",
            content: [
              { type: "text", text: "first" },
              { type: "reasoning", text: "", content: "thinking" },
              { type: "text", text: "" },
              "bare string",
              { type: "image", url: "ignored" },
              17,
            ],
          },
        }),
      );
      expect(parser.result.agentMessages).to.deep.equal(["first", "bare string"]);
      expect(parser.result.reasoning).to.deep.equal(["thinking"]);
    });

    it("ignores messages from other roles", () => {
      const parser = new CodexEventParser();
      parser.parseLine(
        line({ type: "item.completed", item: { type: "message", role: "user", content: [{ type: "text", text: "hi" }] } }),
      );
      expect(parser.result.agentMessages).to.deep.equal([]);
    });

    it("folds agent_message, reasoning, function_call and function_call_output items", () => {
      const parser = new CodexEventParser();
      parser.parseStream(
        [
          line({ type: "item.completed", item: { type: "agent_message", text: "Hello" } }),
          line({ type: "item.completed", item: { type: "agent_message", text: "" } }),
          line({ type: "item.completed", item: { type: "reasoning", text: "Because" } }),
          line({ type: "item.completed", item: { type: "function_call", name: "shell", arguments: { cmd: "ls" }, call_id: "c1" } }),
          line({ type: "item.completed", item: { type: "function_call" } }),
          line({ type: "item.completed", item: { type: "function_call_output", call_id: "c1", output: "a.txt" } }),
          line({ type: "item.completed", item: { type: "function_call_output", call_id: "c2", output: "" } }),
          line({ type: "item.completed", item: { type: "function_call_output", output: "orphan" } }),
        ].join("\n"),
      );

      expect(parser.result.agentMessages).to.deep.equal(["Hello"]);
      expect(parser.result.reasoning).to.deep.equal(["Because"]);
      expect(parser.result.toolCalls).to.deep.equal([
        { name: "shell", arguments: { cmd: "ls" }, callId: "c1" },
        { name: "", arguments: {}, callId: "" },
      ]);
      expect(parser.result.commandExecutions).to.deep.equal([{ callId: "c1", output: "a.txt" }]);
    });

    it("treats turn.completed and response.completed as idempotent synonyms", () => {
      const parser = new CodexEventParser();
      parser.parseLine(line({ type: "response.completed" }));
      expect(parser.result.completed).to.equal(true);
      parser.parseLine(line({ type: "turn.completed" }));
      parser.parseLine(line({ type: "turn.completed" }));
      expect(parser.result.completed).to.equal(true);
      expect(parser.result.rawEvents).to.have.length(3);
    });

    it("records error messages from message, then error, then the whole payload", () => {
      const parser = new CodexEventParser();
      parser.parseStream(
        [
          line({ type: "error", message: "stream disconnected" }),
          line({ type: "error", error: "quota exceeded" }),
          line({ type: "error", code: 500 }),
        ].join("\n"),
      );
      expect(parser.result.errors).to.deep.equal([
        "stream disconnected",
        "quota exceeded",
        '{"type":"error","code":500}',
      ]);
    });

    it("appends every decoded event to rawEvents before dispatch, unknown kinds included", () => {
      const aggregate = new AggregateResult();
      const logger = new RecordingLogger();
      const event = decodeLine(line({ type: "session.configured", model: "m" }));
      expect(event).to.not.equal(null);
      if (event) {
        foldEvent(event, aggregate, logger);
      }
      expect(aggregate.rawEvents).to.have.length(1);
      expect(aggregate.rawEvents[0]?.type).to.equal("session.configured");
      expect(logger.messages("debug")).to.deep.equal(["codex_event_unhandled"]);
    });
  });

  describe("AggregateResult", () => {
    it("joins agent messages with blank lines and yields an empty string when none exist", () => {
      const aggregate = new AggregateResult();
      expect(aggregate.responseText()).to.equal("");
      aggregate.agentMessages.push("one", "two");
      expect(aggregate.responseText()).to.equal("one\n\ntwo");
    });

    it("folds the same ordered input into the same aggregate", () => {
      const input = [
        line({ type: "thread.started", thread_id: "t" }),
        "garbage",
        line({ type: "item.completed", item: { type: "agent_message", text: "A" } }),
        line({ type: "turn.completed" }),
      ].join("\n");
      const first = new CodexEventParser().parseStream(input);
      const second = new CodexEventParser().parseStream(input);
      expect(first.responseText()).to.equal(second.responseText());
      expect(first.threadId).to.equal(second.threadId);
      expect(first.rawEvents.map((event) => event.rawText)).to.deep.equal(second.rawEvents.map((event) => event.rawText));
    });
  });
});
