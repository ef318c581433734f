import { describe, it } from "mocha";
import { expect } from "chai";
import { PassThrough } from "node:stream";
import { setTimeout as delay } from "node:timers/promises";

import { CodexEventParser } from "../src/codex/eventParser.js";
import { readCodexStreams } from "../src/codex/streamReader.js";

const COMPLETED = JSON.stringify({ type: "turn.completed" });

function agentMessage(text: string): string {
  return JSON.stringify({ type: "item.completed", item: { type: "agent_message", text } });
}

describe("codex stream reader", () => {
  it("stops reading stdout right after the completion marker", async () => {
    const stdout = new PassThrough();
    const stderr = new PassThrough();
    const parser = new CodexEventParser();

    stdout.write(`${agentMessage("before")}\n${COMPLETED}\n${agentMessage("after")}\n`);

    const outcome = await readCodexStreams({ stdout, stderr, parser, pollIntervalMs: 20 });

    expect(outcome.completed).to.equal(true);
    expect(outcome.aborted).to.equal(false);
    expect(outcome.stdoutEnded).to.equal(false);
    expect(outcome.stdoutLines).to.deep.equal([agentMessage("before"), COMPLETED]);
    expect(parser.result.agentMessages).to.deep.equal(["before"]);
    expect(parser.result.rawEvents).to.have.length(2);
  });

  it("lets the stderr loop exit within one poll interval of completion when stderr stays silent", async () => {
    const stdout = new PassThrough();
    const stderr = new PassThrough();
    const parser = new CodexEventParser();

    const started = Date.now();
    const reading = readCodexStreams({ stdout, stderr, parser, pollIntervalMs: 50 });
    await delay(10);
    stdout.write(`${COMPLETED}\n`);
    const outcome = await reading;

    expect(outcome.completed).to.equal(true);
    expect(Date.now() - started).to.be.lessThan(1000);
  });

  it("collects stderr lines and handles chunks split mid-line and CRLF endings", async () => {
    const stdout = new PassThrough();
    const stderr = new PassThrough();
    const parser = new CodexEventParser();

    const reading = readCodexStreams({ stdout, stderr, parser, pollIntervalMs: 20 });
    stderr.write("warning: first\r\nwarn");
    const full = agentMessage("héllo wörld");
    stdout.write(full.slice(0, 10));
    await delay(5);
    stdout.write(`${full.slice(10)}\r\n`);
    stderr.end("ing: second\n");
    stdout.end();

    const outcome = await reading;
    expect(outcome.completed).to.equal(false);
    expect(outcome.stdoutEnded).to.equal(true);
    expect(outcome.stdoutLines).to.deep.equal([full]);
    expect(outcome.stderrLines).to.deep.equal(["warning: first", "warning: second"]);
    expect(parser.result.agentMessages).to.deep.equal(["héllo wörld"]);
  });

  it("decodes multi-byte characters split across chunks", async () => {
    const stdout = new PassThrough();
    const stderr = new PassThrough();
    const parser = new CodexEventParser();
    const bytes = Buffer.from(`${agentMessage("日本")}\n${COMPLETED}\n`, "utf8");
    const splitAt = bytes.indexOf(Buffer.from("日", "utf8")) + 1;

    const reading = readCodexStreams({ stdout, stderr, parser, pollIntervalMs: 20 });
    stdout.write(bytes.subarray(0, splitAt));
    await delay(5);
    stdout.write(bytes.subarray(splitAt));

    await reading;
    expect(parser.result.agentMessages).to.deep.equal(["日本"]);
  });

  it("keeps the lines read so far when the abort signal fires", async () => {
    const stdout = new PassThrough();
    const stderr = new PassThrough();
    const parser = new CodexEventParser();
    const controller = new AbortController();

    const reading = readCodexStreams({ stdout, stderr, parser, signal: controller.signal, pollIntervalMs: 20 });
    stdout.write(`${agentMessage("partial")}\n`);
    await delay(20);
    controller.abort();
    const outcome = await reading;

    expect(outcome.aborted).to.equal(true);
    expect(outcome.completed).to.equal(false);
    expect(outcome.stdoutLines).to.deep.equal([agentMessage("partial")]);
  });

  it("surfaces a stdout stream error", async () => {
    const stdout = new PassThrough();
    const stderr = new PassThrough();
    const parser = new CodexEventParser();

    const reading = readCodexStreams({ stdout, stderr, parser, pollIntervalMs: 20 });
    stdout.destroy(new Error("pipe broke"));
    stderr.end();

    let failure: unknown;
    try {
      await reading;
    } catch (error) {
      failure = error;
    }
    expect(failure).to.be.instanceOf(Error);
    expect(failure instanceof Error ? failure.message : "").to.equal("pipe broke");
  });
});
