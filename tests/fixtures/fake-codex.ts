/**
 * Stand-in for the `codex exec --json` CLI. The first argument selects the
 * scenario; the remaining ones are the arguments the bridge would pass to the
 * real binary. The prompt is read from stdin.
 */
import { spawn } from "node:child_process";
import { writeFileSync } from "node:fs";

const [scenario = "complete", ...codexArgs] = process.argv.slice(2);

const emit = (payload: { type: string; [key: string]: unknown }): void => {
  process.stdout.write(`${JSON.stringify(payload)}\n`);
};

const message = (text: string): void => {
  emit({ type: "item.completed", item: { type: "agent_message", text } });
};

const hang = (): void => {
  setInterval(() => {}, 60_000);
};

const readPrompt = async (): Promise<string> => {
  process.stdin.setEncoding("utf8");
  let prompt = "";
  for await (const chunk of process.stdin) {
    prompt += String(chunk);
  }
  return prompt;
};

const recordPid = (pid: number | undefined): void => {
  const target = process.env.FAKE_CODEX_PID_FILE;
  if (target && pid !== undefined) {
    writeFileSync(target, String(pid), "utf8");
  }
};

const prompt = await readPrompt();

switch (scenario) {
  case "complete":
    emit({ type: "thread.started", thread_id: "thread-fake" });
    message(`prompt=${prompt}`);
    message(`args=${codexArgs.join(" ")}`);
    emit({ type: "turn.completed" });
    break;
  case "complete-and-hang":
    emit({ type: "thread.started", thread_id: "thread-hang" });
    message("done");
    emit({ type: "turn.completed" });
    emit({ type: "item.completed", item: { type: "agent_message", text: "after completion" } });
    hang();
    break;
  case "stubborn":
    process.on("SIGTERM", () => {
      process.stderr.write("ignoring SIGTERM\n");
    });
    emit({ type: "thread.started", thread_id: "thread-stubborn" });
    emit({ type: "turn.completed" });
    hang();
    break;
  case "bare-completion":
    emit({ type: "turn.completed" });
    hang();
    break;
  case "timeout":
    emit({ type: "thread.started", thread_id: "thread-slow" });
    message("working");
    hang();
    break;
  case "noise":
    process.stdout.write("not json at all\n\n[1,2]\n");
    emit({ type: "session.configured" });
    message("survived");
    emit({ type: "response.completed" });
    break;
  case "fail":
    process.stderr.write("fatal: authentication required\n");
    process.exit(3);
  case "fail-with-thread":
    emit({ type: "thread.started", thread_id: "thread-partial" });
    process.stderr.write("crashed\n");
    process.exit(2);
  case "disconnect":
    emit({ type: "thread.started", thread_id: "thread-dropped" });
    message("half an answer");
    emit({ type: "error", message: "stream disconnected before completion" });
    break;
  case "grandchild": {
    const grandchild = spawn(process.execPath, ["-e", "setInterval(() => {}, 60000)"], { stdio: "ignore" });
    recordPid(grandchild.pid);
    emit({ type: "thread.started", thread_id: "thread-tree" });
    emit({ type: "turn.completed" });
    hang();
    break;
  }
  default:
    process.stderr.write(`unknown scenario ${scenario}\n`);
    process.exit(64);
}
