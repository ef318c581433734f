import { afterEach, describe, it } from "mocha";
import { expect } from "chai";
import { ChildProcess } from "node:child_process";
import sinon from "sinon";

import {
  createChildProcessGateway,
  InvalidChildProcessArgumentError,
  InvalidChildProcessCommandError,
} from "../../src/gateways/childProcess.js";

function recordingSpawn(): sinon.SinonStub {
  return sinon.stub().returns(new ChildProcess());
}

describe("gateways/childProcess.spawn", () => {
  afterEach(() => {
    sinon.restore();
  });

  it("spawns without a shell, hides the console and copies the arguments", () => {
    const spawnImpl = recordingSpawn();
    const gateway = createChildProcessGateway({ spawnImpl, platform: "linux" });
    const args = ["exec", "-", "--json"];

    gateway.spawn({ command: "codex", args, cwd: "/work", inheritEnv: { PATH: "/bin" } });

    expect(spawnImpl.callCount).to.equal(1);
    const [command, passedArgs, options] = spawnImpl.firstCall.args;
    expect(command).to.equal("codex");
    expect(passedArgs).to.deep.equal(args);
    expect(passedArgs).to.not.equal(args);
    expect(options).to.deep.equal({
      env: { PATH: "/bin" },
      stdio: "pipe",
      shell: false,
      windowsVerbatimArguments: false,
      windowsHide: true,
      detached: false,
      cwd: "/work",
    });
  });

  it("starts a new process group on POSIX when requested", () => {
    const spawnImpl = recordingSpawn();
    createChildProcessGateway({ spawnImpl, platform: "darwin" }).spawn({ command: "codex", processGroup: true });

    expect(spawnImpl.firstCall.args[2].detached).to.equal(true);
    expect(spawnImpl.firstCall.args[1]).to.deep.equal([]);
  });

  it("never detaches on Windows", () => {
    const spawnImpl = recordingSpawn();
    createChildProcessGateway({ spawnImpl, platform: "win32" }).spawn({ command: "codex.exe", processGroup: true });

    expect(spawnImpl.firstCall.args[2].detached).to.equal(false);
    expect(spawnImpl.firstCall.args[2].windowsHide).to.equal(true);
  });

  it("merges overrides over the inherited environment and removes undefined keys", () => {
    const spawnImpl = recordingSpawn();
    const inheritEnv = { PATH: "/bin", HOME: "/home/test", SECRET: "test-secret" };

    createChildProcessGateway({ spawnImpl, platform: "linux" }).spawn({
      command: "codex",
      inheritEnv,
      extraEnv: { SECRET: undefined, CODEX_HOME: "/tmp/codex" },
    });

    expect(spawnImpl.firstCall.args[2].env).to.deep.equal({
      PATH: "/bin",
      HOME: "/home/test",
      CODEX_HOME: "/tmp/codex",
    });
    expect(inheritEnv).to.deep.equal({ PATH: "/bin", HOME: "/home/test", SECRET: "test-secret" });
  });

  it("rejects empty commands", () => {
    const spawnImpl = recordingSpawn();
    const gateway = createChildProcessGateway({ spawnImpl });

    expect(() => gateway.spawn({ command: "   " })).to.throw(InvalidChildProcessCommandError);
    expect(spawnImpl.called).to.equal(false);
  });

  it("rejects arguments carrying NUL bytes", () => {
    const spawnImpl = recordingSpawn();
    const gateway = createChildProcessGateway({ spawnImpl });

    expect(() => gateway.spawn({ command: "codex", args: ["ok", "bad\u0000arg"] })).to.throw(
      InvalidChildProcessArgumentError,
      "Argument at index 1 is string.",
    );
    expect(spawnImpl.called).to.equal(false);
  });
});
