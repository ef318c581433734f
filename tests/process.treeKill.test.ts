import { describe, it } from "mocha";
import { expect } from "chai";
import { ChildProcess } from "node:child_process";
import sinon from "sinon";

import type { ChildProcessGateway, SpawnChildProcessOptions } from "../src/gateways/childProcess.js";
import { createPosixTreeTerminator, createWindowsTreeTerminator } from "../src/process/treeKill.js";
import type { TerminationSignal } from "../src/nodePrimitives.js";

function errno(code: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(`kill ${code}`);
  error.code = code;
  return error;
}

type KillCall = [number, TerminationSignal | 0 | undefined];

describe("process tree terminator", () => {
  describe("posix backend", () => {
    it("signals the whole process group", async () => {
      const calls: KillCall[] = [];
      const terminator = createPosixTreeTerminator((pid, signal) => {
        calls.push([pid, signal]);
        return true;
      });

      await terminator.signalTree(4321, false);
      await terminator.signalTree(4321, true);

      expect(calls).to.deep.equal([
        [-4321, "SIGTERM"],
        [-4321, "SIGKILL"],
      ]);
    });

    it("treats a vanished group as already terminated", async () => {
      const calls: KillCall[] = [];
      const terminator = createPosixTreeTerminator((pid, signal) => {
        calls.push([pid, signal]);
        throw errno("ESRCH");
      });

      await terminator.signalTree(99, true);
      expect(calls).to.deep.equal([[-99, "SIGKILL"]]);
    });

    it("falls back to the direct child when the group cannot be signalled", async () => {
      const calls: KillCall[] = [];
      const terminator = createPosixTreeTerminator((pid, signal) => {
        calls.push([pid, signal]);
        if (pid < 0) {
          throw errno("EPERM");
        }
        return true;
      });

      await terminator.signalTree(77, false);
      expect(calls).to.deep.equal([
        [-77, "SIGTERM"],
        [77, "SIGTERM"],
      ]);
    });

    it("surfaces unexpected failures of the fallback", async () => {
      const terminator = createPosixTreeTerminator(() => {
        throw errno("EPERM");
      });

      let failure: unknown;
      try {
        await terminator.signalTree(5, true);
      } catch (error) {
        failure = error;
      }
      expect(failure instanceof Error ? failure.message : "").to.equal("kill EPERM");
    });

    it("checks the group for survivors with signal zero", () => {
      const alive = createPosixTreeTerminator(() => true);
      const gone = createPosixTreeTerminator(() => {
        throw errno("ESRCH");
      });
      const unknown = createPosixTreeTerminator(() => {
        throw errno("EPERM");
      });

      expect(alive.isTreeAlive(10)).to.equal(true);
      expect(gone.isTreeAlive(10)).to.equal(false);
      expect(unknown.isTreeAlive(10)).to.equal(undefined);
    });
  });

  describe("windows backend", () => {
    function helperGateway(): { gateway: ChildProcessGateway; requests: SpawnChildProcessOptions[] } {
      const requests: SpawnChildProcessOptions[] = [];
      return {
        requests,
        gateway: {
          spawn(options) {
            requests.push(options);
            const helper = new ChildProcess();
            setImmediate(() => helper.emit("exit", 0, null));
            return helper;
          },
        },
      };
    }

    it("runs taskkill over the tree and adds /F when forcing", async () => {
      const { gateway, requests } = helperGateway();
      const terminator = createWindowsTreeTerminator(gateway);

      await terminator.signalTree(1234, false);
      await terminator.signalTree(1234, true);

      expect(requests).to.deep.equal([
        { command: "taskkill", args: ["/PID", "1234", "/T"], stdio: "ignore" },
        { command: "taskkill", args: ["/PID", "1234", "/T", "/F"], stdio: "ignore" },
      ]);
      expect(terminator.isTreeAlive(1234)).to.equal(undefined);
    });

    it("resolves when taskkill itself cannot start", async () => {
      const gateway: ChildProcessGateway = {
        spawn: sinon.stub().callsFake(() => {
          const helper = new ChildProcess();
          setImmediate(() => helper.emit("error", new Error("spawn taskkill ENOENT")));
          return helper;
        }),
      };

      await createWindowsTreeTerminator(gateway).signalTree(1, true);
    });
  });
});
