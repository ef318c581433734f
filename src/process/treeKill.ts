import type { ChildProcess } from "node:child_process";
import process from "node:process";

import { createChildProcessGateway, type ChildProcessGateway } from "../gateways/childProcess.js";
import { errnoCode, type TerminationSignal } from "../nodePrimitives.js";

/**
 * Signals every process descended from a spawned child. Implementations
 * swallow "no such process" failures so repeated calls are harmless.
 */
export interface ProcessTreeTerminator {
  /** Requests termination; `force` maps to SIGKILL / `taskkill /F`. */
  signalTree(pid: number, force: boolean): Promise<void>;
  /**
   * Reports whether any member of the tree is still running, or `undefined`
   * when the platform cannot tell without the leader.
   */
  isTreeAlive(pid: number): boolean | undefined;
}

type KillFunction = (pid: number, signal?: TerminationSignal | 0) => boolean;

/**
 * POSIX backend. The child was spawned as a process-group leader so a
 * negative pid reaches the whole group, grandchildren included.
 */
export function createPosixTreeTerminator(killImpl: KillFunction = (pid, signal) => process.kill(pid, signal)): ProcessTreeTerminator {
  return {
    async signalTree(pid: number, force: boolean): Promise<void> {
      const signal: TerminationSignal = force ? "SIGKILL" : "SIGTERM";
      try {
        killImpl(-pid, signal);
        return;
      } catch (error) {
        if (errnoCode(error) === "ESRCH") {
          return;
        }
      }
      // The group is out of reach (EPERM or not a leader): fall back to the direct child.
      try {
        killImpl(pid, signal);
      } catch (error) {
        if (errnoCode(error) !== "ESRCH") {
          throw error;
        }
      }
    },
    isTreeAlive(pid: number): boolean | undefined {
      try {
        killImpl(-pid, 0);
        return true;
      } catch (error) {
        return errnoCode(error) === "ESRCH" ? false : undefined;
      }
    },
  };
}

/**
 * Windows backend relying on `taskkill /T`. A non-zero taskkill status means
 * the tree is already gone or could not be reached; neither is fatal.
 */
export function createWindowsTreeTerminator(
  gateway: ChildProcessGateway = createChildProcessGateway(),
): ProcessTreeTerminator {
  return {
    async signalTree(pid: number, force: boolean): Promise<void> {
      const args = ["/PID", String(pid), "/T", ...(force ? ["/F"] : [])];
      const helper = gateway.spawn({ command: "taskkill", args, stdio: "ignore" });
      await waitForHelper(helper);
    },
    isTreeAlive(): boolean | undefined {
      return undefined;
    },
  };
}

function waitForHelper(helper: ChildProcess): Promise<void> {
  return new Promise<void>((resolve) => {
    helper.once("error", () => resolve());
    helper.once("exit", () => resolve());
  });
}

/** Picks the backend matching the running platform. */
export function createProcessTreeTerminator(platform: NodeJS.Platform = process.platform): ProcessTreeTerminator {
  return platform === "win32" ? createWindowsTreeTerminator() : createPosixTreeTerminator();
}
