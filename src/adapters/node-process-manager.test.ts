import { realpathSync } from "node:fs";
import { constants, tmpdir } from "node:os";
import type { Readable } from "node:stream";
import { describe, expect, it, vi } from "vitest";
import { SpawnError, TerminationError } from "../errors.js";
import { classifyKillError, NodeProcessManager } from "./node-process-manager.js";

const NODE = process.execPath;
const IDLE_SCRIPT = "setTimeout(() => {}, 30000)";

async function collect(stream: Readable | null): Promise<string> {
  if (!stream) return "";
  let text = "";
  for await (const chunk of stream) {
    text += String(chunk);
  }
  return text;
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("NodeProcessManager", () => {
  const manager = new NodeProcessManager();

  describe("spawn", () => {
    it("returns a handle with pid, pipes, and a pending exit status", async () => {
      const handle = manager.spawn({ command: NODE, args: ["-e", "process.exit(0)"] });

      expect(typeof handle.pid).toBe("number");
      expect(handle.stdout).not.toBeNull();
      expect(handle.stderr).not.toBeNull();
      expect(handle.exitCode()).toBeNull();

      await handle.exited;
    });

    it("reports the exit code through exited and exitCode()", async () => {
      const handle = manager.spawn({ command: NODE, args: ["-e", "process.exit(42)"] });

      const code = await handle.exited;
      expect(code).toBe(42);
      expect(handle.exitCode()).toBe(42);
    });

    it("reports a signal death as the negated signal number", async () => {
      const handle = manager.spawn({ command: NODE, args: ["-e", IDLE_SCRIPT] });
      await vi.waitFor(() => expect(manager.isAlive(handle.pid)).toBe(true), { timeout: 2000 });

      handle.kill("SIGKILL");

      expect(await handle.exited).toBe(-constants.signals.SIGKILL);
    });

    it("kill defaults to SIGTERM", async () => {
      const handle = manager.spawn({ command: NODE, args: ["-e", IDLE_SCRIPT] });
      await vi.waitFor(() => expect(manager.isAlive(handle.pid)).toBe(true), { timeout: 2000 });

      handle.kill();

      expect(await handle.exited).toBe(-constants.signals.SIGTERM);
    });

    it("separates stdout from stderr", async () => {
      const handle = manager.spawn({
        command: NODE,
        args: ["-e", 'process.stdout.write("to out"); process.stderr.write("to err")'],
      });

      const [out, err] = await Promise.all([collect(handle.stdout), collect(handle.stderr)]);
      expect(out).toBe("to out");
      expect(err).toBe("to err");
      expect(await handle.exited).toBe(0);
    });

    it("runs in the requested working directory", async () => {
      const cwd = realpathSync(tmpdir());
      const handle = manager.spawn({
        command: NODE,
        args: ["-e", "process.stdout.write(process.cwd())"],
        cwd,
      });

      expect(realpathSync(await collect(handle.stdout))).toBe(cwd);
      await handle.exited;
    });

    it("layers env overrides on the inherited environment", async () => {
      const handle = manager.spawn({
        command: NODE,
        args: [
          "-e",
          "const env = process.env;" +
            'process.stdout.write(`${env.JOBKEEPER_FLAG}:${env.PATH ? "path" : "nopath"}`)',
        ],
        env: { JOBKEEPER_FLAG: "on" },
      });

      expect(await collect(handle.stdout)).toBe("on:path");
      await handle.exited;
    });

    it("throws SpawnError when the program does not exist", () => {
      expect(() =>
        manager.spawn({ command: "jobkeeper-no-such-program-xyz", args: [] }),
      ).toThrow(SpawnError);
    });
  });

  describe("kill", () => {
    it("throws no_process once the child has exited", async () => {
      const handle = manager.spawn({ command: NODE, args: ["-e", "process.exit(0)"] });
      await handle.exited;

      let caught: unknown;
      try {
        handle.kill("SIGTERM");
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(TerminationError);
      expect(caught).toMatchObject({ reason: "no_process" });
    });

    it("throws bad_signal for a signal number the platform rejects", async () => {
      const handle = manager.spawn({ command: NODE, args: ["-e", IDLE_SCRIPT] });
      await vi.waitFor(() => expect(manager.isAlive(handle.pid)).toBe(true), { timeout: 2000 });

      let caught: unknown;
      try {
        handle.kill(9999);
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(TerminationError);
      expect(caught).toMatchObject({ reason: "bad_signal" });

      handle.kill("SIGKILL");
      await handle.exited;
    });

    it.skipIf(process.platform === "win32")(
      "signals the whole group when the child leads one",
      async () => {
        const handle = manager.spawn({
          command: NODE,
          args: ["-e", IDLE_SCRIPT],
          groupLeader: true,
        });
        await vi.waitFor(() => expect(manager.isAlive(handle.pid)).toBe(true), { timeout: 2000 });

        handle.kill("SIGTERM", "tree");

        expect(await handle.exited).toBe(-constants.signals.SIGTERM);
      },
    );
  });

  describe("isAlive", () => {
    it("returns true for the current process", () => {
      expect(manager.isAlive(process.pid)).toBe(true);
    });

    it("returns false for a non-existent PID", () => {
      expect(manager.isAlive(999999)).toBe(false);
    });
  });
});

describe("classifyKillError", () => {
  const errno = (code: string) => Object.assign(new Error(code), { code });

  it("maps errno codes to termination reasons", () => {
    expect(classifyKillError(errno("ESRCH"))).toBe("no_process");
    expect(classifyKillError(errno("EPERM"))).toBe("access_denied");
    expect(classifyKillError(errno("EINVAL"))).toBe("bad_signal");
    expect(classifyKillError(errno("ERR_UNKNOWN_SIGNAL"))).toBe("bad_signal");
  });

  it("falls back to error for anything else", () => {
    expect(classifyKillError(errno("EIO"))).toBe("error");
    expect(classifyKillError("boom")).toBe("error");
  });
});
