import { describe, it, expect, vi, beforeEach } from "vitest";
import { EventEmitter } from "node:events";

vi.mock("node:child_process", () => ({
  spawn: vi.fn(),
}));

import { spawn } from "node:child_process";
import { runCommand, CommandFailedError } from "../src/process-runner.js";

const mockSpawn = vi.mocked(spawn);

/** A fake ChildProcess whose streams and lifecycle the test drives. */
class FakeChild extends EventEmitter {
  stdout = new EventEmitter();
  stderr = new EventEmitter();
}

function spawnFake(): FakeChild {
  const child = new FakeChild();
  mockSpawn.mockReturnValue(child as unknown as ReturnType<typeof spawn>);
  return child;
}

describe("process-runner", () => {
  beforeEach(() => {
    mockSpawn.mockReset();
  });

  describe("runCommand", () => {
    it("should spawn in the given directory with inherited stdin and piped output", async () => {
      const child = spawnFake();

      const promise = runCommand("git", ["init", "-b", "main"], { cwd: "/tmp/test-repo" });
      child.emit("close", 0);
      await promise;

      expect(mockSpawn).toHaveBeenCalledWith("git", ["init", "-b", "main"], {
        cwd: "/tmp/test-repo",
        stdio: ["inherit", "pipe", "pipe"],
      });
    });

    it("should resolve with captured stdout and stderr", async () => {
      const child = spawnFake();

      const promise = runCommand("git", ["add", "."], { cwd: "/tmp/test-repo" });
      child.stdout.emit("data", Buffer.from("first "));
      child.stdout.emit("data", Buffer.from("second"));
      child.stderr.emit("data", Buffer.from("a warning"));
      child.emit("close", 0);

      expect(await promise).toEqual({
        command: "git",
        args: ["add", "."],
        stdout: "first second",
        stderr: "a warning",
        exitCode: 0,
      });
    });

    it("should hand each chunk to onOutput before the process exits", async () => {
      const child = spawnFake();
      const chunks: Array<[string, string]> = [];

      const promise = runCommand("git", ["push", "-u", "origin", "main"], {
        cwd: "/tmp/test-repo",
        onOutput: (chunk, stream) => chunks.push([chunk, stream]),
      });
      child.stderr.emit("data", Buffer.from("Counting objects: 50%"));
      child.stdout.emit("data", Buffer.from("branch 'main' set up"));

      expect(chunks).toEqual([
        ["Counting objects: 50%", "stderr"],
        ["branch 'main' set up", "stdout"],
      ]);

      child.emit("close", 0);
      const result = await promise;
      expect(result.stdout).toBe("branch 'main' set up");
      expect(result.stderr).toBe("Counting objects: 50%");
    });

    it("should resolve rather than reject on a non-zero exit", async () => {
      const child = spawnFake();

      const promise = runCommand("git", ["push", "-u", "origin", "main"], { cwd: "/tmp/test-repo" });
      child.stderr.emit("data", Buffer.from("fatal: could not read from remote"));
      child.emit("close", 128);

      const result = await promise;
      expect(result.exitCode).toBe(128);
      expect(result.stderr).toBe("fatal: could not read from remote");
    });

    it("should report exit code 1 when the process is killed by a signal", async () => {
      const child = spawnFake();

      const promise = runCommand("git", ["status"], { cwd: "/tmp/test-repo" });
      child.emit("close", null);

      expect((await promise).exitCode).toBe(1);
    });

    it("should reject when spawn itself fails", async () => {
      const child = spawnFake();

      const promise = runCommand("git", ["init"], { cwd: "/tmp/test-repo" });
      child.emit("error", new Error("spawn git ENOENT"));
      child.emit("close", -2);

      await expect(promise).rejects.toThrow("Failed to spawn git: spawn git ENOENT");
    });
  });

  describe("CommandFailedError", () => {
    it("should describe the command, exit code and stderr", () => {
      const error = new CommandFailedError({
        command: "git",
        args: ["commit", "-m", "x"],
        stdout: "",
        stderr: "nothing to commit\n",
        exitCode: 1,
      });
      expect(error.name).toBe("CommandFailedError");
      expect(error.message).toBe("git commit -m x exited with code 1: nothing to commit");
      expect(error.result.exitCode).toBe(1);
    });
  });
});
