import { describe, it, expect, vi, beforeEach } from "vitest";
import { EventEmitter } from "node:events";

const { spawnMock } = vi.hoisted(() => ({ spawnMock: vi.fn() }));

vi.mock("node:child_process", () => ({
  spawn: spawnMock,
}));

import { commandJob, runCommand } from "../../../src/runtime/command-job.js";
import type { JobConfig } from "../../../src/config.js";

const mockLogger: any = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
  child: vi.fn(() => mockLogger),
};

function createMockChildProcess(params: { code?: number; stdout?: string; stderr?: string; hang?: boolean }) {
  const child = new EventEmitter() as any;
  child.stdout = new EventEmitter();
  child.stderr = new EventEmitter();
  child.kill = vi.fn(() => {
    setTimeout(() => child.emit("close", null), 0);
  });

  if (!params.hang) {
    setTimeout(() => {
      if (params.stdout) child.stdout.emit("data", Buffer.from(params.stdout));
      if (params.stderr) child.stderr.emit("data", Buffer.from(params.stderr));
      child.emit("close", params.code ?? 0);
    }, 0);
  }

  return child;
}

function jobConfig(overrides: Partial<JobConfig> = {}): JobConfig {
  return {
    name: "nightly",
    schedule: "@daily",
    command: "echo done",
    cwd: "/tmp",
    timeoutMs: 1000,
    enabled: true,
    ...overrides,
  };
}

describe("runCommand", () => {
  beforeEach(() => {
    spawnMock.mockReset();
  });

  it("runs the command through the shell", async () => {
    spawnMock.mockImplementation(() => createMockChildProcess({ stdout: "hello\n" }));

    const result = await runCommand({ command: "echo hello", cwd: "/tmp", timeoutMs: 1000 });

    expect(spawnMock).toHaveBeenCalledWith("echo hello", expect.objectContaining({ cwd: "/tmp", shell: true }));
    expect(result).toEqual({ ok: true, stdout: "hello", stderr: "", exitCode: 0, timedOut: false });
  });

  it("reports a non-zero exit", async () => {
    spawnMock.mockImplementation(() => createMockChildProcess({ code: 2, stderr: "bad input\n" }));

    const result = await runCommand({ command: "false", cwd: "/tmp", timeoutMs: 1000 });

    expect(result).toEqual({ ok: false, stdout: "", stderr: "bad input", exitCode: 2, timedOut: false });
  });

  it("kills a command that runs past its timeout", async () => {
    const child = createMockChildProcess({ hang: true });
    spawnMock.mockImplementation(() => child);

    const result = await runCommand({ command: "sleep 100", cwd: "/tmp", timeoutMs: 10 });

    expect(child.kill).toHaveBeenCalledWith("SIGKILL");
    expect(result.ok).toBe(false);
    expect(result.timedOut).toBe(true);
  });

  it("reports a spawn failure", async () => {
    const child = createMockChildProcess({ hang: true });
    spawnMock.mockImplementation(() => {
      setTimeout(() => child.emit("error", new Error("spawn ENOENT")), 0);
      return child;
    });

    const result = await runCommand({ command: "missing", cwd: "/tmp", timeoutMs: 1000 });

    expect(result).toEqual({
      ok: false,
      stdout: "",
      stderr: "Error: spawn ENOENT",
      exitCode: null,
      timedOut: false,
    });
  });
});

describe("commandJob", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    spawnMock.mockReset();
  });

  it("resolves when the command succeeds", async () => {
    spawnMock.mockImplementation(() => createMockChildProcess({ stdout: "ok" }));

    await expect(commandJob(jobConfig(), mockLogger)()).resolves.toBeUndefined();

    expect(mockLogger.child).toHaveBeenCalledWith({ job: "nightly" });
    expect(mockLogger.info).toHaveBeenCalledWith({ command: "echo done" }, "Job started");
    expect(mockLogger.info).toHaveBeenCalledWith(
      expect.objectContaining({ exitCode: 0, stdoutPreview: "ok" }),
      "Job completed",
    );
  });

  it("rejects with the exit code and stderr", async () => {
    spawnMock.mockImplementation(() => createMockChildProcess({ code: 3, stderr: "disk full" }));

    await expect(commandJob(jobConfig(), mockLogger)()).rejects.toThrow("Command exited with code 3: disk full");
  });

  it("rejects on timeout", async () => {
    spawnMock.mockImplementation(() => createMockChildProcess({ hang: true }));

    await expect(commandJob(jobConfig({ timeoutMs: 10 }), mockLogger)()).rejects.toThrow(
      "Command timed out after 10ms",
    );
  });

  it("truncates a long stderr in the error", async () => {
    spawnMock.mockImplementation(() => createMockChildProcess({ code: 1, stderr: "e".repeat(500) }));

    await expect(commandJob(jobConfig(), mockLogger)()).rejects.toThrow(
      `Command exited with code 1: ${"e".repeat(400)}…(truncated)`,
    );
  });
});
