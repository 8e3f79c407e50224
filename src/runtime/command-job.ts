/**
 * Command Job - run a configured shell command as a scheduled job
 */

import { spawn } from "node:child_process";

import type { JobConfig } from "../config.js";
import type { Logger } from "../log.js";
import type { Job } from "../scheduler/types.js";

const OUTPUT_LIMIT = 2_000_000;
const PREVIEW_LENGTH = 400;

export interface CommandResult {
  ok: boolean;
  stdout: string;
  stderr: string;
  exitCode: number | null;
  timedOut: boolean;
}

export function runCommand(params: { command: string; cwd: string; timeoutMs: number }): Promise<CommandResult> {
  return new Promise((resolve) => {
    let stdout = "";
    let stderr = "";
    let timedOut = false;

    const child = spawn(params.command, {
      cwd: params.cwd,
      env: process.env,
      shell: true,
    });

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill("SIGKILL");
    }, params.timeoutMs);

    child.stdout.on("data", (data: Buffer) => {
      stdout += data.toString();
      if (stdout.length > OUTPUT_LIMIT) stdout = stdout.slice(-OUTPUT_LIMIT);
    });

    child.stderr.on("data", (data: Buffer) => {
      stderr += data.toString();
      if (stderr.length > OUTPUT_LIMIT) stderr = stderr.slice(-OUTPUT_LIMIT);
    });

    child.on("error", (err: Error) => {
      clearTimeout(timer);
      resolve({
        ok: false,
        stdout,
        stderr: stderr || String(err),
        exitCode: null,
        timedOut,
      });
    });

    child.on("close", (code: number | null) => {
      clearTimeout(timer);
      resolve({
        ok: code === 0 && !timedOut,
        stdout: stdout.trim(),
        stderr: stderr.trim(),
        exitCode: code,
        timedOut,
      });
    });
  });
}

function preview(text: string): string {
  return text.length > PREVIEW_LENGTH ? text.slice(0, PREVIEW_LENGTH) + "…(truncated)" : text;
}

/**
 * Job that runs `config.command` through the shell. A non-zero exit or a
 * timeout rejects, so the chain's recover wrapper reports it.
 */
export function commandJob(config: JobConfig, logger: Logger): Job {
  const log = logger.child({ job: config.name });

  return async () => {
    const startedAt = Date.now();
    log.info({ command: config.command }, "Job started");

    const result = await runCommand({
      command: config.command,
      cwd: config.cwd ?? process.cwd(),
      timeoutMs: config.timeoutMs,
    });
    const duration = Date.now() - startedAt;

    if (!result.ok) {
      throw new Error(
        result.timedOut
          ? `Command timed out after ${config.timeoutMs}ms`
          : `Command exited with code ${result.exitCode}: ${preview(result.stderr)}`,
      );
    }

    log.info({ exitCode: result.exitCode, duration, stdoutPreview: preview(result.stdout) }, "Job completed");
  };
}
