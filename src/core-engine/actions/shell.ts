// ============================================================
// runShell — Spawns one shell command and streams its output.
//
// WHY: Every external collaborator (compiler, test runner, list
// command) is an opaque executable with a stdin/stdout/exit-code
// contract. Cancellation sends SIGTERM to the whole process
// group, then SIGKILL once the kill grace period expires.
// ============================================================

import {spawn} from "node:child_process";
import * as os from "node:os";
import {SetupFailure} from "../../errors";
import type {ActionResult} from "../../shared-types";

export interface ShellOptions {
  /** Shell command line; the command is appended after `-c` */
  shell: string[];
  cwd: string;
  env: Record<string, string>;
  signal?: AbortSignal;
  /** Delay between SIGTERM and SIGKILL on cancellation */
  killGraceMs?: number;
  /** Fail the command when it prints nothing for this long (0 = never) */
  noOutputTimeoutMs?: number;
  onStdout?: (chunk: string) => void;
  onStderr?: (chunk: string) => void;
}

export const DEFAULT_SHELL = ["/bin/bash", "-eo", "pipefail"];

/** Parse "/bin/bash -eo pipefail" into argv form. */
export function parseShell(shell: string): string[] {
  const parts = shell.trim().split(/\s+/).filter((p) => p !== "");
  return parts.length > 0 ? parts : DEFAULT_SHELL;
}

function signalExitCode(signal: NodeJS.Signals): number {
  return 128 + (os.constants.signals[signal] ?? 0);
}

export function runShell(command: string, options: ShellOptions): Promise<ActionResult> {
  const [program, ...args] = options.shell.length > 0 ? options.shell : DEFAULT_SHELL;
  const killGraceMs = options.killGraceMs ?? 5000;

  return new Promise<ActionResult>((resolve, reject) => {
    if (options.signal?.aborted) {
      resolve({exitCode: signalExitCode("SIGTERM"), stdout: "", stderr: "cancelled before start"});
      return;
    }

    const child = spawn(program, [...args, "-c", command], {
      cwd: options.cwd,
      env: options.env,
      stdio: ["ignore", "pipe", "pipe"],
      detached: process.platform !== "win32",
    });

    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let killTimer: NodeJS.Timeout | null = null;
    let idleTimer: NodeJS.Timeout | null = null;

    const kill = (signal: NodeJS.Signals): void => {
      if (child.pid === undefined || child.exitCode !== null) return;
      try {
        if (process.platform !== "win32") {
          process.kill(-child.pid, signal);
        } else {
          child.kill(signal);
        }
      } catch {
        // Process group already gone
        child.kill(signal);
      }
    };

    const terminate = (): void => {
      kill("SIGTERM");
      killTimer ??= setTimeout(() => kill("SIGKILL"), killGraceMs);
    };

    const resetIdleTimer = (): void => {
      if (!options.noOutputTimeoutMs) return;
      if (idleTimer) clearTimeout(idleTimer);
      idleTimer = setTimeout(() => {
        timedOut = true;
        terminate();
      }, options.noOutputTimeoutMs);
    };

    const onAbort = (): void => terminate();
    options.signal?.addEventListener("abort", onAbort, {once: true});
    resetIdleTimer();

    child.stdout.setEncoding("utf-8");
    child.stderr.setEncoding("utf-8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
      resetIdleTimer();
      options.onStdout?.(chunk);
    });
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
      resetIdleTimer();
      options.onStderr?.(chunk);
    });

    const finish = (): void => {
      options.signal?.removeEventListener("abort", onAbort);
      if (killTimer) clearTimeout(killTimer);
      if (idleTimer) clearTimeout(idleTimer);
    };

    child.on("error", (error) => {
      finish();
      reject(new SetupFailure(`Cannot start "${program}" in ${options.cwd}: ${error.message}`));
    });

    child.on("close", (code, signal) => {
      finish();
      if (timedOut) {
        stderr += `\nno output for ${options.noOutputTimeoutMs}ms, command terminated`;
      }
      const exitCode = code ?? (signal ? signalExitCode(signal) : 1);
      resolve({exitCode, stdout, stderr});
    });
  });
}
