// ============================================================
// JobContext — Job-scoped mutable state shared by its steps.
//
// WHY: Values one step exports must be visible to the next
// step of the same job and never to another job. Everything a
// step acquires (temp dirs, cleanup callbacks) is released
// when the job completes, on every exit path.
// ============================================================

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import {describeError, SetupFailure} from "../../errors";
import type {Job} from "../../shared-types";
import {parseEnvFile} from "../actions/env-file";

export const ENV_FILE_VARIABLE = "PIPEWRIGHT_ENV";

export interface JobContextOptions {
  /** Delay between SIGTERM and SIGKILL when a step is cancelled */
  killGraceMs: number;
  /** Base environment the job's own bindings are layered over */
  baseEnvironment?: NodeJS.ProcessEnv;
}

type Cleanup = () => void | Promise<void>;

function definedEntries(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}

export class JobContext {
  /** Bindings every following step sees; steps add to it through the env file */
  readonly environment: Record<string, string>;
  readonly shell: string[];
  readonly killGraceMs: number;
  /** Observed durations per partition identifier, collected by test steps */
  readonly observedTimings: Record<string, number> = {};

  private readonly cleanups: Cleanup[] = [];
  private disposed = false;

  private constructor(
    readonly jobName: string,
    readonly workingDirectory: string,
    private readonly scratchDirectory: string,
    private readonly baseEnvironment: Record<string, string>,
    job: Job,
    options: JobContextOptions,
  ) {
    this.environment = {...job.executor.environment};
    this.shell = job.executor.shell;
    this.killGraceMs = options.killGraceMs;
  }

  /**
   * Prepare a job's working directory and scratch space.
   * @throws SetupFailure when either cannot be provisioned.
   */
  static async provision(job: Job, options: JobContextOptions): Promise<JobContext> {
    const workingDirectory = path.resolve(job.executor.workingDirectory);
    try {
      const stat = await fs.stat(workingDirectory);
      if (!stat.isDirectory()) {
        throw new Error("not a directory");
      }
    } catch (error) {
      throw new SetupFailure(`Working directory ${workingDirectory} is unusable: ${describeError(error)}`);
    }

    let scratch: string;
    try {
      const safeName = job.name.replace(/[^A-Za-z0-9_-]/g, "_");
      scratch = await fs.mkdtemp(path.join(os.tmpdir(), `pipewright-${safeName}-`));
    } catch (error) {
      throw new SetupFailure(`Cannot create scratch directory for job ${job.name}: ${describeError(error)}`);
    }

    const base = definedEntries(options.baseEnvironment ?? process.env);
    return new JobContext(job.name, workingDirectory, scratch, base, job, options);
  }

  get envFile(): string {
    return path.join(this.scratchDirectory, "env");
  }

  resolvePath(relative?: string): string {
    return relative ? path.resolve(this.workingDirectory, relative) : this.workingDirectory;
  }

  /** Full environment for a step process. */
  stepEnvironment(extra: Record<string, string> = {}): Record<string, string> {
    return {
      ...this.baseEnvironment,
      ...this.environment,
      ...extra,
      [ENV_FILE_VARIABLE]: this.envFile,
      PIPEWRIGHT_JOB: this.jobName,
    };
  }

  /** Fresh directory removed when the job completes. */
  async createTempDir(prefix = "tmp"): Promise<string> {
    try {
      return await fs.mkdtemp(path.join(this.scratchDirectory, `${prefix}-`));
    } catch (error) {
      throw new SetupFailure(`Cannot create temp directory in ${this.scratchDirectory}: ${describeError(error)}`);
    }
  }

  onCleanup(cleanup: Cleanup): void {
    this.cleanups.push(cleanup);
  }

  /** Empty the env file before a step runs. */
  async resetEnvFile(): Promise<void> {
    try {
      await fs.writeFile(this.envFile, "", "utf-8");
    } catch (error) {
      throw new SetupFailure(`Cannot prepare ${ENV_FILE_VARIABLE} file: ${describeError(error)}`);
    }
  }

  /** Merge what the last step wrote to the env file; returns the keys it set. */
  async absorbEnvFile(): Promise<string[]> {
    let content: string;
    try {
      content = await fs.readFile(this.envFile, "utf-8");
    } catch (error) {
      throw new SetupFailure(`Cannot read ${ENV_FILE_VARIABLE} file: ${describeError(error)}`);
    }
    const bindings = parseEnvFile(content);
    Object.assign(this.environment, bindings);
    return Object.keys(bindings);
  }

  recordTimings(observed: Record<string, number>): void {
    for (const [id, duration] of Object.entries(observed)) {
      this.observedTimings[id] = duration;
    }
  }

  /**
   * Run cleanup callbacks (last registered first) and remove the scratch
   * directory. Returns the errors cleanup raised; it never stops halfway.
   */
  async dispose(): Promise<Error[]> {
    if (this.disposed) return [];
    this.disposed = true;

    const errors: Error[] = [];
    for (const cleanup of this.cleanups.reverse()) {
      try {
        await cleanup();
      } catch (error) {
        errors.push(error instanceof Error ? error : new Error(String(error)));
      }
    }
    try {
      await fs.rm(this.scratchDirectory, {recursive: true, force: true});
    } catch (error) {
      errors.push(error instanceof Error ? error : new Error(String(error)));
    }
    return errors;
  }
}
