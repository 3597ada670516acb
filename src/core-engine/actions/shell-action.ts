import type {ActionResult} from "../../shared-types";
import type {JobContext} from "../scheduler/job-context";
import type {Action, StepIO} from "./action.interface";
import {runShell} from "./shell";

export interface ShellActionOptions {
  /** Overrides the job's working directory (relative to it) */
  workingDirectory?: string;
  environment?: Record<string, string>;
  noOutputTimeoutMs?: number;
}

/** `run` step: one shell command whose stdout feeds the job report. */
export class ShellAction implements Action {
  readonly kind = "run";

  constructor(
    readonly command: string,
    private readonly options: ShellActionOptions = {},
  ) {}

  describe(): string {
    return this.command.split("\n")[0];
  }

  async execute(context: JobContext, io: StepIO): Promise<ActionResult> {
    const stream = io.report.openStream(io.stepName, io.parser);
    try {
      return await runShell(this.command, {
        shell: context.shell,
        cwd: context.resolvePath(this.options.workingDirectory),
        env: context.stepEnvironment(this.options.environment),
        signal: io.signal,
        killGraceMs: context.killGraceMs,
        noOutputTimeoutMs: this.options.noOutputTimeoutMs,
        onStdout: (chunk) => stream.write(chunk),
      });
    } finally {
      io.report.merge(stream.end());
    }
  }
}
