// ============================================================
// JobRunner — Executes one job's steps sequentially.
//
// WHY: It provisions the job context, runs each step through
// its action, feeds output into the job's report and turns
// every way a step can end into a classified StepOutcome.
// Build, setup and determinism failures stop the job (except
// `when: always` steps); test failures are recorded and the
// remaining steps still run.
// ============================================================

import Container from "typedi";
import {DeterminismViolation, describeError, FAILURE_SEVERITY, isPipelineError, TestFailure} from "../../errors";
import {OutputChannelService} from "../../output-channel.service";
import type {FailureKind, Job, JobOutcome, Step, StepOutcome} from "../../shared-types";
import type {StepIO} from "../actions/action.interface";
import {type ReportBuilder, ResultAggregator} from "../reporting/result-aggregator";
import {JobContext} from "./job-context";

export interface JobRunnerOptions {
  killGraceMs: number;
  baseEnvironment?: NodeJS.ProcessEnv;
}

const STDERR_DETAIL_LIMIT = 2000;

function mostSevere(kinds: readonly FailureKind[]): FailureKind | undefined {
  return FAILURE_SEVERITY.find((kind) => kinds.includes(kind));
}

function tail(text: string, limit: number): string {
  return text.length > limit ? text.slice(text.length - limit) : text;
}

export class JobRunner {
  private readonly output = Container.get(OutputChannelService);
  private readonly aggregator = Container.get(ResultAggregator);

  constructor(private readonly options: JobRunnerOptions) {}

  async run(job: Job, signal: AbortSignal): Promise<JobOutcome> {
    const startedAt = Date.now();
    const report = this.aggregator.createReport(job.name);
    const steps: StepOutcome[] = [];
    const failures: FailureKind[] = [];
    const messages: string[] = [];
    let fatal = false;
    let exitCode: number | null = null;
    let context: JobContext | null = null;

    this.output.appendLine(`[JobRunner] Starting job: ${job.name}`);

    try {
      context = await JobContext.provision(job, this.options);
    } catch (error) {
      fatal = true;
      failures.push(isPipelineError(error) ? error.kind : "setup");
      messages.push(describeError(error));
      report.addResult({id: `${job.name} setup`, status: "fail", duration: 0, output: describeError(error)});
      this.output.error(`[JobRunner] ${job.name}: ${describeError(error)}`);
    }

    try {
      for (const step of job.steps) {
        if (!context || signal.aborted || (fatal && step.when !== "always")) {
          steps.push({name: step.name, status: "skipped", exitCode: null, durationMs: 0});
          continue;
        }

        const outcome = await this.runStep(step, context, {
          stepName: step.name,
          parser: step.parser,
          signal,
          report,
        });
        steps.push(outcome);

        if (outcome.exitCode !== null && (exitCode === null || exitCode === 0)) {
          exitCode = outcome.exitCode;
        }
        if (outcome.status === "failed" && !signal.aborted && outcome.failureKind) {
          failures.push(outcome.failureKind);
          if (outcome.message) messages.push(`${step.name}: ${outcome.message}`);
          if (outcome.failureKind !== "test") fatal = true;
        }
      }
    } finally {
      if (context) {
        const cleanupErrors = await context.dispose();
        for (const error of cleanupErrors) {
          this.output.warn(`[JobRunner] ${job.name}: cleanup failed: ${error.message}`);
        }
      }
    }

    const failureKind = mostSevere(failures);
    const status = signal.aborted ? "cancelled" : failureKind ? "failed" : "success";
    const finishedAt = Date.now();
    this.output.appendLine(`[JobRunner] Job ${job.name} ${status} in ${finishedAt - startedAt}ms`);

    return {
      name: job.name,
      status,
      failureKind: status === "failed" ? failureKind : undefined,
      message: messages.length > 0 ? messages.join("\n") : undefined,
      steps,
      report: report.finalize(exitCode),
      startedAt,
      finishedAt,
      observedTimings: context ? {...context.observedTimings} : {},
    };
  }

  private async runStep(step: Step, context: JobContext, io: StepIO): Promise<StepOutcome> {
    const started = Date.now();
    const failuresBefore = io.report.failureCount;
    const failedBefore = new Set(io.report.failedIds);
    this.output.appendLine(`[JobRunner] ${context.jobName} › ${step.name}: ${step.action.describe()}`);

    try {
      await context.resetEnvFile();
      const result = await step.action.execute(context, io);
      const exported = await context.absorbEnvFile();
      if (exported.length > 0) {
        this.output.debug(`[JobRunner] ${step.name} exported ${exported.join(", ")}`);
      }

      const durationMs = Date.now() - started;
      if (io.signal.aborted) {
        io.report.recordExit(step.name, result.exitCode, failuresBefore, "cancelled");
        return {name: step.name, status: "failed", exitCode: result.exitCode, durationMs, message: "cancelled"};
      }
      const newlyFailed = io.report.failedIds.filter((id) => !failedBefore.has(id));
      if (newlyFailed.length > 0) {
        const failure = new TestFailure(newlyFailed);
        return {
          name: step.name,
          status: "failed",
          exitCode: result.exitCode,
          durationMs,
          failureKind: failure.kind,
          message: failure.message,
        };
      }
      if (result.exitCode !== 0) {
        const detail = tail(result.stderr, STDERR_DETAIL_LIMIT);
        io.report.recordExit(step.name, result.exitCode, failuresBefore, detail);
        return {
          name: step.name,
          status: "failed",
          exitCode: result.exitCode,
          durationMs,
          failureKind: "build",
          message: `exited with code ${result.exitCode}`,
        };
      }
      return {name: step.name, status: "success", exitCode: 0, durationMs};
    } catch (error) {
      return this.classifyThrown(step, io.report, error, Date.now() - started);
    }
  }

  private classifyThrown(step: Step, report: ReportBuilder, error: unknown, durationMs: number): StepOutcome {
    const kind: FailureKind = isPipelineError(error) ? error.kind : "setup";
    const message = describeError(error);

    if (error instanceof DeterminismViolation) {
      report.addDeterminismDiagnostic({step: step.name, configurations: error.configurations, diff: error.diff});
      for (const hunk of error.diff.hunks) {
        this.output.error(
          `[JobRunner] ${step.name}: lines ${hunk.leftStart}-${hunk.leftEnd} vs ${hunk.rightStart}-${hunk.rightEnd}`,
        );
        for (const line of hunk.left) this.output.error(`  - ${line}`);
        for (const line of hunk.right) this.output.error(`  + ${line}`);
      }
    }
    if (!isPipelineError(error) && error instanceof Error && error.stack) {
      this.output.debug(error.stack);
    }
    this.output.error(`[JobRunner] ${step.name} failed (${kind}): ${message}`);
    report.addResult({id: step.name, status: "fail", duration: durationMs / 1000, output: message});

    return {name: step.name, status: "failed", exitCode: null, durationMs, failureKind: kind, message};
  }
}
