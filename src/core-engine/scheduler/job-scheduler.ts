// ============================================================
// JobScheduler — Runs a DAG of jobs on a bounded worker pool.
//
// WHY: A job may start only after every job it requires has
// succeeded. In-degree counters and a FIFO ready queue decide
// what is eligible; the pool and the named resources decide
// what actually starts. A failed job blocks everything
// downstream of it while independent branches keep going.
// ============================================================

import Container from "typedi";
import {describeError, EXIT_CODES, exitCodeForKind, FAILURE_SEVERITY} from "../../errors";
import {OutputChannelService} from "../../output-channel.service";
import type {Job, JobOutcome, JobStatus, PipelineResult} from "../../shared-types";
import {JobGraph} from "../dependency-graph/job-graph";
import {JobRunner} from "./job-runner";
import {WorkerPool} from "./worker-pool";

export interface SchedulerOptions {
  /** Maximum number of jobs running at the same time */
  maxConcurrency: number;
  /** How long in-flight jobs get to settle after cancellation */
  gracePeriodMs: number;
  /** Delay between SIGTERM and SIGKILL for cancelled shell steps; capped at `gracePeriodMs` */
  killGraceMs: number;
  signal?: AbortSignal;
  baseEnvironment?: NodeJS.ProcessEnv;
}

export interface SchedulerHooks {
  onJobStatus?: (job: string, status: JobStatus, outcome?: JobOutcome) => void;
}

function emptyOutcome(name: string, status: JobStatus, extra: Partial<JobOutcome> = {}): JobOutcome {
  return {name, status, steps: [], report: null, observedTimings: {}, ...extra};
}

/** Exit status of a finished run: 0 on success, else the most severe failure class present. */
export function pipelineExitCode(outcomes: readonly JobOutcome[], cancelled: boolean): number {
  if (cancelled) return EXIT_CODES.cancelled;
  if (outcomes.every((o) => o.status === "success")) return EXIT_CODES.success;
  const kinds = outcomes.flatMap((o) => (o.failureKind ? [o.failureKind] : []));
  const worst = FAILURE_SEVERITY.find((kind) => kinds.includes(kind));
  return worst ? exitCodeForKind(worst) : EXIT_CODES.unexpected;
}

export class JobScheduler {
  private readonly output = Container.get(OutputChannelService);

  constructor(
    private readonly options: SchedulerOptions,
    private readonly hooks: SchedulerHooks = {},
  ) {}

  /**
   * Execute every job exactly once, respecting `requires`.
   * @throws ConfigError or CycleError before any job starts.
   */
  async run(jobs: readonly Job[]): Promise<PipelineResult> {
    const graph = JobGraph.fromJobs(jobs);
    graph.assertAcyclic();

    const byName = new Map(jobs.map((job) => [job.name, job]));
    const outcomes = new Map<string, JobOutcome>();
    const inDegree = new Map(graph.jobNames.map((name) => [name, graph.getDependencies(name).length]));
    const ready = graph.jobNames.filter((name) => inDegree.get(name) === 0);
    const heldResources = new Set<string>();
    const inFlight = new Map<string, Promise<JobOutcome>>();

    const pool = new WorkerPool(this.options.maxConcurrency);
    const runner = new JobRunner({
      killGraceMs: Math.min(this.options.killGraceMs, this.options.gracePeriodMs),
      baseEnvironment: this.options.baseEnvironment,
    });
    const controller = new AbortController();
    const external = this.options.signal;
    const forwardAbort = (): void => controller.abort();
    external?.addEventListener("abort", forwardAbort, {once: true});
    if (external?.aborted) controller.abort();

    const aborted = new Promise<"aborted">((resolve) => {
      if (controller.signal.aborted) resolve("aborted");
      controller.signal.addEventListener("abort", () => resolve("aborted"), {once: true});
    });

    const record = (outcome: JobOutcome): void => {
      outcomes.set(outcome.name, outcome);
      this.hooks.onJobStatus?.(outcome.name, outcome.status, outcome);
    };

    const dispatch = (): void => {
      for (let i = 0; i < ready.length && pool.hasCapacity; ) {
        const job = byName.get(ready[i]);
        if (!job) {
          ready.splice(i, 1);
          continue;
        }
        if (job.resources.some((r) => heldResources.has(r))) {
          i++;
          continue;
        }
        ready.splice(i, 1);
        for (const resource of job.resources) heldResources.add(resource);
        this.hooks.onJobStatus?.(job.name, "running");
        const execution = pool
          .runTask(() => runner.run(job, controller.signal))
          .catch((error: unknown) => {
            this.output.error(`[Scheduler] Job ${job.name} crashed: ${describeError(error)}`);
            return emptyOutcome(job.name, "failed", {failureKind: "setup", message: describeError(error)});
          });
        inFlight.set(job.name, execution);
        const {active, max} = pool.stats;
        this.output.debug(`[Scheduler] Started ${job.name} (${active}/${max} workers busy)`);
      }
    };

    const settle = (outcome: JobOutcome): void => {
      inFlight.delete(outcome.name);
      for (const resource of byName.get(outcome.name)?.resources ?? []) heldResources.delete(resource);
      record(outcome);

      if (outcome.status === "success") {
        for (const dependent of graph.getDependents(outcome.name)) {
          const remaining = (inDegree.get(dependent) ?? 0) - 1;
          inDegree.set(dependent, remaining);
          if (remaining === 0 && !outcomes.has(dependent)) ready.push(dependent);
        }
        return;
      }
      if (outcome.status === "cancelled") return;
      for (const dependent of graph.getTransitiveDependents(outcome.name)) {
        if (outcomes.has(dependent)) continue;
        this.output.appendLine(`[Scheduler] Job ${dependent} blocked by ${outcome.name}`);
        record(emptyOutcome(dependent, "blocked", {blockedBy: outcome.name}));
      }
    };

    this.output.appendLine(
      `[Scheduler] Running ${graph.nodeCount} job(s) with concurrency ${this.options.maxConcurrency}`,
    );

    while (!controller.signal.aborted) {
      dispatch();
      if (inFlight.size === 0) break;
      const next = await Promise.race([...inFlight.values(), aborted]);
      if (next !== "aborted") settle(next);
    }

    const cancelled = controller.signal.aborted;
    if (cancelled) {
      await this.cancelRemaining(graph.jobNames, outcomes, inFlight, settle);
    }
    external?.removeEventListener("abort", forwardAbort);

    const ordered = graph.jobNames.map((name) => outcomes.get(name) ?? emptyOutcome(name, "blocked"));
    const exitCode = pipelineExitCode(ordered, cancelled);
    return {outcomes: ordered, success: exitCode === EXIT_CODES.success, cancelled, exitCode};
  }

  /**
   * In-flight jobs get the grace period to settle; by then their shell steps
   * have been killed. Every in-flight job is awaited, cleanup included, before
   * it is recorded. A job that finished before the abort keeps its outcome,
   * one that settled in time keeps its partial report, one that did not is
   * recorded without a report. Jobs never started are cancelled outright.
   */
  private async cancelRemaining(
    names: readonly string[],
    outcomes: Map<string, JobOutcome>,
    inFlight: Map<string, Promise<JobOutcome>>,
    settle: (outcome: JobOutcome) => void,
  ): Promise<void> {
    this.output.warn(`[Scheduler] Run cancelled; waiting up to ${this.options.gracePeriodMs}ms for running jobs`);

    let expired = false;
    const timer = setTimeout(() => {
      expired = true;
    }, this.options.gracePeriodMs);
    try {
      const settled = await Promise.all(
        Array.from(inFlight, async ([name, execution]) => {
          const outcome = await execution;
          if (outcome.status !== "cancelled") {
            return outcome;
          }
          if (!expired) {
            return outcome;
          }
          this.output.warn(`[Scheduler] Job ${name} did not settle within the grace period; partial report discarded`);
          return emptyOutcome(name, "cancelled", {
            steps: outcome.steps,
            message: "did not settle within the grace period",
          });
        }),
      );
      for (const outcome of settled) settle(outcome);
    } finally {
      clearTimeout(timer);
      inFlight.clear();
    }

    for (const name of names) {
      if (!outcomes.has(name)) {
        settle(emptyOutcome(name, "cancelled", {message: "cancelled before start"}));
      }
    }
  }
}
