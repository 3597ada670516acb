// ============================================================
// runPipeline — Loads, plans, schedules and reports one run.
//
// WHY: The CLI, tests and embedding tools all run a pipeline
// the same way: definition errors surface before anything runs,
// every attempted job leaves a report on disk, and historical
// timings are updated only after the run has finished.
// ============================================================

import Container from "typedi";
import {OutputChannelService} from "../output-channel.service";
import type {JobOutcome, PipelineResult} from "../shared-types";
import {ConfigLoader, type LoadedConfig} from "./config/config-loader";
import {EventServer} from "./ipc/server";
import {PipelineBuilder, type PipelinePlan} from "./pipeline/pipeline-builder";
import {ResultAggregator} from "./reporting/result-aggregator";
import {ReportWriter} from "./reporting/report-writer";
import {JobScheduler} from "./scheduler/job-scheduler";
import {TimingStore} from "./sharding/timing-store";

export interface RunOptions {
  workspaceRoot: string;
  configPath?: string;
  /** Raw `key=value` parameter overrides */
  parameters?: Record<string, string>;
  workflow?: string;
  jobs?: string[];
  /** Overrides for individual settings of the loaded file */
  maxConcurrency?: number;
  reportDir?: string;
  /** Start the event server on this port (0 = any free port) */
  eventsPort?: number;
  signal?: AbortSignal;
  /** Called once the event server listens */
  onEventServer?: (port: number, server: EventServer) => void;
}

export interface RunSummary extends PipelineResult {
  plan: PipelinePlan;
  reportFiles: string[];
}

function applyOverrides(config: LoadedConfig, options: RunOptions): LoadedConfig {
  const settings = {...config.settings, events: {...config.settings.events}};
  if (options.maxConcurrency !== undefined) settings.maxConcurrency = options.maxConcurrency;
  if (options.reportDir !== undefined) settings.reportDir = options.reportDir;
  if (options.eventsPort !== undefined) {
    settings.events = {enabled: true, port: options.eventsPort};
  }
  return {...config, settings};
}

function mergeTimings(outcomes: readonly JobOutcome[]): Record<string, number> {
  const merged: Record<string, number> = {};
  for (const outcome of outcomes) {
    Object.assign(merged, outcome.observedTimings);
  }
  return merged;
}

function describeOutcome(outcome: JobOutcome): string {
  if (outcome.status === "blocked") return `blocked by ${outcome.blockedBy ?? "a failed job"}`;
  const counts = outcome.report?.counts;
  const tests = counts ? ` (${counts.pass} passed, ${counts.fail} failed, ${counts.skip} skipped)` : "";
  return `${outcome.status}${outcome.failureKind ? ` [${outcome.failureKind}]` : ""}${tests}`;
}

/**
 * Run a pipeline end to end.
 * @throws ConfigError or CycleError before any job starts.
 */
export async function runPipeline(options: RunOptions): Promise<RunSummary> {
  const output = Container.get(OutputChannelService);
  const loaded = await Container.get(ConfigLoader).load(options.workspaceRoot, {
    configPath: options.configPath,
    parameterOverrides: options.parameters,
  });
  const config = applyOverrides(loaded, options);
  const plan = await Container.get(PipelineBuilder).build(config, {workflow: options.workflow, jobs: options.jobs});
  const {settings} = config;

  const controller = new AbortController();
  const forwardAbort = (): void => controller.abort();
  options.signal?.addEventListener("abort", forwardAbort, {once: true});
  if (options.signal?.aborted) controller.abort();

  let server: EventServer | null = null;
  if (settings.events.enabled) {
    server = new EventServer();
    server.onMessage("cancel-run", () => {
      output.warn("[Pipeline] Cancellation requested by event client");
      controller.abort();
    });
    const port = await server.start(settings.events.port);
    output.appendLine(`[Pipeline] Event server listening on port ${port}`);
    options.onEventServer?.(port, server);
  }

  const events = server;
  Container.get(ResultAggregator).hookIntoLifecycle({
    onTestResult: (job, result) =>
      events?.broadcast("test-result", {job, result}, {cacheKey: `test-result:${job}:${result.id}`}),
  });

  try {
    const jobNames = plan.jobs.map((j) => j.name);
    events?.broadcast("pipeline-start", {workflow: plan.workflow, jobs: jobNames}, {cacheKey: "run"});

    const scheduler = new JobScheduler(
      {
        maxConcurrency: settings.maxConcurrency,
        gracePeriodMs: settings.gracePeriodMs,
        killGraceMs: settings.killGraceMs,
        signal: controller.signal,
      },
      {
        onJobStatus: (job, status, outcome) =>
          events?.broadcast(
            "job-status",
            {job, status, failureKind: outcome?.failureKind, blockedBy: outcome?.blockedBy},
            {cacheKey: `job-status:${job}`},
          ),
      },
    );
    const result = await scheduler.run(plan.jobs);

    const writer = Container.get(ReportWriter);
    const reportFiles: string[] = [];
    for (const outcome of result.outcomes) {
      if (outcome.report) {
        reportFiles.push(...(await writer.write(outcome.report, plan.reportDir)));
      }
    }

    const observed = mergeTimings(result.outcomes);
    if (settings.recordTimings && !result.cancelled && Object.keys(observed).length > 0) {
      await Container.get(TimingStore).record(plan.timingsFile, observed);
    }

    for (const outcome of result.outcomes) {
      output.appendLine(`[Pipeline] ${outcome.name}: ${describeOutcome(outcome)}`);
    }
    output.appendLine(`[Pipeline] ${result.success ? "Succeeded" : "Failed"} with exit code ${result.exitCode}`);

    events?.broadcast(
      "pipeline-complete",
      {success: result.success, cancelled: result.cancelled, exitCode: result.exitCode},
      {cacheKey: "run"},
    );
    return {...result, plan, reportFiles};
  } finally {
    options.signal?.removeEventListener("abort", forwardAbort);
    Container.get(ResultAggregator).hookIntoLifecycle({});
    await events?.stop();
  }
}
