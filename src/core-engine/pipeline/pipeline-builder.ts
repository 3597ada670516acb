// ============================================================
// PipelineBuilder — Turns a loaded definition into runnable jobs.
//
// WHY: Everything that can be wrong with a pipeline must be
// found before the first job starts: unknown commands and
// executors, recursive commands, missing exclusion lists,
// malformed determinism checks, cycles. The builder resolves
// all of it up front and hands the scheduler plain Job values.
// ============================================================

import * as path from "node:path";
import Container, {Service} from "typedi";
import {ConfigError} from "../../errors";
import {OutputChannelService} from "../../output-channel.service";
import type {
  BuildConfiguration,
  ExecutorContext,
  Job,
  ParserName,
  Step,
  StepCondition,
  TimingSnapshot,
} from "../../shared-types";
import type {Action} from "../actions/action.interface";
import {DEFAULT_SHELL, parseShell} from "../actions/shell";
import {ShellAction} from "../actions/shell-action";
import {TestShardsAction} from "../actions/test-shards-action";
import {VerifyDeterminismAction} from "../actions/verify-determinism-action";
import type {LoadedConfig} from "../config/config-loader";
import type {
  ExecutorDefinition,
  JobDefinition,
  RunDefinition,
  StepDefinition,
  TestShardsDefinition,
  VerifyDeterminismDefinition,
  WorkflowDefinition,
} from "../config/pipeline-schema";
import {JobGraph} from "../dependency-graph/job-graph";
import {ExclusionFilter} from "../sharding/exclusion-filter";
import {TestPartitioner} from "../sharding/test-partitioner";
import {TimingStore} from "../sharding/timing-store";

export interface Selection {
  /** Workflow to run; defaults to the only workflow, or every job if there is none */
  workflow?: string;
  /** Run only these jobs (and what they require) */
  jobs?: string[];
}

export interface PipelinePlan {
  /** Selected jobs, in definition order */
  jobs: Job[];
  workflow: string | null;
  snapshot: TimingSnapshot;
  /** Absolute paths */
  reportDir: string;
  timingsFile: string;
}

export const DEFAULT_PLACEHOLDER = "<normalized>";

const DURATION_UNITS: Record<string, number> = {ms: 1, s: 1000, m: 60_000, h: 3_600_000};

/** Milliseconds from `90000`, `"90000"`, `"90s"`, `"10m"`; a number without a unit means milliseconds. */
export function parseDuration(value: number | string | undefined): number | undefined {
  if (value === undefined || typeof value === "number") return value;
  const match = /^(\d+)(ms|s|m|h)?$/.exec(value);
  if (!match) {
    throw new ConfigError(`Invalid duration "${value}"`);
  }
  return Number.parseInt(match[1], 10) * DURATION_UNITS[match[2] ?? "ms"];
}

function stringifyEnvironment(
  environment: Record<string, string | number | boolean> | undefined,
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(environment ?? {})) {
    result[key] = String(value);
  }
  return result;
}

function firstLine(command: string): string {
  const line = command.trim().split("\n")[0] ?? "";
  return line.length > 60 ? `${line.slice(0, 57)}...` : line;
}

/** A step definition that is not a command reference. */
type InlineStep = Exclude<StepDefinition, string>;

/** Context shared by everything built for one plan. */
interface BuildScope {
  config: LoadedConfig;
  snapshot: TimingSnapshot;
  partitioner: TestPartitioner;
  exclusions: Map<string, ExclusionFilter>;
}

@Service()
export class PipelineBuilder {
  private readonly output = Container.get(OutputChannelService);
  private readonly timingStore = Container.get(TimingStore);

  /**
   * @throws ConfigError or CycleError; nothing has run when either is thrown.
   */
  async build(config: LoadedConfig, selection: Selection = {}): Promise<PipelinePlan> {
    const {definition, settings} = config;
    const workflowName = this.pickWorkflow(config, selection.workflow);
    const workflow = workflowName ? definition.workflows?.[workflowName] : undefined;

    const requires = this.collectRequires(definition.jobs, workflow);
    const graph = JobGraph.fromJobs(
      Object.keys(definition.jobs).map((name) => ({name, requires: requires.get(name) ?? []})),
    );
    graph.assertAcyclic();

    let roots: readonly string[] = graph.jobNames;
    if (selection.jobs && selection.jobs.length > 0) {
      roots = selection.jobs;
    } else if (workflow) {
      roots = this.workflowJobs(workflow);
    }
    const selected = graph.dependencyClosure(roots);

    const timingsFile = path.resolve(config.root, settings.timingsFile);
    const scope: BuildScope = {
      config,
      snapshot: await this.timingStore.load(timingsFile),
      partitioner: new TestPartitioner({fallbackWeight: settings.fallbackWeight}),
      exclusions: new Map(),
    };

    const jobs: Job[] = [];
    for (const name of selected) {
      jobs.push(await this.buildJob(name, definition.jobs[name], requires.get(name) ?? [], scope));
    }

    this.output.appendLine(
      `[PipelineBuilder] ${workflowName ? `Workflow ${workflowName}` : "All jobs"}: ${jobs.map((j) => j.name).join(", ")}`,
    );
    return {
      jobs,
      workflow: workflowName,
      snapshot: scope.snapshot,
      reportDir: path.resolve(config.root, settings.reportDir),
      timingsFile,
    };
  }

  // ─── Workflows ────────────────────────────────────────────

  private pickWorkflow(config: LoadedConfig, requested: string | undefined): string | null {
    const names = Object.keys(config.definition.workflows ?? {});
    if (requested !== undefined) {
      if (!names.includes(requested)) {
        const hint = names.length > 0 ? [`available: ${names.join(", ")}`] : [];
        throw new ConfigError(`Unknown workflow "${requested}"`, hint);
      }
      return requested;
    }
    if (names.length === 1) return names[0];
    if (names.length > 1) {
      throw new ConfigError("Several workflows are defined; name the one to run", [`available: ${names.join(", ")}`]);
    }
    return null;
  }

  private workflowJobs(workflow: WorkflowDefinition): string[] {
    return workflow.jobs.flatMap((entry) => (typeof entry === "string" ? [entry] : Object.keys(entry)));
  }

  /** A job's requires: its own list united with its workflow entry's. */
  private collectRequires(
    jobs: Record<string, JobDefinition>,
    workflow: WorkflowDefinition | undefined,
  ): Map<string, string[]> {
    const requires = new Map<string, Set<string>>();
    for (const [name, job] of Object.entries(jobs)) {
      requires.set(name, new Set(job.requires ?? []));
    }
    const issues: string[] = [];
    for (const entry of workflow?.jobs ?? []) {
      const items: Array<[string, string[]]> =
        typeof entry === "string"
          ? [[entry, []]]
          : Object.entries(entry).map(([name, options]): [string, string[]] => [name, options.requires ?? []]);
      for (const [name, extra] of items) {
        const own = requires.get(name);
        if (!own) {
          issues.push(`workflow references unknown job "${name}"`);
          continue;
        }
        for (const dependency of extra) own.add(dependency);
      }
    }
    if (issues.length > 0) {
      throw new ConfigError("Invalid workflow", issues);
    }
    return new Map(Array.from(requires, ([name, set]) => [name, Array.from(set)]));
  }

  // ─── Jobs ─────────────────────────────────────────────────

  private async buildJob(name: string, job: JobDefinition, requires: string[], scope: BuildScope): Promise<Job> {
    const executor = this.resolveExecutor(name, job, scope.config);
    const parallelism = job.parallelism ?? 1;
    const definitions = this.expandSteps(job.steps, scope.config, [`job ${name}`]);

    const steps: Step[] = [];
    const usedNames = new Map<string, number>();
    for (const definition of definitions) {
      const step = await this.buildStep(definition, parallelism, scope);
      const seen = usedNames.get(step.name) ?? 0;
      usedNames.set(step.name, seen + 1);
      steps.push(seen > 0 ? {...step, name: `${step.name} (${seen + 1})`} : step);
    }

    return {name, steps, requires, parallelism, executor, resources: job.resources ?? []};
  }

  private resolveExecutor(jobName: string, job: JobDefinition, config: LoadedConfig): ExecutorContext {
    const executors = config.definition.executors ?? {};
    let base: ExecutorDefinition = {};
    if (job.executor !== undefined) {
      const found = executors[job.executor];
      if (!found) {
        throw new ConfigError(`Job "${jobName}" uses unknown executor "${job.executor}"`);
      }
      base = found;
    } else if (executors.default) {
      base = executors.default;
    }

    return {
      workingDirectory: path.resolve(config.root, base.working_directory ?? ".", job.working_directory ?? "."),
      environment: {...stringifyEnvironment(base.environment), ...stringifyEnvironment(job.environment)},
      shell: base.shell ? parseShell(base.shell) : DEFAULT_SHELL,
    };
  }

  /**
   * Inline named commands, recursively.
   * @throws ConfigError for unknown or recursive commands.
   */
  private expandSteps(steps: readonly StepDefinition[], config: LoadedConfig, trail: string[]): InlineStep[] {
    const commands = config.definition.commands ?? {};
    const expanded: InlineStep[] = [];
    for (const step of steps) {
      if (typeof step !== "string") {
        expanded.push(step);
        continue;
      }
      const command = commands[step];
      if (!command) {
        throw new ConfigError(`Unknown command "${step}"`, [`referenced from ${trail[trail.length - 1]}`]);
      }
      if (trail.includes(`command ${step}`)) {
        throw new ConfigError(`Command "${step}" refers to itself`, [[...trail, `command ${step}`].join(" -> ")]);
      }
      expanded.push(...this.expandSteps(command.steps, config, [...trail, `command ${step}`]));
    }
    return expanded;
  }

  private async buildStep(definition: InlineStep, parallelism: number, scope: BuildScope): Promise<Step> {
    if ("run" in definition) {
      return this.buildRunStep(typeof definition.run === "string" ? {command: definition.run} : definition.run);
    }
    if ("test-shards" in definition) {
      return this.buildTestShardsStep(definition["test-shards"], parallelism, scope);
    }
    return this.buildDeterminismStep(definition["verify-determinism"]);
  }

  private buildRunStep(run: RunDefinition): Step {
    const action: Action = new ShellAction(run.command, {
      workingDirectory: run.working_directory,
      environment: stringifyEnvironment(run.environment),
      noOutputTimeoutMs: parseDuration(run.no_output_timeout),
    });
    return this.step(run.name ?? firstLine(run.command), action, run.parser ?? "auto", run.when);
  }

  private async buildTestShardsStep(spec: TestShardsDefinition, parallelism: number, scope: BuildScope): Promise<Step> {
    let exclusions: ExclusionFilter | undefined;
    if (spec.exclusions !== undefined) {
      const exclusionPath = path.resolve(scope.config.root, spec.exclusions);
      exclusions = scope.exclusions.get(exclusionPath);
      if (!exclusions) {
        exclusions = await ExclusionFilter.load(exclusionPath);
        scope.exclusions.set(exclusionPath, exclusions);
        this.output.debug(`[PipelineBuilder] Loaded ${exclusions.size} exclusion(s) from ${exclusionPath}`);
      }
    }

    const action = new TestShardsAction({
      list: typeof spec.list === "string" ? {command: spec.list} : {ids: spec.list},
      command: spec.command,
      shardCount: spec.parallelism ?? parallelism,
      snapshot: scope.snapshot,
      exclusions,
      partitioner: scope.partitioner,
      imbalanceThreshold: scope.config.settings.imbalanceThreshold,
      noOutputTimeoutMs: parseDuration(spec.no_output_timeout),
    });
    return this.step(spec.name ?? firstLine(spec.command), action, spec.parser ?? "auto", spec.when);
  }

  private buildDeterminismStep(spec: VerifyDeterminismDefinition): Step {
    const name = spec.name ?? `verify ${firstLine(spec.build)}`;
    if (spec.configurations.length !== 2) {
      throw new ConfigError(`Determinism check "${name}" needs exactly two configurations`, [
        `got ${spec.configurations.length}`,
      ]);
    }
    if (spec.configurations[0].name === spec.configurations[1].name) {
      throw new ConfigError(
        `Determinism check "${name}" compares configuration "${spec.configurations[0].name}" with itself`,
      );
    }

    const configurations: BuildConfiguration[] = spec.configurations.map((c) => ({
      name: c.name,
      environment: stringifyEnvironment(c.environment),
      artifact: c.artifact,
      workingDirectory: c.working_directory,
      ignorableRegions: c.ignore ?? [],
    }));
    const action = new VerifyDeterminismAction(
      {name, command: spec.build, placeholder: spec.placeholder ?? DEFAULT_PLACEHOLDER},
      configurations,
    );
    return this.step(name, action, spec.parser ?? "plain", spec.when);
  }

  private step(name: string, action: Action, parser: ParserName, when: StepCondition | undefined): Step {
    return {name, action, parser, when: when ?? "on_success"};
  }
}
