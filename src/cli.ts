#!/usr/bin/env node
import "reflect-metadata";
import * as path from "node:path";
import {Command, InvalidArgumentError} from "commander";
import Container from "typedi";
import {ConfigLoader} from "./core-engine/config/config-loader";
import {parseOverrides} from "./core-engine/config/parameters";
import {JobGraph} from "./core-engine/dependency-graph/job-graph";
import {runPipeline} from "./core-engine/main";
import {PipelineBuilder} from "./core-engine/pipeline/pipeline-builder";
import {ExclusionFilter} from "./core-engine/sharding/exclusion-filter";
import {splitForShard} from "./core-engine/sharding/test-partitioner";
import {EMPTY_SNAPSHOT, TimingStore} from "./core-engine/sharding/timing-store";
import {describeError, EXIT_CODES, isPipelineError} from "./errors";
import {createStreamChannel, OutputChannelService} from "./output-channel.service";

interface CommonOptions {
  config?: string;
  cwd: string;
  param: string[];
  verbose?: boolean;
}

interface RunCommandOptions extends CommonOptions {
  job?: string[];
  maxConcurrency?: number;
  reportDir?: string;
  eventsPort?: number;
}

interface SplitCommandOptions {
  index: number;
  total: number;
  timings?: string;
  exclusions?: string;
  fallbackWeight?: number;
  verbose?: boolean;
}

function parseInteger(minimum: number) {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < minimum) {
      throw new InvalidArgumentError(`expected an integer >= ${minimum}`);
    }
    return parsed;
  };
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError("expected a non-negative number");
  }
  return parsed;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/** Log lines go to `out` (stderr for commands whose stdout is data), warnings and errors to stderr. */
function setupLogging(verbose: boolean | undefined, out: NodeJS.WritableStream = process.stderr): OutputChannelService {
  const output = Container.get(OutputChannelService);
  output.setupOutputChannel(createStreamChannel(out, process.stderr), verbose ? "debug" : "info");
  return output;
}

/** Run a command body, mapping failures to the documented exit codes. */
async function guarded(body: () => Promise<number>): Promise<void> {
  const output = Container.get(OutputChannelService);
  try {
    process.exitCode = await body();
  } catch (error) {
    if (isPipelineError(error)) {
      output.error(`[pipewright] ${error.name}: ${error.message}`);
      process.exitCode = error.exitCode;
      return;
    }
    output.error(`[pipewright] Unexpected error: ${describeError(error)}`);
    if (error instanceof Error && error.stack) output.debug(error.stack);
    process.exitCode = EXIT_CODES.unexpected;
  }
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf-8");
}

/** Identifiers of one shard of `input` (one identifier per line). */
export async function runSplit(input: string, options: SplitCommandOptions, cwd = process.cwd()): Promise<string[]> {
  const ids = Array.from(
    new Set(
      input
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line !== ""),
    ),
  );
  const filtered = options.exclusions
    ? (await ExclusionFilter.load(path.resolve(cwd, options.exclusions))).apply(ids).kept
    : ids;
  const snapshot = options.timings
    ? await Container.get(TimingStore).load(path.resolve(cwd, options.timings))
    : EMPTY_SNAPSHOT;
  return splitForShard(filtered, snapshot, options.index, options.total, {fallbackWeight: options.fallbackWeight});
}

export function createProgram(): Command {
  const program = new Command();
  program
    .name("pipewright")
    .description("Run dependency-ordered CI jobs with timing-balanced test shards and determinism checks")
    .version("0.1.0");

  const withCommonOptions = (command: Command): Command =>
    command
      .option("-c, --config <path>", "pipeline definition file")
      .option("-C, --cwd <dir>", "workspace root", process.cwd())
      .option("-p, --param <key=value>", "override a pipeline parameter (repeatable)", collect, [])
      .option("-v, --verbose", "log debug output");

  withCommonOptions(program.command("run"))
    .description("Run a workflow (default: the only one, or every job)")
    .argument("[workflow]", "workflow to run")
    .option("-j, --job <name...>", "run only these jobs and the jobs they require")
    .option("--max-concurrency <n>", "maximum number of jobs running at once", parseInteger(1))
    .option("--report-dir <dir>", "directory for JSON and JUnit reports")
    .option("--events-port <port>", "serve progress events over WebSocket on this port", parseInteger(0))
    .action(async (workflow: string | undefined, opts: RunCommandOptions) => {
      const output = setupLogging(opts.verbose, process.stdout);
      await guarded(async () => {
        const controller = new AbortController();
        const onSignal = (): void => {
          output.warn("[pipewright] Interrupt received, cancelling run");
          controller.abort();
        };
        process.once("SIGINT", onSignal);
        process.once("SIGTERM", onSignal);
        try {
          const summary = await runPipeline({
            workspaceRoot: path.resolve(opts.cwd),
            configPath: opts.config,
            parameters: parseOverrides(opts.param),
            workflow,
            jobs: opts.job,
            maxConcurrency: opts.maxConcurrency,
            reportDir: opts.reportDir,
            eventsPort: opts.eventsPort,
            signal: controller.signal,
          });
          return summary.exitCode;
        } finally {
          process.off("SIGINT", onSignal);
          process.off("SIGTERM", onSignal);
        }
      });
    });

  program
    .command("split")
    .description("Print one timing-balanced shard of the test identifiers read from stdin")
    .requiredOption("--index <i>", "0-based shard index", parseInteger(0))
    .requiredOption("--total <n>", "number of shards", parseInteger(1))
    .option("--timings <file>", "timing file ({\"timings\": {id: seconds}})")
    .option("--exclusions <file>", "denylist of identifiers to drop first")
    .option("--fallback-weight <w>", "weight of identifiers without timings", parseNumber)
    .option("-v, --verbose", "log debug output")
    .action(async (opts: SplitCommandOptions) => {
      setupLogging(opts.verbose);
      await guarded(async () => {
        const ids = await runSplit(await readStdin(), opts);
        process.stdout.write(ids.length > 0 ? ids.join("\n") + "\n" : "");
        return EXIT_CODES.success;
      });
    });

  withCommonOptions(program.command("graph"))
    .description("Print the selected jobs in a valid execution order")
    .argument("[workflow]", "workflow to show")
    .action(async (workflow: string | undefined, opts: CommonOptions) => {
      setupLogging(opts.verbose);
      await guarded(async () => {
        const root = path.resolve(opts.cwd);
        const config = await Container.get(ConfigLoader).load(root, {
          configPath: opts.config,
          parameterOverrides: parseOverrides(opts.param),
        });
        const plan = await Container.get(PipelineBuilder).build(config, {workflow});
        const graph = JobGraph.fromJobs(plan.jobs);
        for (const name of graph.topologicalOrder()) {
          const requires = graph.getDependencies(name);
          process.stdout.write(requires.length > 0 ? `${name} (requires ${requires.join(", ")})\n` : `${name}\n`);
        }
        return EXIT_CODES.success;
      });
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      process.stderr.write(`pipewright: ${describeError(error)}\n`);
      process.exitCode = EXIT_CODES.unexpected;
    });
}
