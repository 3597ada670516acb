// ============================================================
// TestShardsAction — Filter, partition and run a test corpus.
//
// WHY: The corpus is listed, stripped of denylisted entries,
// split into balanced shards by historical timing and run with
// every shard as an independent process. Each shard writes a
// private partial report; merging waits for all of them.
// ============================================================

import * as fs from "node:fs/promises";
import * as path from "node:path";
import Container from "typedi";
import {BuildFailure} from "../../errors";
import {OutputChannelService} from "../../output-channel.service";
import type {ActionResult, PartialReport, Shard, TestResult, TimingSnapshot} from "../../shared-types";
import type {ExclusionFilter} from "../sharding/exclusion-filter";
import {assessBalance, TestPartitioner} from "../sharding/test-partitioner";
import {observedDurations} from "../sharding/timing-store";
import type {JobContext} from "../scheduler/job-context";
import type {Action, StepIO} from "./action.interface";
import {runShell} from "./shell";

export type TestList = {ids: string[]} | {command: string};

export interface TestShardsOptions {
  list: TestList;
  /** Shell command run once per shard; `{{ids}}` and `{{ids_file}}` are substituted */
  command: string;
  shardCount: number;
  snapshot: TimingSnapshot;
  exclusions?: ExclusionFilter;
  partitioner?: TestPartitioner;
  imbalanceThreshold: number;
  noOutputTimeoutMs?: number;
}

interface ShardRun {
  shard: Shard;
  source: string;
  exitCode: number;
  stderr: string;
  partial: PartialReport;
}

const SAFE_ARG_RE = /^[A-Za-z0-9_\-./:=@%+,]+$/;
const STDERR_DETAIL_LIMIT = 2000;

export function shellQuote(value: string): string {
  return SAFE_ARG_RE.test(value) ? value : `'${value.replace(/'/g, `'\\''`)}'`;
}

export function renderShardCommand(template: string, ids: readonly string[], idsFile: string): string {
  return template
    .replace(/\{\{\s*ids\s*\}\}/g, () => ids.map(shellQuote).join(" "))
    .replace(/\{\{\s*ids_file\s*\}\}/g, () => shellQuote(idsFile));
}

export class TestShardsAction implements Action {
  readonly kind = "test-shards";
  private readonly output = Container.get(OutputChannelService);
  private readonly partitioner: TestPartitioner;

  constructor(private readonly options: TestShardsOptions) {
    this.partitioner = options.partitioner ?? new TestPartitioner();
  }

  describe(): string {
    return `${this.options.command} (${this.options.shardCount} shard(s))`;
  }

  async execute(context: JobContext, io: StepIO): Promise<ActionResult> {
    const candidates = await this.listCandidates(context, io.signal);
    const filtered = this.options.exclusions
      ? this.options.exclusions.apply(candidates)
      : {kept: candidates, removed: [], removedCount: 0};
    if (filtered.removedCount > 0) {
      this.output.appendLine(`[TestShards] ${io.stepName}: excluded ${filtered.removedCount} of ${candidates.length} test(s)`);
    }

    const shards = this.partitioner.partition(filtered.kept, this.options.snapshot, this.options.shardCount);
    const imbalance = assessBalance(shards, this.options.imbalanceThreshold);
    if (imbalance) {
      io.report.addWarning(`${io.stepName}: ${imbalance.message}`);
      this.output.warn(`[TestShards] ${io.stepName}: ${imbalance.message}`);
    }

    const settled = await Promise.allSettled(shards.map((shard) => this.runShard(shard, context, io)));

    const runs: ShardRun[] = [];
    let firstError: unknown = null;
    for (const entry of settled) {
      if (entry.status === "fulfilled") {
        runs.push(entry.value);
      } else {
        firstError ??= entry.reason;
      }
    }

    // Barrier passed: merge every partial report, shard order.
    const mergedResults: TestResult[] = [];
    let exitCode = 0;
    for (const run of runs) {
      const failuresBefore = io.report.failureCount;
      io.report.merge(run.partial);
      mergedResults.push(...run.partial.results);
      const detail = run.stderr.length > STDERR_DETAIL_LIMIT ? run.stderr.slice(-STDERR_DETAIL_LIMIT) : run.stderr;
      io.report.recordExit(run.source, run.exitCode, failuresBefore, detail);
      if (exitCode === 0 && run.exitCode !== 0) exitCode = run.exitCode;
    }
    context.recordTimings(observedDurations(filtered.kept, mergedResults));

    if (firstError !== null) {
      throw firstError;
    }
    return {exitCode, stdout: "", stderr: runs.map((r) => r.stderr).join("")};
  }

  private async listCandidates(context: JobContext, signal: AbortSignal): Promise<string[]> {
    const {list} = this.options;
    if ("ids" in list) {
      return Array.from(new Set(list.ids));
    }
    const result = await runShell(list.command, {
      shell: context.shell,
      cwd: context.workingDirectory,
      env: context.stepEnvironment(),
      signal,
      killGraceMs: context.killGraceMs,
    });
    if (result.exitCode !== 0) {
      throw new BuildFailure(`Listing tests with "${list.command}" failed: ${result.stderr.trim()}`, result.exitCode);
    }
    const ids = result.stdout
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line !== "");
    return Array.from(new Set(ids));
  }

  private async runShard(shard: Shard, context: JobContext, io: StepIO): Promise<ShardRun> {
    const source = `${io.stepName} [shard ${shard.index + 1}/${shard.total}]`;
    const stream = io.report.openStream(source, io.parser);

    if (shard.ids.length === 0) {
      this.output.appendLine(`[TestShards] ${source}: no tests assigned`);
      return {shard, source, exitCode: 0, stderr: "", partial: stream.end()};
    }

    const dir = await context.createTempDir(`shard-${shard.index}`);
    const idsFile = path.join(dir, "ids.txt");
    await fs.writeFile(idsFile, shard.ids.join("\n") + "\n", "utf-8");

    this.output.appendLine(
      `[TestShards] ${source}: ${shard.ids.length} test(s), expected weight ${shard.weight.toFixed(2)}`,
    );
    try {
      const result = await runShell(renderShardCommand(this.options.command, shard.ids, idsFile), {
        shell: context.shell,
        cwd: context.workingDirectory,
        env: context.stepEnvironment({
          PIPEWRIGHT_SHARD_INDEX: String(shard.index),
          PIPEWRIGHT_SHARD_TOTAL: String(shard.total),
          PIPEWRIGHT_SHARD_IDS_FILE: idsFile,
        }),
        signal: io.signal,
        killGraceMs: context.killGraceMs,
        noOutputTimeoutMs: this.options.noOutputTimeoutMs,
        onStdout: (chunk) => stream.write(chunk),
      });
      return {shard, source, exitCode: result.exitCode, stderr: result.stderr, partial: stream.end()};
    } finally {
      stream.end();
    }
  }
}
