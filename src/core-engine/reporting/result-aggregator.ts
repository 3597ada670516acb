// ============================================================
// ResultAggregator — Turns raw execution output into Reports.
//
// WHY: Shards and steps write interleaved framework text. Each
// stream gets its own parser and partial report; the job's
// ReportBuilder merges partials by union. Producing a report
// never decides the job's fate on its own: the exit signal of
// the execution is carried through to the final status.
// ============================================================

import Container, {Service} from "typedi";
import {OutputChannelService} from "../../output-channel.service";
import type {
  DeterminismDiagnostic,
  ParsedLine,
  ParserName,
  PartialReport,
  Report,
  ReportStatus,
  TestResult,
  TestStatus,
} from "../../shared-types";
import {AdapterAutoDetector, type OutputParser} from "../../test-adapters";

export interface ReportHooks {
  onTestResult?: (job: string, result: TestResult) => void;
}

const STATUS_RANK: Record<TestStatus, number> = {skip: 0, pass: 1, fail: 2};

/**
 * Job-level status from the execution's exit signal and its results.
 * A nonzero exit is a failure even when every parsed result passed;
 * a failed result is a failure even when the exit signal says 0 (a pipe
 * through `tee` hides the real exit code).
 */
export function deriveStatus(exitCode: number | null, results: readonly TestResult[]): ReportStatus {
  if (exitCode !== null && exitCode !== 0) {
    return "fail";
  }
  return results.some((r) => r.status === "fail") ? "fail" : "pass";
}

// ─── OutputStream ───────────────────────────────────────────

/**
 * One stream of raw output (a step's stdout, a shard's stdout).
 * Chunks may split lines anywhere; partial lines are buffered.
 */
export class OutputStream {
  private partialLine = "";
  private ended = false;
  private readonly partial: PartialReport;

  constructor(
    readonly source: string,
    private readonly parser: OutputParser,
    private readonly onResult?: (result: TestResult) => void,
  ) {
    this.partial = {source, results: [], diagnostics: []};
  }

  write(chunk: string | Buffer): void {
    if (this.ended) {
      return;
    }
    const text = this.partialLine + chunk.toString();
    const lines = text.split("\n");
    this.partialLine = lines.pop() ?? "";
    for (const line of lines) {
      this.consume(this.parser.parseLine(line.replace(/\r$/, "")));
    }
  }

  /** Flush buffered text and return this stream's private partial report. */
  end(): PartialReport {
    if (!this.ended) {
      this.ended = true;
      if (this.partialLine !== "") {
        this.consume(this.parser.parseLine(this.partialLine.replace(/\r$/, "")));
        this.partialLine = "";
      }
      this.consume(this.parser.flush());
    }
    return this.partial;
  }

  private consume(parsed: ParsedLine[]): void {
    for (const entry of parsed) {
      if (entry.kind === "result") {
        this.partial.results.push(entry.result);
        this.onResult?.(entry.result);
      } else if (entry.kind === "aux") {
        this.partial.diagnostics.push(entry.line);
      }
    }
  }
}

// ─── ReportBuilder ──────────────────────────────────────────

/**
 * Append-only accumulator for one job's report. Merges from different
 * shards may interleave in any order.
 */
export class ReportBuilder {
  private readonly results = new Map<string, TestResult>();
  private readonly diagnostics: string[] = [];
  private readonly warnings: string[] = [];
  private readonly determinism: DeterminismDiagnostic[] = [];

  constructor(
    readonly job: string,
    private readonly hooks: ReportHooks,
  ) {}

  openStream(source: string, parser: ParserName): OutputStream {
    return new OutputStream(source, AdapterAutoDetector.create(parser), (result) =>
      this.hooks.onTestResult?.(this.job, result),
    );
  }

  /** Union of a partial report into the job report. */
  merge(partial: PartialReport): void {
    for (const result of partial.results) {
      this.addResult(result);
    }
    this.diagnostics.push(...partial.diagnostics);
  }

  /** Classify a result; an identifier seen twice keeps the worse status. */
  addResult(result: TestResult): void {
    const existing = this.results.get(result.id);
    if (!existing) {
      this.results.set(result.id, result);
      return;
    }
    this.diagnostics.push(`duplicate result for "${result.id}": ${existing.status} then ${result.status}`);
    if (STATUS_RANK[result.status] > STATUS_RANK[existing.status]) {
      this.results.set(result.id, result);
    }
  }

  addWarning(message: string): void {
    this.warnings.push(message);
  }

  addDeterminismDiagnostic(diagnostic: DeterminismDiagnostic): void {
    this.determinism.push(diagnostic);
  }

  get failedIds(): string[] {
    return this.resultList.filter((r) => r.status === "fail").map((r) => r.id);
  }

  get failureCount(): number {
    return this.failedIds.length;
  }

  get resultList(): TestResult[] {
    return Array.from(this.results.values());
  }

  /**
   * Keep a nonzero exit visible: when `source` exited nonzero and added no
   * failed result since `failuresBefore`, record a failed result named after it.
   * Returns true when a synthetic result was recorded.
   */
  recordExit(source: string, exitCode: number, failuresBefore: number, detail = ""): boolean {
    if (exitCode === 0 || this.failureCount > failuresBefore) {
      return false;
    }
    const output = [`exited with code ${exitCode}`, detail.trim()].filter((s) => s !== "").join("\n");
    this.addResult({id: source, status: "fail", duration: 0, output});
    return true;
  }

  /** Status follows `deriveStatus`: a nonzero exit fails the report whatever was parsed. */
  finalize(exitCode: number | null): Report {
    const results = this.resultList;
    const counts: Record<TestStatus, number> = {pass: 0, fail: 0, skip: 0};
    for (const result of results) {
      counts[result.status]++;
    }
    return {
      job: this.job,
      status: deriveStatus(exitCode, results),
      results,
      counts,
      diagnostics: [...this.diagnostics],
      warnings: [...this.warnings],
      determinism: [...this.determinism],
      exitCode,
      generatedAt: Date.now(),
    };
  }
}

// ─── ResultAggregator ───────────────────────────────────────

@Service()
export class ResultAggregator {
  private readonly output = Container.get(OutputChannelService);
  private hooks: ReportHooks = {};

  hookIntoLifecycle(hooks: ReportHooks): void {
    this.hooks = hooks;
  }

  createReport(job: string): ReportBuilder {
    this.output.debug(`[ResultAggregator] Opened report for job: ${job}`);
    return new ReportBuilder(job, this.hooks);
  }
}
