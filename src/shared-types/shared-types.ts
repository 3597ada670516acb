// ============================================================
// pipewright shared types — all cross-module TypeScript types
// ============================================================

import type {Action} from "../core-engine/actions/action.interface";

// ─── Failures ───────────────────────────────────────────────

export type FailureKind = "config" | "setup" | "build" | "test" | "determinism";

// ─── Jobs & Steps ──────────────────────────────────────────

export type JobStatus = "pending" | "running" | "success" | "failed" | "blocked" | "cancelled";

export type StepStatus = "success" | "failed" | "skipped";

export type StepCondition = "on_success" | "always";

/** Where and how a job's steps execute. */
export interface ExecutorContext {
  /** Absolute working directory for every step of the job */
  workingDirectory: string;
  /** Environment bindings every step of the job starts with */
  environment: Record<string, string>;
  /** Shell command line used to run `run` steps, e.g. ["/bin/bash", "-eo", "pipefail"] */
  shell: string[];
}

export interface ActionResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface Step {
  name: string;
  action: Action;
  /** Output parser for the step's stdout; `auto` detects it from the output */
  parser: ParserName;
  when: StepCondition;
}

export interface Job {
  /** Unique job name */
  name: string;
  steps: Step[];
  /** Names of jobs that must succeed before this one starts */
  requires: string[];
  /** Shard count for the job's test steps (>= 1) */
  parallelism: number;
  executor: ExecutorContext;
  /** Named resources; jobs sharing one never run at the same time */
  resources: string[];
}

export interface StepOutcome {
  name: string;
  status: StepStatus;
  exitCode: number | null;
  durationMs: number;
  failureKind?: FailureKind;
  message?: string;
}

export interface JobOutcome {
  name: string;
  status: JobStatus;
  /** Most severe failure class that made the job fail */
  failureKind?: FailureKind;
  /** For blocked jobs: the failed upstream job that blocked this one */
  blockedBy?: string;
  message?: string;
  steps: StepOutcome[];
  /** Null when the job never ran, or when a cancelled job's partial report was discarded */
  report: Report | null;
  startedAt?: number;
  finishedAt?: number;
  /** Observed durations (seconds) per partition identifier, for the timing store */
  observedTimings: Record<string, number>;
}

export interface PipelineResult {
  outcomes: JobOutcome[];
  success: boolean;
  cancelled: boolean;
  exitCode: number;
}

// ─── Sharding ───────────────────────────────────────────────

export interface TimingRecord {
  id: string;
  /** Duration in seconds */
  duration: number;
}

/** Read-only view of historical timings, versioned by content hash. */
export interface TimingSnapshot {
  version: string;
  durations: ReadonlyMap<string, number>;
}

export interface Shard {
  index: number;
  total: number;
  ids: string[];
  weight: number;
}

export interface ExclusionResult {
  kept: string[];
  removed: string[];
  removedCount: number;
}

// ─── Results & Reports ──────────────────────────────────────

export type TestStatus = "pass" | "fail" | "skip";

export interface TestResult {
  /** Unique test identifier within a report */
  id: string;
  status: TestStatus;
  /** Duration in seconds */
  duration: number;
  /** Output captured while the test ran */
  output: string;
  /** Suite or class name (package for go-test output) */
  suite?: string;
}

export type ReportStatus = "pass" | "fail";

export interface Report {
  job: string;
  status: ReportStatus;
  results: TestResult[];
  counts: Record<TestStatus, number>;
  /** Lines the parsers could not classify */
  diagnostics: string[];
  /** Advisory warnings (e.g. partition imbalance) */
  warnings: string[];
  /** Diff payloads of determinism violations */
  determinism: DeterminismDiagnostic[];
  /** Exit signal of the execution, when known */
  exitCode: number | null;
  generatedAt: number;
}

/** Results collected from one shard or stream before merging. */
export interface PartialReport {
  source: string;
  results: TestResult[];
  diagnostics: string[];
}

// ─── Output parsers ─────────────────────────────────────────

export type ParserName = "go-test" | "tap" | "plain" | "auto";

export type ParsedLine =
  | {kind: "result"; result: TestResult}
  | {kind: "aux"; line: string}
  | {kind: "noise"};

// ─── Determinism ────────────────────────────────────────────

export interface BuildArtifact {
  bytes: Buffer;
  /** Substrings expected to vary harmlessly between configurations */
  ignorableRegions: string[];
}

export interface DiffHunk {
  /** 1-based inclusive line ranges; an empty side has end = start - 1 */
  leftStart: number;
  leftEnd: number;
  rightStart: number;
  rightEnd: number;
  left: string[];
  right: string[];
}

export interface ArtifactDiff {
  identical: boolean;
  /** Byte offset of the first difference, -1 when identical */
  firstDivergentOffset: number;
  leftLength: number;
  rightLength: number;
  hunks: DiffHunk[];
}

export interface DeterminismDiagnostic {
  step: string;
  configurations: [string, string];
  diff: ArtifactDiff;
}

export interface BuildConfiguration {
  name: string;
  environment: Record<string, string>;
  /** Artifact path, relative to the working directory */
  artifact: string;
  workingDirectory?: string;
  ignorableRegions: string[];
}

export interface BuildDefinition {
  name: string;
  command: string;
  placeholder: string;
}

// ─── Event server ───────────────────────────────────────────

export interface IPCEnvelope<T = unknown> {
  /** Unique message ID for idempotency */
  id: string;
  /** Sequence number for ordering */
  seq: number;
  /** Message type discriminator */
  type: string;
  /** Type-specific payload */
  payload: T;
  /** Unix timestamp */
  timestamp: number;
}

export type IPCMessageType =
  | "pipeline-start"
  | "job-status"
  | "test-result"
  | "pipeline-complete"
  | "cancel-run"
  | "error";
