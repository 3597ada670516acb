/**
 * Pipeline error taxonomy.
 *
 * Every failure the pipeline can classify extends `PipelineError`, which carries
 * the failure `kind` and the process exit code the CLI reports for it.
 */

import type {ArtifactDiff, FailureKind} from "./shared-types";

// ─── Exit codes ─────────────────────────────────────────────

export const EXIT_CODES = {
  success: 0,
  unexpected: 1,
  config: 2,
  setup: 3,
  determinism: 4,
  build: 5,
  test: 6,
  cancelled: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/** Most severe first. Used when several failure classes are present in one run. */
export const FAILURE_SEVERITY: readonly FailureKind[] = ["config", "setup", "determinism", "build", "test"];

export function exitCodeForKind(kind: FailureKind): ExitCode {
  return EXIT_CODES[kind];
}

// ─── Errors ─────────────────────────────────────────────────

export abstract class PipelineError extends Error {
  abstract readonly kind: FailureKind;

  get exitCode(): ExitCode {
    return exitCodeForKind(this.kind);
  }

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Structural problem in the pipeline definition, detected before any job starts. */
export class ConfigError extends PipelineError {
  readonly kind = "config" as const;

  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join("\n  - ")}` : message);
  }
}

/** The job dependency graph contains a cycle. */
export class CycleError extends PipelineError {
  readonly kind = "config" as const;

  constructor(readonly cycle: string[]) {
    super(`Job dependency cycle detected: ${cycle.join(" -> ")}`);
  }
}

/** Provisioning a job (temp dirs, working directory, environment) failed. */
export class SetupFailure extends PipelineError {
  readonly kind = "setup" as const;
}

/** A build step exited nonzero. */
export class BuildFailure extends PipelineError {
  readonly kind = "build" as const;

  constructor(
    message: string,
    readonly stepExitCode: number | null = null,
  ) {
    super(message);
  }
}

/** One or more test results failed. */
export class TestFailure extends PipelineError {
  readonly kind = "test" as const;

  constructor(readonly failedIds: string[]) {
    super(`${failedIds.length} test(s) failed`);
  }
}

/** Normalized build artifacts differ between two configurations. */
export class DeterminismViolation extends PipelineError {
  readonly kind = "determinism" as const;

  constructor(
    readonly diff: ArtifactDiff,
    readonly configurations: [string, string],
  ) {
    super(
      `Build output differs between "${configurations[0]}" and "${configurations[1]}" ` +
        `(first divergence at byte ${diff.firstDivergentOffset}, ${diff.hunks.length} hunk(s))`,
    );
  }
}

/**
 * Shard weights are skewed beyond the advisory threshold.
 * Never thrown; recorded as a report warning.
 */
export class PartitionImbalance {
  readonly name = "PartitionImbalance";

  constructor(
    readonly maxWeight: number,
    readonly meanWeight: number,
    readonly threshold: number,
  ) {}

  get message(): string {
    return (
      `Heaviest shard weighs ${this.maxWeight.toFixed(2)}, ` +
      `${(this.maxWeight / this.meanWeight).toFixed(2)}x the mean ${this.meanWeight.toFixed(2)} ` +
      `(threshold ${this.threshold}x)`
    );
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
