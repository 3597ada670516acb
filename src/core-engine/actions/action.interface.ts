import type {ActionResult, ParserName} from "../../shared-types";
import type {ReportBuilder} from "../reporting/result-aggregator";
import type {JobContext} from "../scheduler/job-context";

/** What a running step can reach besides its job context. */
export interface StepIO {
  readonly stepName: string;
  /** Parser for the step's stdout */
  readonly parser: ParserName;
  /** Aborted when the run is cancelled */
  readonly signal: AbortSignal;
  /** The job's report; actions stream their output into it */
  readonly report: ReportBuilder;
}

/**
 * Common interface for step actions (shell commands, sharded test runs,
 * determinism checks).
 *
 * WHY: The job runner only cares about "run this step and tell me how it
 * exited"; classifying failures by kind happens in one place, the runner.
 * Actions throw a `PipelineError` for failures that are not an exit code
 * (setup, determinism), and resolve with the exit code otherwise.
 */
export interface Action {
  readonly kind: string;

  /** One-line human description, used in logs */
  describe(): string;

  execute(context: JobContext, io: StepIO): Promise<ActionResult>;
}
