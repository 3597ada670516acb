import Container from "typedi";
import type {ActionResult, BuildConfiguration, BuildDefinition} from "../../shared-types";
import {DeterminismVerifier} from "../determinism/determinism-verifier";
import type {JobContext} from "../scheduler/job-context";
import type {Action, StepIO} from "./action.interface";

/** `verify-determinism` step: build under two configurations and compare the artifacts. */
export class VerifyDeterminismAction implements Action {
  readonly kind = "verify-determinism";

  constructor(
    readonly definition: BuildDefinition,
    readonly configurations: readonly BuildConfiguration[],
    private readonly verifier: DeterminismVerifier = Container.get(DeterminismVerifier),
  ) {}

  describe(): string {
    const names = this.configurations.map((c) => c.name).join(" vs ");
    return `verify ${this.definition.name} is deterministic (${names})`;
  }

  async execute(context: JobContext, io: StepIO): Promise<ActionResult> {
    const stream = io.report.openStream(io.stepName, io.parser);
    try {
      await this.verifier.verify(this.definition, this.configurations, context, {
        signal: io.signal,
        onStdout: (chunk) => stream.write(chunk),
      });
      return {exitCode: 0, stdout: "", stderr: ""};
    } finally {
      io.report.merge(stream.end());
    }
  }
}
