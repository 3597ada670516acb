// ============================================================
// DeterminismVerifier — Builds twice, compares normalized bytes.
//
// WHY: Two alternate build configurations must produce the same
// artifact once the regions expected to vary (paths, stamps)
// are masked. Each build is an independent action with its own
// environment, working directory and artifact path; both must
// succeed before anything is compared.
// ============================================================

import * as fs from "node:fs/promises";
import * as path from "node:path";
import Container, {Service} from "typedi";
import {BuildFailure, ConfigError, DeterminismViolation, describeError} from "../../errors";
import {OutputChannelService} from "../../output-channel.service";
import type {ActionResult, ArtifactDiff, BuildArtifact, BuildConfiguration, BuildDefinition} from "../../shared-types";
import {runShell} from "../actions/shell";
import type {JobContext} from "../scheduler/job-context";
import {diffArtifacts} from "./artifact-diff";
import {normalizeArtifact} from "./normalizer";

export interface BuildIO {
  signal: AbortSignal;
  onStdout?: (chunk: string) => void;
}

/** Runs one build of `definition` under `config`. */
export type BuildRunner = (
  definition: BuildDefinition,
  config: BuildConfiguration,
  context: JobContext,
  io: BuildIO,
) => Promise<ActionResult>;

export const shellBuildRunner: BuildRunner = (definition, config, context, io) =>
  runShell(definition.command, {
    shell: context.shell,
    cwd: context.resolvePath(config.workingDirectory),
    env: context.stepEnvironment(config.environment),
    signal: io.signal,
    killGraceMs: context.killGraceMs,
    onStdout: io.onStdout,
  });

@Service()
export class DeterminismVerifier {
  private readonly output = Container.get(OutputChannelService);
  private buildRunner: BuildRunner = shellBuildRunner;

  useBuildRunner(runner: BuildRunner): void {
    this.buildRunner = runner;
  }

  /**
   * @returns the (identical) diff when both normalized artifacts match.
   * @throws ConfigError unless exactly two configurations are given.
   * @throws BuildFailure when a build fails or its artifact cannot be read.
   * @throws DeterminismViolation when the normalized artifacts differ.
   */
  async verify(
    definition: BuildDefinition,
    configs: readonly BuildConfiguration[],
    context: JobContext,
    io: BuildIO,
  ): Promise<ArtifactDiff> {
    if (configs.length !== 2) {
      throw new ConfigError(
        `Determinism check "${definition.name}" needs exactly two configurations, got ${configs.length}`,
      );
    }
    const [first, second] = configs;

    const left = await this.build(definition, first, context, io);
    const right = await this.build(definition, second, context, io);

    const diff = diffArtifacts(
      normalizeArtifact(left.bytes, left.ignorableRegions, definition.placeholder),
      normalizeArtifact(right.bytes, right.ignorableRegions, definition.placeholder),
    );
    if (!diff.identical) {
      throw new DeterminismViolation(diff, [first.name, second.name]);
    }

    this.output.appendLine(
      `[Determinism] ${definition.name}: "${first.name}" and "${second.name}" match (${left.bytes.length} bytes)`,
    );
    return diff;
  }

  /** Build under one configuration and read its artifact right away. */
  private async build(
    definition: BuildDefinition,
    config: BuildConfiguration,
    context: JobContext,
    io: BuildIO,
  ): Promise<BuildArtifact> {
    this.output.appendLine(`[Determinism] Building ${definition.name} with configuration "${config.name}"`);
    const result = await this.buildRunner(definition, config, context, io);
    if (result.exitCode !== 0) {
      throw new BuildFailure(
        `Build "${definition.name}" failed under configuration "${config.name}" with exit code ${result.exitCode}`,
        result.exitCode,
      );
    }

    const artifactPath = path.resolve(context.resolvePath(config.workingDirectory), config.artifact);
    try {
      const bytes = await fs.readFile(artifactPath);
      return {bytes, ignorableRegions: config.ignorableRegions};
    } catch (error) {
      throw new BuildFailure(
        `Build "${definition.name}" under "${config.name}" left no readable artifact at ${artifactPath}: ${describeError(error)}`,
      );
    }
  }
}
