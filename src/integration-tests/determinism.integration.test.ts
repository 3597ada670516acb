/**
 * Integration tests for the build determinism check.
 *
 * Tests:
 *   - Normalizing ignorable regions
 *   - Line-level diffs of differing artifacts
 *   - DeterminismVerifier with a fake and a real shell build
 *   - Determinism failures classified by the job runner
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import Container from "typedi";
import {afterEach, beforeEach, describe, expect, it} from "vitest";
import {VerifyDeterminismAction} from "../core-engine/actions";
import {
  type BuildRunner,
  DeterminismVerifier,
  diffArtifacts,
  normalizeArtifact,
} from "../core-engine/determinism";
import {JobContext, JobScheduler} from "../core-engine/scheduler";
import {BuildFailure, ConfigError, DeterminismViolation} from "../errors";
import type {BuildConfiguration, BuildDefinition} from "../shared-types";
import {cleanup, createTempDir, fakeJob, fakeStep} from "./helpers";

const DEFINITION: BuildDefinition = {name: "bundle", command: "make bundle", placeholder: "<normalized>"};

function configuration(name: string): BuildConfiguration {
  return {
    name,
    environment: {SRC: `/src/${name}`},
    artifact: `out-${name}.txt`,
    ignorableRegions: [`/src/${name}`],
  };
}

const CONFIGS = [configuration("a"), configuration("b")];
const SIGNAL = new AbortController().signal;

// ─── Normalizer ─────────────────────────────────────────────

describe("normalizeArtifact", () => {
  it("should prefer the longest region at each position", () => {
    const bytes = Buffer.from("built at /tmp/a1 on /tmp/a1/x");
    const normalized = normalizeArtifact(bytes, ["/tmp/a1", "/tmp/a1/x"], "<p>");

    expect(normalized.toString()).toBe("built at <p> on <p>");
  });

  it("should match regions literally", () => {
    const bytes = Buffer.from("v1.2 (beta) v1x2 (beta)");
    expect(normalizeArtifact(bytes, ["v1.2 (beta)"], "@").toString()).toBe("@ v1x2 (beta)");
  });

  it("should not rescan inserted placeholders", () => {
    expect(normalizeArtifact(Buffer.from("xa"), ["a"], "aa").toString()).toBe("xaa");
  });

  it("should ignore empty regions", () => {
    expect(normalizeArtifact(Buffer.from("axb"), [""], "P").toString()).toBe("axb");
  });
});

// ─── Diff ───────────────────────────────────────────────────

describe("diffArtifacts", () => {
  it("should report identical artifacts without hunks", () => {
    expect(diffArtifacts(Buffer.from("a\nb"), Buffer.from("a\nb"))).toEqual({
      identical: true,
      firstDivergentOffset: -1,
      leftLength: 3,
      rightLength: 3,
      hunks: [],
    });
  });

  it("should emit one hunk per run of differing lines when line counts match", () => {
    const diff = diffArtifacts(Buffer.from("one\ntwo\nthree\nfour\n"), Buffer.from("one\nTWO\nthree\nFOUR\n"));

    expect(diff.identical).toBe(false);
    expect(diff.firstDivergentOffset).toBe(4);
    expect(diff.leftLength).toBe(19);
    expect(diff.hunks).toEqual([
      {leftStart: 2, leftEnd: 2, rightStart: 2, rightEnd: 2, left: ["two"], right: ["TWO"]},
      {leftStart: 4, leftEnd: 4, rightStart: 4, rightEnd: 4, left: ["four"], right: ["FOUR"]},
    ]);
  });

  it("should collapse the middle into one hunk when line counts differ", () => {
    const diff = diffArtifacts(Buffer.from("a\nb\nc\n"), Buffer.from("a\nb\nx\ny\nc\n"));

    expect(diff.firstDivergentOffset).toBe(4);
    expect(diff.leftLength).toBe(6);
    expect(diff.rightLength).toBe(10);
    expect(diff.hunks).toEqual([{leftStart: 3, leftEnd: 2, rightStart: 3, rightEnd: 4, left: [], right: ["x", "y"]}]);
  });
});

// ─── Verifier ───────────────────────────────────────────────

describe("DeterminismVerifier", () => {
  let tmpDir: string;
  let context: JobContext;
  let verifier: DeterminismVerifier;
  let built: string[];

  /** Writes `output(config)` to the configuration's artifact. */
  function fakeBuild(output: (config: BuildConfiguration) => string | null, exitCode = 0): BuildRunner {
    return async (_definition, config) => {
      built.push(config.name);
      const content = output(config);
      if (content !== null) {
        await fs.writeFile(path.join(tmpDir, config.artifact), content);
      }
      return {exitCode, stdout: "", stderr: ""};
    };
  }

  beforeEach(async () => {
    tmpDir = createTempDir();
    built = [];
    context = await JobContext.provision(
      fakeJob("determinism", [], {executor: {workingDirectory: tmpDir, environment: {}, shell: ["/bin/sh"]}}),
      {killGraceMs: 100, baseEnvironment: {}},
    );
    verifier = Container.get(DeterminismVerifier);
  });

  afterEach(async () => {
    await context.dispose();
    cleanup(tmpDir);
  });

  it("should accept artifacts that match after normalization", async () => {
    verifier.useBuildRunner(fakeBuild((config) => `output built in ${config.environment.SRC}\n`));

    const diff = await verifier.verify(DEFINITION, CONFIGS, context, {signal: SIGNAL});

    expect(diff.identical).toBe(true);
    expect(built).toEqual(["a", "b"]);
  });

  it("should raise a violation carrying the diff when artifacts differ", async () => {
    verifier.useBuildRunner(
      fakeBuild((config) => `output built in ${config.environment.SRC}\n${config.name === "b" ? "extra\n" : ""}`),
    );

    let caught: unknown;
    try {
      await verifier.verify(DEFINITION, CONFIGS, context, {signal: SIGNAL});
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(DeterminismViolation);
    if (!(caught instanceof DeterminismViolation)) return;
    expect(caught.configurations).toEqual(["a", "b"]);
    expect(caught.diff.hunks).toEqual([
      {leftStart: 2, leftEnd: 1, rightStart: 2, rightEnd: 2, left: [], right: ["extra"]},
    ]);
  });

  it("should fail as a build failure without building the second configuration", async () => {
    verifier.useBuildRunner(fakeBuild(() => "x", 2));

    await expect(verifier.verify(DEFINITION, CONFIGS, context, {signal: SIGNAL})).rejects.toThrow(
      new BuildFailure('Build "bundle" failed under configuration "a" with exit code 2'),
    );
    expect(built).toEqual(["a"]);
  });

  it("should fail as a build failure when the artifact is missing", async () => {
    verifier.useBuildRunner(fakeBuild(() => null));

    await expect(verifier.verify(DEFINITION, CONFIGS, context, {signal: SIGNAL})).rejects.toThrow(
      /Build "bundle" under "a" left no readable artifact at/,
    );
  });

  it("should require exactly two configurations", async () => {
    await expect(verifier.verify(DEFINITION, [CONFIGS[0]], context, {signal: SIGNAL})).rejects.toBeInstanceOf(
      ConfigError,
    );
  });

  it("should build through the job's shell by default", async () => {
    const definition: BuildDefinition = {...DEFINITION, command: `printf 'root=%s\\n' "$SRC" > "out-$NAME.txt"`};
    const configs = ["a", "b"].map(
      (name): BuildConfiguration => ({...configuration(name), environment: {SRC: `/src/${name}`, NAME: name}}),
    );

    const diff = await verifier.verify(definition, configs, context, {signal: SIGNAL});

    expect(diff.identical).toBe(true);
    expect(await fs.readFile(path.join(tmpDir, "out-b.txt"), "utf-8")).toBe("root=/src/b\n");
  });
});

// ─── Job integration ────────────────────────────────────────

describe("VerifyDeterminismAction", () => {
  it("should fail the job with a determinism failure and attach the diff to its report", async () => {
    const tmpDir = createTempDir();
    try {
      const verifier = Container.get(DeterminismVerifier);
      verifier.useBuildRunner(async (_definition, config) => {
        await fs.writeFile(path.join(tmpDir, config.artifact), `stamp ${config.name}\n`);
        return {exitCode: 0, stdout: "", stderr: ""};
      });
      const action = new VerifyDeterminismAction(DEFINITION, CONFIGS, verifier);
      const job = fakeJob("repro", [fakeStep("verify", action)], {
        executor: {workingDirectory: tmpDir, environment: {}, shell: ["/bin/sh"]},
      });

      const result = await new JobScheduler({maxConcurrency: 1, gracePeriodMs: 1000, killGraceMs: 100}).run([job]);
      const outcome = result.outcomes[0];

      expect(action.describe()).toBe("verify bundle is deterministic (a vs b)");
      expect(result.exitCode).toBe(4);
      expect(outcome.failureKind).toBe("determinism");
      expect(outcome.report?.determinism).toHaveLength(1);
      expect(outcome.report?.determinism[0].configurations).toEqual(["a", "b"]);
      expect(outcome.report?.determinism[0].diff.hunks[0]).toMatchObject({left: ["stamp a"], right: ["stamp b"]});
      expect(outcome.report?.results.map((r) => [r.id, r.status])).toEqual([["verify", "fail"]]);
    } finally {
      cleanup(tmpDir);
    }
  });
});
