/**
 * Integration tests for JobGraph.
 *
 * Tests:
 *   - Validation of job names and `requires` references
 *   - Topological order and cycle detection
 *   - Dependents and dependency closures
 */

import {describe, expect, it} from "vitest";
import {JobGraph} from "../core-engine/dependency-graph";
import {ConfigError, CycleError} from "../errors";

const PIPELINE = [
  {name: "deploy", requires: ["build", "test"]},
  {name: "build", requires: []},
  {name: "test", requires: ["build"]},
];

describe("JobGraph", () => {
  it("should collect every structural issue into one ConfigError", () => {
    const jobs = [
      {name: "a", requires: []},
      {name: "a", requires: []},
      {name: "b", requires: ["x"]},
    ];

    expect(() => JobGraph.fromJobs(jobs)).toThrow(ConfigError);
    expect(() => JobGraph.fromJobs(jobs)).toThrow(
      'Invalid job graph\n  - duplicate job name "a"\n  - job "b" requires unknown job "x"',
    );
  });

  it("should order jobs after everything they require", () => {
    const graph = JobGraph.fromJobs(PIPELINE);
    expect(graph.topologicalOrder()).toEqual(["build", "test", "deploy"]);
  });

  it("should list dependents in declaration order", () => {
    const graph = JobGraph.fromJobs(PIPELINE);

    expect(graph.getDependents("build")).toEqual(["deploy", "test"]);
    expect(graph.getDependencies("deploy")).toEqual(["build", "test"]);
    expect(graph.getTransitiveDependents("test")).toEqual(["deploy"]);
    expect(graph.getTransitiveDependents("build")).toEqual(["deploy", "test"]);
  });

  it("should compute the dependency closure of a selection", () => {
    const graph = JobGraph.fromJobs(PIPELINE);

    expect(graph.dependencyClosure(["test"])).toEqual(["build", "test"]);
    expect(graph.dependencyClosure(["deploy"])).toEqual(["deploy", "build", "test"]);
    expect(() => graph.dependencyClosure(["nope"])).toThrow('Unknown job selected\n  - "nope"');
  });

  // ─── Cycles ───────────────────────────────────────────────

  it("should name the jobs of a cycle", () => {
    const graph = JobGraph.fromJobs([
      {name: "a", requires: ["b"]},
      {name: "b", requires: ["a"]},
      {name: "c", requires: ["a"]},
    ]);

    let caught: unknown;
    try {
      graph.assertAcyclic();
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(CycleError);
    expect(caught instanceof CycleError ? caught.cycle : []).toEqual(["b", "a", "b"]);
    expect(caught instanceof CycleError ? caught.message : "").toBe("Job dependency cycle detected: b -> a -> b");
  });

  it("should detect a job that requires itself", () => {
    const graph = JobGraph.fromJobs([{name: "solo", requires: ["solo"]}]);
    expect(() => graph.topologicalOrder()).toThrow("Job dependency cycle detected: solo -> solo");
  });
});
