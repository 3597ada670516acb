/**
 * End-to-end tests: runPipeline and the command line entry points,
 * running real /bin/sh steps in a temporary workspace.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import {afterEach, beforeEach, describe, expect, it, vi} from "vitest";
import {createProgram, runSplit} from "../cli";
import {runPipeline} from "../core-engine/main";
import {cleanup, createTempDir, writeFile} from "./helpers";

const PIPELINE_YAML = `
parameters:
  build_exit:
    type: integer
    default: 0
  record:
    type: boolean
    default: true
settings:
  maxConcurrency: 2
  recordTimings: "<< pipeline.parameters.record >>"
executors:
  default:
    shell: /bin/sh
jobs:
  build:
    steps:
      - run:
          name: compile
          command: "echo built && exit << pipeline.parameters.build_exit >>"
  test:
    requires: [build]
    parallelism: 2
    steps:
      - test-shards:
          name: unit
          list: [a, b, c]
          command: 'for id in {{ids}}; do echo "ok - $id"; done'
          parser: tap
`;

describe("runPipeline", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = createTempDir();
    writeFile(tmpDir, "pipewright.yml", PIPELINE_YAML);
  });

  afterEach(() => {
    cleanup(tmpDir);
  });

  const timingsFile = (): string => path.join(tmpDir, ".pipewright", "timings.json");

  it("should run every job, write reports and record timings", async () => {
    const summary = await runPipeline({workspaceRoot: tmpDir});

    expect(summary.success).toBe(true);
    expect(summary.exitCode).toBe(0);
    expect(summary.outcomes.map((o) => [o.name, o.status])).toEqual([
      ["build", "success"],
      ["test", "success"],
    ]);
    expect(summary.outcomes[0].report?.diagnostics).toEqual(["built"]);
    expect(summary.outcomes[1].report?.results.map((r) => r.id)).toEqual(["a", "c", "b"]);

    const reportDir = path.join(tmpDir, "test-reports");
    expect(summary.reportFiles).toEqual([
      path.join(reportDir, "build.json"),
      path.join(reportDir, "build.xml"),
      path.join(reportDir, "test.json"),
      path.join(reportDir, "test.xml"),
    ]);
    expect(fs.readFileSync(timingsFile(), "utf-8")).toBe(
      '{\n  "timings": {\n    "a": 0,\n    "b": 0,\n    "c": 0\n  }\n}\n',
    );
  });

  it("should block dependents of a failed job and skip their reports", async () => {
    const summary = await runPipeline({workspaceRoot: tmpDir, parameters: {build_exit: "3"}});

    expect(summary.exitCode).toBe(5);
    expect(summary.outcomes.map((o) => [o.name, o.status])).toEqual([
      ["build", "failed"],
      ["test", "blocked"],
    ]);
    expect(summary.reportFiles.map((f) => path.basename(f))).toEqual(["build.json", "build.xml"]);
    expect(fs.existsSync(timingsFile())).toBe(false);
  });

  it("should run only the selected jobs with command line overrides", async () => {
    const summary = await runPipeline({workspaceRoot: tmpDir, jobs: ["build"], reportDir: "out", maxConcurrency: 1});

    expect(summary.plan.jobs.map((j) => j.name)).toEqual(["build"]);
    expect(summary.plan.reportDir).toBe(path.join(tmpDir, "out"));
    expect(fs.existsSync(path.join(tmpDir, "out", "build.json"))).toBe(true);
  });

  it("should not record timings when recording is turned off", async () => {
    const summary = await runPipeline({workspaceRoot: tmpDir, parameters: {record: "false"}});

    expect(summary.success).toBe(true);
    expect(fs.existsSync(timingsFile())).toBe(false);
  });

  it("should cancel everything when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    const summary = await runPipeline({workspaceRoot: tmpDir, signal: controller.signal});

    expect(summary.cancelled).toBe(true);
    expect(summary.exitCode).toBe(130);
    expect(summary.outcomes.map((o) => o.status)).toEqual(["cancelled", "cancelled"]);
    expect(summary.reportFiles).toEqual([]);
    expect(fs.existsSync(timingsFile())).toBe(false);
  });
});

// ─── Command line ───────────────────────────────────────────

describe("cli", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = createTempDir();
  });

  afterEach(() => {
    cleanup(tmpDir);
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it("should split identifiers read from input by count when no timings exist", async () => {
    expect(await runSplit("c\nb\na\n\nb\n", {index: 0, total: 2}, tmpDir)).toEqual(["c", "a"]);
  });

  it("should drop excluded identifiers before splitting", async () => {
    writeFile(tmpDir, "denylist.txt", "c\n");
    const options = {index: 0, total: 2, exclusions: "denylist.txt"};

    expect(await runSplit("c\nb\na\n", options, tmpDir)).toEqual(["b"]);
  });

  it("should balance by recorded timings", async () => {
    writeFile(tmpDir, "timings.json", JSON.stringify({timings: {a: 5}}));
    const options = {index: 1, total: 2, timings: "timings.json"};

    expect(await runSplit("c\nb\na\n", options, tmpDir)).toEqual(["c", "b"]);
  });

  it("should print jobs in execution order", async () => {
    writeFile(tmpDir, "pipewright.yml", PIPELINE_YAML);
    const written: string[] = [];
    vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
      written.push(chunk.toString());
      return true;
    });
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    await createProgram().exitOverride().parseAsync(["node", "pipewright", "graph", "-C", tmpDir]);

    expect(written).toEqual(["build\n", "test (requires build)\n"]);
    expect(process.exitCode).toBe(0);
  });
});
