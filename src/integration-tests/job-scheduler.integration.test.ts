/**
 * Integration tests for JobScheduler and JobRunner.
 *
 * Tests:
 *   - Dependency order, concurrency limit and shared resources
 *   - Blocking downstream jobs after a failure
 *   - Step failure classes (test, build, setup) and `when: always` steps
 *   - Environment exported between steps of one job
 *   - Cancellation with and without a settled partial report
 */

import {existsSync, readFileSync} from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import Container from "typedi";
import {describe, expect, it} from "vitest";
import {ShellAction} from "../core-engine/actions";
import {JobScheduler, pipelineExitCode, type SchedulerOptions, WorkerPool} from "../core-engine/scheduler";
import {CycleError} from "../errors";
import {OutputChannelService} from "../output-channel.service";
import type {ActionResult, JobOutcome, JobStatus} from "../shared-types";
import {cleanup, createTempDir, delay, emitting, FakeAction, fakeJob, fakeStep} from "./helpers";

const OPTIONS: SchedulerOptions = {maxConcurrency: 2, gracePeriodMs: 1000, killGraceMs: 100};
const OK: ActionResult = {exitCode: 0, stdout: "", stderr: ""};

// ─── Helpers ────────────────────────────────────────────────

/** Action that logs start/end events and takes `ms` to finish. */
function timed(name: string, events: string[], ms = 30): FakeAction {
  return new FakeAction(async () => {
    events.push(`start:${name}`);
    await delay(ms);
    events.push(`end:${name}`);
    return OK;
  });
}

/** Action that tracks how many instances run at once. */
function counting(state: {active: number; max: number}, ms = 30): FakeAction {
  return new FakeAction(async () => {
    state.active++;
    state.max = Math.max(state.max, state.active);
    await delay(ms);
    state.active--;
    return OK;
  });
}

function outcomeOf(outcomes: JobOutcome[], name: string): JobOutcome | undefined {
  return outcomes.find((o) => o.name === name);
}

// ─── Ordering & concurrency ─────────────────────────────────

describe("JobScheduler", () => {
  it("should start dependents only after their requirement succeeded", async () => {
    const events: string[] = [];
    const jobs = [
      fakeJob("A", [fakeStep("a", timed("A", events))]),
      fakeJob("B", [fakeStep("b", timed("B", events))], {requires: ["A"]}),
      fakeJob("C", [fakeStep("c", timed("C", events))], {requires: ["A"]}),
    ];

    const result = await new JobScheduler(OPTIONS).run(jobs);

    expect(result.success).toBe(true);
    expect(result.exitCode).toBe(0);
    expect(result.outcomes.map((o) => o.status)).toEqual(["success", "success", "success"]);
    expect(events.slice(0, 2)).toEqual(["start:A", "end:A"]);
    expect(events.slice(2, 4).sort()).toEqual(["start:B", "start:C"]);
  });

  it("should never run more jobs than the concurrency limit", async () => {
    const state = {active: 0, max: 0};
    const jobs = ["one", "two", "three", "four"].map((name) => fakeJob(name, [fakeStep(name, counting(state))]));

    const result = await new JobScheduler({...OPTIONS, maxConcurrency: 1}).run(jobs);

    expect(result.success).toBe(true);
    expect(state.max).toBe(1);
  });

  it("should run jobs in parallel up to the limit", async () => {
    const state = {active: 0, max: 0};
    const jobs = ["one", "two", "three"].map((name) => fakeJob(name, [fakeStep(name, counting(state, 50))]));

    await new JobScheduler({...OPTIONS, maxConcurrency: 3}).run(jobs);

    expect(state.max).toBe(3);
  });

  it("should serialise jobs that share a resource", async () => {
    const state = {active: 0, max: 0};
    const jobs = [
      fakeJob("migrate", [fakeStep("m", counting(state))], {resources: ["db"]}),
      fakeJob("seed", [fakeStep("s", counting(state))], {resources: ["db"]}),
    ];

    const result = await new JobScheduler(OPTIONS).run(jobs);

    expect(result.success).toBe(true);
    expect(state.max).toBe(1);
  });

  it("should reject a cyclic pipeline before running anything", async () => {
    const action = new FakeAction();
    const jobs = [
      fakeJob("A", [fakeStep("a", action)], {requires: ["B"]}),
      fakeJob("B", [fakeStep("b", action)], {requires: ["A"]}),
    ];

    await expect(new JobScheduler(OPTIONS).run(jobs)).rejects.toBeInstanceOf(CycleError);
    expect(action.calls).toBe(0);
  });

  it("should report job status transitions through the hook", async () => {
    const seen: Array<[string, JobStatus]> = [];
    const scheduler = new JobScheduler(OPTIONS, {onJobStatus: (job, status) => seen.push([job, status])});

    await scheduler.run([fakeJob("only", [fakeStep("s", new FakeAction())])]);

    expect(seen).toEqual([
      ["only", "running"],
      ["only", "success"],
    ]);
  });

  // ─── Failures ───────────────────────────────────────────

  it("should block everything downstream of a failed job and keep independent jobs running", async () => {
    const downstream = new FakeAction();
    const jobs = [
      fakeJob("A", [fakeStep("a", new FakeAction(() => ({exitCode: 1, stdout: "", stderr: ""})))]),
      fakeJob("B", [fakeStep("b", downstream)], {requires: ["A"]}),
      fakeJob("C", [fakeStep("c", downstream)], {requires: ["B"]}),
      fakeJob("D", [fakeStep("d", new FakeAction())]),
    ];

    const result = await new JobScheduler(OPTIONS).run(jobs);

    expect(result.success).toBe(false);
    expect(result.exitCode).toBe(5);
    expect(result.outcomes.map((o) => [o.name, o.status, o.blockedBy])).toEqual([
      ["A", "failed", undefined],
      ["B", "blocked", "A"],
      ["C", "blocked", "A"],
      ["D", "success", undefined],
    ]);
    expect(outcomeOf(result.outcomes, "A")?.failureKind).toBe("build");
    expect(downstream.calls).toBe(0);
  });

  it("should keep running later steps after a test failure", async () => {
    const after = new FakeAction();
    const job = fakeJob("unit", [
      fakeStep("tests", emitting("not ok 1 - broken\n", 1), {parser: "tap"}),
      fakeStep("coverage", after),
    ]);

    const result = await new JobScheduler(OPTIONS).run([job]);
    const outcome = outcomeOf(result.outcomes, "unit");

    expect(result.exitCode).toBe(6);
    expect(outcome?.status).toBe("failed");
    expect(outcome?.failureKind).toBe("test");
    expect(outcome?.steps.map((s) => [s.name, s.status, s.failureKind])).toEqual([
      ["tests", "failed", "test"],
      ["coverage", "success", undefined],
    ]);
    expect(outcome?.steps[0].message).toBe("1 test(s) failed");
    expect(outcome?.report?.results).toEqual([{id: "broken", status: "fail", duration: 0, output: ""}]);
    expect(outcome?.report?.exitCode).toBe(1);
    expect(after.calls).toBe(1);
  });

  it("should fail a job whose output reports a failed test even when the step exits 0", async () => {
    const job = fakeJob("piped", [fakeStep("tests", emitting("not ok 1 - x\n", 0), {parser: "tap"})]);

    const result = await new JobScheduler(OPTIONS).run([job]);
    const outcome = outcomeOf(result.outcomes, "piped");

    expect(result.exitCode).toBe(6);
    expect(outcome?.status).toBe("failed");
    expect(outcome?.failureKind).toBe("test");
    expect(outcome?.report?.status).toBe("fail");
    expect(outcome?.report?.exitCode).toBe(0);
  });

  it("should stop after a build failure but still run `always` steps", async () => {
    const skipped = new FakeAction();
    const notify = new FakeAction();
    const job = fakeJob("build", [
      fakeStep("compile", new FakeAction(() => ({exitCode: 2, stdout: "", stderr: "syntax error\n"}))),
      fakeStep("test", skipped),
      fakeStep("notify", notify, {when: "always"}),
    ]);

    const result = await new JobScheduler(OPTIONS).run([job]);
    const outcome = outcomeOf(result.outcomes, "build");

    expect(outcome?.failureKind).toBe("build");
    expect(outcome?.message).toBe("compile: exited with code 2");
    expect(outcome?.steps.map((s) => s.status)).toEqual(["failed", "skipped", "success"]);
    expect(outcome?.report?.results).toEqual([
      {id: "compile", status: "fail", duration: 0, output: "exited with code 2\nsyntax error"},
    ]);
    expect(skipped.calls).toBe(0);
    expect(notify.calls).toBe(1);
  });

  it("should classify an unexpected exception as a setup failure", async () => {
    const job = fakeJob("flaky", [
      fakeStep(
        "explode",
        new FakeAction(() => {
          throw new Error("kaboom");
        }),
      ),
    ]);

    const result = await new JobScheduler(OPTIONS).run([job]);
    const outcome = outcomeOf(result.outcomes, "flaky");

    expect(result.exitCode).toBe(3);
    expect(outcome?.failureKind).toBe("setup");
    expect(outcome?.steps[0]).toMatchObject({status: "failed", exitCode: null, message: "kaboom"});
    expect(outcome?.report?.results.map((r) => [r.id, r.status, r.output])).toEqual([["explode", "fail", "kaboom"]]);
  });

  it("should fail setup when the working directory does not exist", async () => {
    const action = new FakeAction();
    const job = fakeJob("nowhere", [fakeStep("s", action)], {
      executor: {workingDirectory: "/definitely/not/here", environment: {}, shell: ["/bin/sh"]},
    });

    const result = await new JobScheduler(OPTIONS).run([job]);
    const outcome = outcomeOf(result.outcomes, "nowhere");

    expect(outcome?.failureKind).toBe("setup");
    expect(outcome?.steps[0].status).toBe("skipped");
    expect(outcome?.report?.results[0].id).toBe("nowhere setup");
    expect(action.calls).toBe(0);
  });

  // ─── Environment ──────────────────────────────────────────

  it("should pass exported variables to later steps of the same job only", async () => {
    const seen: Record<string, string | undefined> = {};
    const exporter = new FakeAction(async (context) => {
      await fs.appendFile(context.envFile, "VERSION=1.2.3\n");
      return OK;
    });
    const reader = (key: string) =>
      new FakeAction((context) => {
        seen[key] = context.environment.VERSION;
        seen[`${key}:stage`] = context.stepEnvironment().STAGE;
        seen[`${key}:job`] = context.stepEnvironment().PIPEWRIGHT_JOB;
        return OK;
      });
    const jobs = [
      fakeJob("first", [fakeStep("export", exporter), fakeStep("read", reader("first"))], {
        executor: {workingDirectory: process.cwd(), environment: {STAGE: "ci"}, shell: ["/bin/sh"]},
      }),
      fakeJob("second", [fakeStep("read", reader("second"))], {requires: ["first"]}),
    ];

    const result = await new JobScheduler({...OPTIONS, baseEnvironment: {}}).run(jobs);

    expect(result.success).toBe(true);
    expect(seen).toEqual({
      first: "1.2.3",
      "first:stage": "ci",
      "first:job": "first",
      second: undefined,
      "second:stage": undefined,
      "second:job": "second",
    });
  });

  // ─── Cancellation ─────────────────────────────────────────

  it("should cancel pending jobs and keep the report of a job that settles in time", async () => {
    const controller = new AbortController();
    const downstream = new FakeAction();
    const waitForAbort = new FakeAction(
      (_context, io) =>
        new Promise<ActionResult>((resolve) => {
          io.signal.addEventListener("abort", () => resolve({exitCode: 143, stdout: "", stderr: ""}), {once: true});
          setTimeout(() => controller.abort(), 10);
        }),
    );
    const jobs = [
      fakeJob("long", [fakeStep("wait", waitForAbort)]),
      fakeJob("later", [fakeStep("never", downstream)], {requires: ["long"]}),
    ];

    const result = await new JobScheduler({...OPTIONS, signal: controller.signal}).run(jobs);
    const long = outcomeOf(result.outcomes, "long");
    const later = outcomeOf(result.outcomes, "later");

    expect(result.cancelled).toBe(true);
    expect(result.exitCode).toBe(130);
    expect(long?.status).toBe("cancelled");
    expect(long?.report).not.toBeNull();
    expect(long?.steps[0].message).toBe("cancelled");
    expect(later?.status).toBe("cancelled");
    expect(later?.message).toBe("cancelled before start");
    expect(downstream.calls).toBe(0);
  });

  it("should discard the report of a job that does not settle within the grace period", async () => {
    const controller = new AbortController();
    const stubborn = new FakeAction(async () => {
      controller.abort();
      await delay(200);
      return OK;
    });

    const result = await new JobScheduler({...OPTIONS, gracePeriodMs: 20, signal: controller.signal}).run([
      fakeJob("stubborn", [fakeStep("ignore", stubborn)]),
    ]);
    const outcome = outcomeOf(result.outcomes, "stubborn");

    expect(result.cancelled).toBe(true);
    expect(outcome?.status).toBe("cancelled");
    expect(outcome?.report).toBeNull();
    expect(outcome?.message).toBe("did not settle within the grace period");
  });

  it("should kill a shell step that ignores SIGTERM once the grace period expires", async () => {
    const dir = createTempDir();
    try {
      const controller = new AbortController();
      const envPathFile = path.join(dir, "env-path");
      const marker = path.join(dir, "marker");
      const action = new ShellAction(
        `echo "$PIPEWRIGHT_ENV" > "${envPathFile}"; trap '' TERM; sleep 1; touch "${marker}"`,
      );
      setTimeout(() => controller.abort(), 150);

      const started = Date.now();
      const result = await new JobScheduler({
        ...OPTIONS,
        gracePeriodMs: 50,
        killGraceMs: 5000,
        signal: controller.signal,
      }).run([fakeJob("stubborn", [fakeStep("sleep", action)])]);
      const elapsed = Date.now() - started;

      expect(outcomeOf(result.outcomes, "stubborn")?.status).toBe("cancelled");
      expect(elapsed).toBeLessThan(900);
      const scratch = path.dirname(readFileSync(envPathFile, "utf-8").trim());
      expect(existsSync(scratch)).toBe(false);

      await delay(1200);
      expect(existsSync(marker)).toBe(false);
    } finally {
      cleanup(dir);
    }
  });

  it("should fail the report of a step killed by cancellation", async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 150);

    const result = await new JobScheduler({...OPTIONS, gracePeriodMs: 3000, signal: controller.signal}).run([
      fakeJob("slow", [fakeStep("sleep", new ShellAction("sleep 5"))]),
    ]);
    const outcome = outcomeOf(result.outcomes, "slow");

    expect(outcome?.status).toBe("cancelled");
    expect(outcome?.report?.status).toBe("fail");
    expect(outcome?.report?.exitCode).toBe(143);
    expect(outcome?.report?.results).toEqual([
      {id: "sleep", status: "fail", duration: 0, output: "exited with code 143\ncancelled"},
    ]);
  });

  it("should keep the outcome of a job that finished as the run was cancelled", async () => {
    const controller = new AbortController();
    const downstream = new FakeAction();
    // Abort right after the runner has decided the job succeeded
    Container.get(OutputChannelService).setupOutputChannel(
      {
        appendLine: (line) => {
          if (line.startsWith("[JobRunner] Job first success")) controller.abort();
        },
      },
      "debug",
    );

    const result = await new JobScheduler({...OPTIONS, signal: controller.signal}).run([
      fakeJob("first", [fakeStep("ok", new FakeAction())]),
      fakeJob("second", [fakeStep("never", downstream)], {requires: ["first"]}),
    ]);

    expect(result.cancelled).toBe(true);
    expect(result.outcomes.map((o) => [o.name, o.status, o.message])).toEqual([
      ["first", "success", undefined],
      ["second", "cancelled", "cancelled before start"],
    ]);
    expect(downstream.calls).toBe(0);
  });

  it("should start nothing when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const action = new FakeAction();

    const result = await new JobScheduler({...OPTIONS, signal: controller.signal}).run([
      fakeJob("A", [fakeStep("a", action)]),
    ]);

    expect(result.outcomes.map((o) => [o.name, o.status])).toEqual([["A", "cancelled"]]);
    expect(action.calls).toBe(0);
  });
});

// ─── Exit codes ─────────────────────────────────────────────

describe("pipelineExitCode", () => {
  const outcome = (status: JobStatus, failureKind?: JobOutcome["failureKind"]): JobOutcome => ({
    name: "job",
    status,
    failureKind,
    steps: [],
    report: null,
    observedTimings: {},
  });

  it("should pick the most severe failure class", () => {
    expect(pipelineExitCode([outcome("success")], false)).toBe(0);
    expect(pipelineExitCode([outcome("failed", "test"), outcome("failed", "build")], false)).toBe(5);
    expect(pipelineExitCode([outcome("failed", "determinism"), outcome("failed", "setup")], false)).toBe(3);
    expect(pipelineExitCode([outcome("failed", "test"), outcome("blocked")], false)).toBe(6);
    expect(pipelineExitCode([outcome("failed")], false)).toBe(1);
    expect(pipelineExitCode([outcome("success")], true)).toBe(130);
  });
});

// ─── WorkerPool ─────────────────────────────────────────────

describe("WorkerPool", () => {
  it("should reject a non-positive size", () => {
    expect(() => new WorkerPool(0)).toThrow(RangeError);
  });

  it("should start waiting tasks in submission order", async () => {
    const pool = new WorkerPool(1);
    const order: number[] = [];
    const tasks = [1, 2, 3].map((n) =>
      pool.runTask(async () => {
        order.push(n);
        await delay(5);
      }),
    );

    expect(pool.stats).toEqual({active: 1, waiting: 2, max: 1});
    await Promise.all(tasks);
    expect(order).toEqual([1, 2, 3]);
    expect(pool.stats).toEqual({active: 0, waiting: 0, max: 1});
  });
});
