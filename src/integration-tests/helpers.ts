import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import type {ActionResult, Job, Step} from "../shared-types";
import type {Action, StepIO} from "../core-engine/actions/action.interface";
import type {JobContext} from "../core-engine/scheduler/job-context";

// ─── Filesystem ─────────────────────────────────────────────

export function createTempDir(prefix = "pipewright-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function writeFile(dir: string, relativePath: string, content: string | Buffer): string {
  const fullPath = path.join(dir, relativePath);
  fs.mkdirSync(path.dirname(fullPath), {recursive: true});
  fs.writeFileSync(fullPath, content);
  return fullPath;
}

export function cleanup(dir: string): void {
  try {
    fs.rmSync(dir, {recursive: true, force: true, maxRetries: 3, retryDelay: 100});
  } catch {
    // Ignore cleanup errors
  }
}

// ─── Fake actions ───────────────────────────────────────────

export type FakeBehaviour = (context: JobContext, io: StepIO) => Promise<ActionResult> | ActionResult;

/** Action whose behaviour is a plain function; records when it ran. */
export class FakeAction implements Action {
  readonly kind = "fake";
  calls = 0;

  constructor(
    private readonly behaviour: FakeBehaviour = () => ({exitCode: 0, stdout: "", stderr: ""}),
    private readonly label = "fake",
  ) {}

  describe(): string {
    return this.label;
  }

  async execute(context: JobContext, io: StepIO): Promise<ActionResult> {
    this.calls++;
    return this.behaviour(context, io);
  }
}

/** Action that writes `output` through the step's parser, then exits with `exitCode`. */
export function emitting(output: string, exitCode = 0): FakeAction {
  return new FakeAction((_context, io) => {
    const stream = io.report.openStream(io.stepName, io.parser);
    stream.write(output);
    io.report.merge(stream.end());
    return {exitCode, stdout: output, stderr: ""};
  });
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function fakeStep(name: string, action: Action, overrides: Partial<Step> = {}): Step {
  return {name, action, parser: "plain", when: "on_success", ...overrides};
}

export function fakeJob(name: string, steps: Step[], overrides: Partial<Job> = {}): Job {
  return {
    name,
    steps,
    requires: [],
    parallelism: 1,
    executor: {workingDirectory: os.tmpdir(), environment: {}, shell: ["/bin/sh"]},
    resources: [],
    ...overrides,
  };
}
