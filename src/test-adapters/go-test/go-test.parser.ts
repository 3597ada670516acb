import type {ParsedLine, TestResult, TestStatus} from "../../shared-types";
import type {OutputParser} from "../adapter.interface";

/**
 * GoTestParser — Parses verbose `go test -v` style output.
 *
 * Strategy:
 *  1. `=== RUN` opens a test; lines printed while it runs become its output.
 *  2. `--- PASS/FAIL/SKIP: Name (1.23s)` closes it. Indented lines right after
 *     a close belong to that test (non-verbose failure messages).
 *  3. Results are held until the package summary (`ok pkg`, `FAIL pkg`,
 *     `? pkg [no test files]`) names their package, then emitted as `pkg.Name`.
 *  4. A package that fails without any failing test (build error, panic)
 *     is reported as a failed result named after the package.
 */

const RUN_RE = /^=== (RUN|PAUSE|CONT|NAME)\s+(\S+)/;
const END_RE = /^(\s*)--- (PASS|FAIL|SKIP): (\S+) \((\d+(?:\.\d+)?)s\)/;
const OK_PKG_RE = /^ok\s+(\S+)\s+(?:(\d+(?:\.\d+)?)s|\(cached\))/;
const FAIL_PKG_RE = /^FAIL\s+(\S+)(?:\s+(\d+(?:\.\d+)?)s|\s+\[([^\]]+)\])?\s*$/;
const NO_TESTS_RE = /^\?\s+(\S+)\s+\[no test files\]/;
const BARE_STATUS_RE = /^(PASS|FAIL)$/;
const CONTINUATION_RE = /^\s{4}/;

const STATUS_MAP: Record<string, TestStatus> = {PASS: "pass", FAIL: "fail", SKIP: "skip"};

interface PendingResult {
  name: string;
  status: TestStatus;
  duration: number;
  output: string[];
}

export class GoTestParser implements OutputParser {
  readonly name = "go-test" as const;

  /** Tests currently running, innermost last. */
  private running: string[] = [];
  private outputs = new Map<string, string[]>();
  /** Closed tests waiting for their package summary. */
  private pending: PendingResult[] = [];
  private lastClosed: PendingResult | null = null;

  parseLine(line: string): ParsedLine[] {
    const run = RUN_RE.exec(line);
    if (run) {
      const name = run[2];
      if (run[1] === "RUN") {
        this.outputs.set(name, []);
      }
      this.running = this.running.filter((n) => n !== name);
      this.running.push(name);
      this.lastClosed = null;
      return [{kind: "noise"}];
    }

    const end = END_RE.exec(line);
    if (end) {
      const name = end[3];
      const closed: PendingResult = {
        name,
        status: STATUS_MAP[end[2]],
        duration: Number.parseFloat(end[4]),
        output: this.outputs.get(name) ?? [],
      };
      this.outputs.delete(name);
      this.running = this.running.filter((n) => n !== name);
      this.pending.push(closed);
      this.lastClosed = closed;
      return [{kind: "noise"}];
    }

    const okPkg = OK_PKG_RE.exec(line);
    if (okPkg) {
      const duration = okPkg[2] ? Number.parseFloat(okPkg[2]) : 0;
      return this.closePackage(okPkg[1], "pass", duration, line);
    }

    const failPkg = FAIL_PKG_RE.exec(line);
    if (failPkg) {
      const duration = failPkg[2] ? Number.parseFloat(failPkg[2]) : 0;
      return this.closePackage(failPkg[1], "fail", duration, line);
    }

    const noTests = NO_TESTS_RE.exec(line);
    if (noTests) {
      return [
        ...this.drainPending(undefined),
        {kind: "result", result: {id: noTests[1], status: "skip", duration: 0, output: "", suite: noTests[1]}},
      ];
    }

    if (BARE_STATUS_RE.test(line)) {
      return [{kind: "noise"}];
    }

    const active = this.running[this.running.length - 1];
    if (active !== undefined) {
      this.outputs.get(active)?.push(line);
      return [{kind: "noise"}];
    }

    if (this.lastClosed && CONTINUATION_RE.test(line)) {
      this.lastClosed.output.push(line.trim());
      return [{kind: "noise"}];
    }

    if (line.trim() === "") {
      return [{kind: "noise"}];
    }
    return [{kind: "aux", line}];
  }

  flush(): ParsedLine[] {
    this.abandonRunning();
    return this.drainPending(undefined);
  }

  // ─── Private ──────────────────────────────────────────────

  private closePackage(pkg: string, status: TestStatus, duration: number, line: string): ParsedLine[] {
    this.abandonRunning();
    const hadFailure = this.pending.some((r) => r.status === "fail");
    const hadResults = this.pending.length > 0;
    const parsed = this.drainPending(pkg);

    if (!hadResults || (status === "fail" && !hadFailure)) {
      parsed.push({
        kind: "result",
        result: {
          id: pkg,
          status,
          duration,
          output: status === "fail" ? line.trim() : "",
          suite: pkg,
        },
      });
    }
    return parsed;
  }

  /** Tests that never reported an end line (panic, killed process) count as failed. */
  private abandonRunning(): void {
    for (const name of this.running) {
      this.pending.push({
        name,
        status: "fail",
        duration: 0,
        output: [...(this.outputs.get(name) ?? []), "test did not report a result"],
      });
    }
    this.running = [];
    this.outputs.clear();
  }

  private drainPending(pkg: string | undefined): ParsedLine[] {
    const parsed = this.pending.map((pending): ParsedLine => ({
      kind: "result",
      result: this.toResult(pending, pkg),
    }));
    this.pending = [];
    this.lastClosed = null;
    return parsed;
  }

  private toResult(pending: PendingResult, pkg: string | undefined): TestResult {
    const result: TestResult = {
      id: pkg ? `${pkg}.${pending.name}` : pending.name,
      status: pending.status,
      duration: pending.duration,
      output: pending.output.join("\n"),
    };
    if (pkg) {
      result.suite = pkg;
    }
    return result;
  }
}
