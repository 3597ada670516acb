import type {ParsedLine, TestResult, TestStatus} from "../../shared-types";
import type {OutputParser} from "../adapter.interface";

/**
 * TapParser — Parses TAP (Test Anything Protocol) output.
 *
 * `ok` / `not ok` lines are held back until the next top-level line so that an
 * indented YAML diagnostic block (`---` ... `...`) or subtest output can be
 * attached to them. `# SKIP` counts as skipped, `# TODO` failures are not
 * failures.
 */

const TEST_RE = /^(not )?ok\b\s*(\d+)?\s*(?:-\s*)?([^#]*?)\s*(?:#\s*(\S+)\s*(.*))?$/;
const VERSION_RE = /^TAP version \d+/i;
const PLAN_RE = /^1\.\.\d+/;
const BAIL_OUT_RE = /^Bail out!/i;
const INDENTED_RE = /^\s+\S/;
const DURATION_RE = /^\s*duration_ms:\s*(\d+(?:\.\d+)?)/;

export class TapParser implements OutputParser {
  readonly name = "tap" as const;

  private held: {result: TestResult; output: string[]} | null = null;
  private counter = 0;

  parseLine(line: string): ParsedLine[] {
    if (this.held && (INDENTED_RE.test(line) || line.trim() === "")) {
      const duration = DURATION_RE.exec(line);
      if (duration) {
        this.held.result.duration = Number.parseFloat(duration[1]) / 1000;
      }
      if (line.trim() !== "") {
        this.held.output.push(line.trim());
      }
      return [{kind: "noise"}];
    }

    const released = this.release();

    const test = TEST_RE.exec(line);
    if (test) {
      this.counter++;
      const failed = test[1] !== undefined;
      const directive = test[4]?.toUpperCase() ?? "";
      let status: TestStatus = failed ? "fail" : "pass";
      if (directive.startsWith("SKIP") || (directive === "TODO" && failed)) {
        status = "skip";
      }
      const number = test[2] ?? String(this.counter);
      const description = test[3].trim();
      this.held = {
        result: {id: description || `test ${number}`, status, duration: 0, output: ""},
        output: test[5] ? [test[5].trim()] : [],
      };
      return [...released, {kind: "noise"}];
    }

    if (VERSION_RE.test(line) || PLAN_RE.test(line) || line.trim() === "") {
      return [...released, {kind: "noise"}];
    }

    if (BAIL_OUT_RE.test(line)) {
      return [
        ...released,
        {kind: "aux", line},
        {kind: "result", result: {id: "bail out", status: "fail", duration: 0, output: line}},
      ];
    }

    return [...released, {kind: "aux", line}];
  }

  flush(): ParsedLine[] {
    return this.release();
  }

  private release(): ParsedLine[] {
    if (!this.held) {
      return [];
    }
    const {result, output} = this.held;
    this.held = null;
    return [{kind: "result", result: {...result, output: output.join("\n")}}];
  }
}
