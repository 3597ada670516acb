import {createHash} from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import Container, {Service} from "typedi";
import {OutputChannelService} from "../../output-channel.service";
import type {Report, TestResult} from "../../shared-types";

/**
 * ReportWriter — Persists job reports as JSON and JUnit XML.
 *
 * Files land at `<reportDir>/<job>.json` and `<reportDir>/<job>.xml`,
 * the conventional place CI systems collect test results from.
 */

const INVALID_XML_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F]/g;

export function escapeXml(value: string): string {
  return value
    .replace(INVALID_XML_CHARS, "")
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/**
 * File name for a job. Characters outside [A-Za-z0-9._-] become "_"; a name
 * that had to change gets a hash of the original, so `a/b` and `a_b` differ.
 */
export function reportFileStem(job: string): string {
  const safe = job.replace(/[^A-Za-z0-9._-]/g, "_");
  if (safe === job) {
    return job;
  }
  return `${safe}-${createHash("sha256").update(job).digest("hex").slice(0, 8)}`;
}

function seconds(value: number): string {
  return value.toFixed(3);
}

function renderTestCase(result: TestResult): string[] {
  const classname = escapeXml(result.suite ?? "");
  const open = `    <testcase classname="${classname}" name="${escapeXml(result.id)}" time="${seconds(result.duration)}"`;
  if (result.status === "pass" && result.output === "") {
    return [`${open}/>`];
  }
  const lines = [`${open}>`];
  if (result.status === "fail") {
    const firstLine = result.output.split("\n")[0] ?? "";
    lines.push(`      <failure message="${escapeXml(firstLine)}">${escapeXml(result.output)}</failure>`);
  } else if (result.status === "skip") {
    lines.push("      <skipped/>");
  }
  if (result.status !== "fail" && result.output !== "") {
    lines.push(`      <system-out>${escapeXml(result.output)}</system-out>`);
  }
  lines.push("    </testcase>");
  return lines;
}

/** Render a report as JUnit XML; results are grouped into one <testsuite> per suite. */
export function renderJUnit(report: Report): string {
  const suites = new Map<string, TestResult[]>();
  for (const result of report.results) {
    const suite = result.suite ?? report.job;
    const members = suites.get(suite) ?? [];
    members.push(result);
    suites.set(suite, members);
  }

  const totalTime = report.results.reduce((sum, r) => sum + r.duration, 0);
  const lines = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<testsuites name="${escapeXml(report.job)}" tests="${report.results.length}" ` +
      `failures="${report.counts.fail}" skipped="${report.counts.skip}" time="${seconds(totalTime)}">`,
  ];

  for (const [suite, members] of suites) {
    const failures = members.filter((r) => r.status === "fail").length;
    const skipped = members.filter((r) => r.status === "skip").length;
    const time = members.reduce((sum, r) => sum + r.duration, 0);
    lines.push(
      `  <testsuite name="${escapeXml(suite)}" tests="${members.length}" ` +
        `failures="${failures}" skipped="${skipped}" time="${seconds(time)}">`,
    );
    for (const result of members) {
      lines.push(...renderTestCase(result));
    }
    lines.push("  </testsuite>");
  }

  lines.push("</testsuites>");
  return lines.join("\n") + "\n";
}

@Service()
export class ReportWriter {
  private readonly output = Container.get(OutputChannelService);

  /** Write both report files; returns their paths. */
  async write(report: Report, reportDir: string): Promise<string[]> {
    await fs.mkdir(reportDir, {recursive: true});
    const stem = path.join(reportDir, reportFileStem(report.job));
    const jsonPath = `${stem}.json`;
    const xmlPath = `${stem}.xml`;

    await fs.writeFile(jsonPath, JSON.stringify(report, null, 2) + "\n", "utf-8");
    await fs.writeFile(xmlPath, renderJUnit(report), "utf-8");

    this.output.debug(`[ReportWriter] Wrote ${jsonPath} and ${xmlPath}`);
    return [jsonPath, xmlPath];
  }
}
