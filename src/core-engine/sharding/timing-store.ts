import {createHash} from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import {Type, type Static} from "@sinclair/typebox";
import {Value} from "@sinclair/typebox/value";
import Container, {Service} from "typedi";
import {describeError} from "../../errors";
import {OutputChannelService} from "../../output-channel.service";
import type {TestResult, TimingRecord, TimingSnapshot} from "../../shared-types";

/**
 * TimingStore — Historical per-identifier durations.
 *
 * File format: `{"timings": {"<id>": seconds}}`. The snapshot a run uses is
 * read once at start and never changes during the run; observed durations
 * are written back after the run finishes.
 */

const TimingFileSchema = Type.Object({
  timings: Type.Record(Type.String(), Type.Number({minimum: 0})),
});

type TimingFile = Static<typeof TimingFileSchema>;

function serialize(durations: ReadonlyMap<string, number>): string {
  const timings: Record<string, number> = {};
  for (const id of Array.from(durations.keys()).sort()) {
    const duration = durations.get(id);
    if (duration !== undefined) timings[id] = duration;
  }
  const file: TimingFile = {timings};
  return JSON.stringify(file, null, 2) + "\n";
}

/** Build a snapshot; its version is the SHA-256 of its serialized form. */
export function createSnapshot(records: Iterable<TimingRecord>): TimingSnapshot {
  const durations = new Map<string, number>();
  for (const record of records) {
    durations.set(record.id, record.duration);
  }
  const version = createHash("sha256").update(serialize(durations)).digest("hex");
  return {version, durations};
}

export const EMPTY_SNAPSHOT: TimingSnapshot = createSnapshot([]);

/**
 * Duration observed for each partition identifier: the sum of the durations
 * of the results whose id or suite equals it. Identifiers with no matching
 * result are omitted.
 */
export function observedDurations(ids: readonly string[], results: readonly TestResult[]): Record<string, number> {
  const wanted = new Set(ids);
  const observed: Record<string, number> = {};
  for (const result of results) {
    const keys = new Set<string>();
    if (wanted.has(result.id)) keys.add(result.id);
    if (result.suite !== undefined && wanted.has(result.suite)) keys.add(result.suite);
    for (const key of keys) {
      observed[key] = (observed[key] ?? 0) + result.duration;
    }
  }
  return observed;
}

@Service()
export class TimingStore {
  private readonly output = Container.get(OutputChannelService);

  /** Missing file → empty snapshot; unreadable or malformed file → warning and empty snapshot. */
  async load(filePath: string): Promise<TimingSnapshot> {
    let content: string;
    try {
      content = await fs.readFile(filePath, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        this.output.debug(`[TimingStore] No timing file at ${filePath}`);
      } else {
        this.output.warn(`[TimingStore] Cannot read ${filePath}: ${describeError(error)}`);
      }
      return EMPTY_SNAPSHOT;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      this.output.warn(`[TimingStore] Ignoring malformed timing file ${filePath}: ${describeError(error)}`);
      return EMPTY_SNAPSHOT;
    }
    if (!Value.Check(TimingFileSchema, parsed)) {
      const first = Value.Errors(TimingFileSchema, parsed).First();
      const where = first ? `${first.path || "/"}: ${first.message}` : "unexpected shape";
      this.output.warn(`[TimingStore] Ignoring malformed timing file ${filePath} (${where})`);
      return EMPTY_SNAPSHOT;
    }

    const snapshot = createSnapshot(
      Object.entries(parsed.timings).map(([id, duration]) => ({id, duration})),
    );
    this.output.debug(`[TimingStore] Loaded ${snapshot.durations.size} timing(s), version ${snapshot.version.slice(0, 12)}`);
    return snapshot;
  }

  /** Merge observed durations over the stored ones (last observation wins) and write the file. */
  async record(filePath: string, observed: Record<string, number>): Promise<TimingSnapshot> {
    const current = await this.load(filePath);
    const merged = new Map(current.durations);
    for (const [id, duration] of Object.entries(observed)) {
      if (Number.isFinite(duration) && duration >= 0) {
        merged.set(id, duration);
      }
    }
    const snapshot = createSnapshot(Array.from(merged, ([id, duration]) => ({id, duration})));
    await fs.mkdir(path.dirname(filePath), {recursive: true});
    await fs.writeFile(filePath, serialize(merged), "utf-8");
    this.output.appendLine(`[TimingStore] Recorded ${Object.keys(observed).length} timing(s) to ${filePath}`);
    return snapshot;
  }
}
