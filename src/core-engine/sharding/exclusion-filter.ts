import * as fs from "node:fs/promises";
import {ConfigError, describeError} from "../../errors";
import type {ExclusionResult} from "../../shared-types";

/**
 * ExclusionFilter — Removes known-bad test identifiers before partitioning.
 *
 * Matching is whole-line and exact (`grep -v -x -f denylist`): "fmt" never
 * removes "fmt/internal". One identifier per denylist line; blank lines and
 * `#` comments are ignored.
 */
export class ExclusionFilter {
  private constructor(
    private readonly entries: ReadonlySet<string>,
    readonly source: string,
  ) {}

  static fromList(ids: Iterable<string>, source = "<inline>"): ExclusionFilter {
    const entries = new Set<string>();
    for (const id of ids) {
      const trimmed = id.trim();
      if (trimmed !== "") entries.add(trimmed);
    }
    return new ExclusionFilter(entries, source);
  }

  /** Parse denylist file content into identifiers. */
  static parse(content: string): string[] {
    return content
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line !== "" && !line.startsWith("#"));
  }

  /** @throws ConfigError when the file cannot be read. */
  static async load(filePath: string): Promise<ExclusionFilter> {
    let content: string;
    try {
      content = await fs.readFile(filePath, "utf-8");
    } catch (error) {
      throw new ConfigError(`Cannot load exclusion list ${filePath}: ${describeError(error)}`);
    }
    return ExclusionFilter.fromList(ExclusionFilter.parse(content), filePath);
  }

  get size(): number {
    return this.entries.size;
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  apply(candidates: readonly string[]): ExclusionResult {
    const kept: string[] = [];
    const removed: string[] = [];
    for (const candidate of candidates) {
      if (this.entries.has(candidate)) {
        removed.push(candidate);
      } else {
        kept.push(candidate);
      }
    }
    return {kept, removed, removedCount: removed.length};
  }
}
