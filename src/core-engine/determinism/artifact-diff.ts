import type {ArtifactDiff, DiffHunk} from "../../shared-types";

/**
 * Structured comparison of two normalized artifacts.
 *
 * Lines are compared as raw bytes. With equal line counts every run of
 * differing lines becomes its own hunk; otherwise the common leading and
 * trailing lines are stripped and the middle is one hunk.
 */

function splitLines(bytes: Buffer): Buffer[] {
  const lines: Buffer[] = [];
  let start = 0;
  for (let index = bytes.indexOf(0x0a, start); index !== -1; index = bytes.indexOf(0x0a, start)) {
    lines.push(bytes.subarray(start, index));
    start = index + 1;
  }
  lines.push(bytes.subarray(start));
  return lines;
}

function firstDivergence(left: Buffer, right: Buffer): number {
  const shared = Math.min(left.length, right.length);
  for (let offset = 0; offset < shared; offset++) {
    if (left[offset] !== right[offset]) return offset;
  }
  return left.length === right.length ? -1 : shared;
}

/** `from` inclusive, `to` exclusive, 0-based; hunks report 1-based inclusive ranges. */
function hunk(left: Buffer[], right: Buffer[], from: number, leftTo: number, rightTo: number): DiffHunk {
  return {
    leftStart: from + 1,
    leftEnd: leftTo,
    rightStart: from + 1,
    rightEnd: rightTo,
    left: left.slice(from, leftTo).map((line) => line.toString("utf-8")),
    right: right.slice(from, rightTo).map((line) => line.toString("utf-8")),
  };
}

export function diffArtifacts(left: Buffer, right: Buffer): ArtifactDiff {
  const offset = firstDivergence(left, right);
  const base = {firstDivergentOffset: offset, leftLength: left.length, rightLength: right.length};
  if (offset === -1) {
    return {identical: true, ...base, hunks: []};
  }

  const leftLines = splitLines(left);
  const rightLines = splitLines(right);
  const hunks: DiffHunk[] = [];

  if (leftLines.length === rightLines.length) {
    let runStart = -1;
    for (let i = 0; i <= leftLines.length; i++) {
      const differs = i < leftLines.length && !leftLines[i].equals(rightLines[i]);
      if (differs && runStart === -1) {
        runStart = i;
      } else if (!differs && runStart !== -1) {
        hunks.push(hunk(leftLines, rightLines, runStart, i, i));
        runStart = -1;
      }
    }
    return {identical: false, ...base, hunks};
  }

  const shortest = Math.min(leftLines.length, rightLines.length);
  let prefix = 0;
  while (prefix < shortest && leftLines[prefix].equals(rightLines[prefix])) prefix++;
  let suffix = 0;
  while (
    suffix < shortest - prefix &&
    leftLines[leftLines.length - 1 - suffix].equals(rightLines[rightLines.length - 1 - suffix])
  ) {
    suffix++;
  }
  hunks.push(hunk(leftLines, rightLines, prefix, leftLines.length - suffix, rightLines.length - suffix));
  return {identical: false, ...base, hunks};
}
