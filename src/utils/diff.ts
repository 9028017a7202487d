import type { FileChangeSet } from "../types";

/**
 * Pair up the lines of two versions of a file and keep the ones that differ.
 * Lines are compared by position; the scanners never add or remove lines.
 */
export function diffLines(original: string, modified: string): FileChangeSet {
  const before = original.split(/\r?\n/);
  const after = modified.split(/\r?\n/);
  const length = Math.min(before.length, after.length);
  const changes: FileChangeSet = [];

  for (let i = 0; i < length; i++) {
    if (before[i] !== after[i]) {
      changes.push({
        lineNumber: i + 1,
        original: before[i],
        modified: after[i],
      });
    }
  }

  return changes;
}
