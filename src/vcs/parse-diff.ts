import { parsePatch } from "diff";
import type { FileChanges, LineChange } from "./types";

const DEV_NULL = "/dev/null";

/** `parsePatch` also breaks lines on these; inside a diff line they are content. */
const IN_LINE_SEPARATORS = /\r(?!\n)|[\v\f\x85]/g;

/**
 * Strip the `a/` / `b/` prefix git puts on diff header paths.
 * `/dev/null` (file created or removed) maps to undefined.
 */
export function stripDiffPrefix(
  fileName: string | undefined,
  prefix: "a/" | "b/",
): string | undefined {
  if (!fileName || fileName === DEV_NULL) return undefined;
  return fileName.startsWith(prefix) ? fileName.slice(prefix.length) : fileName;
}

/**
 * Parse a multi-file unified diff into per-file line changes.
 *
 * Line numbers are 1-based: insertions are numbered in the new file,
 * deletions in the old one. Context lines and `\ No newline at end of
 * file` markers produce nothing. Sections without hunks (binary files,
 * mode-only changes) are dropped. Form feeds, vertical tabs, lone carriage
 * returns and U+0085 stay part of the line they appear in.
 */
export function parseUnifiedDiff(patch: string): FileChanges[] {
  if (!patch.trim()) return [];

  const files: FileChanges[] = [];
  for (const section of parsePatch(patch.replace(IN_LINE_SEPARATORS, " "))) {
    if (section.hunks.length === 0) continue;

    const oldPath = stripDiffPrefix(section.oldFileName, "a/");
    const newPath = stripDiffPrefix(section.newFileName, "b/");
    const changes: LineChange[] = [];

    for (const hunk of section.hunks) {
      let oldLine = hunk.oldStart;
      let newLine = hunk.newStart;

      for (const line of hunk.lines) {
        switch (line[0]) {
          case "+":
            changes.push({ kind: "insertion", newPath, oldPath, newLine });
            newLine++;
            break;
          case "-":
            changes.push({ kind: "deletion", newPath, oldPath, oldLine });
            oldLine++;
            break;
          case "\\":
            break;
          default:
            oldLine++;
            newLine++;
        }
      }
    }

    files.push({ oldPath, newPath, changes });
  }
  return files;
}

export function isInsertion(
  change: LineChange,
): change is LineChange & { newPath: string; newLine: number } {
  return (
    change.kind === "insertion" &&
    change.newPath !== undefined &&
    change.newLine !== undefined &&
    change.oldLine === undefined
  );
}

export function insertionsOf(files: FileChanges[]): Array<{
  path: string;
  line: number;
}> {
  const result: Array<{ path: string; line: number }> = [];
  for (const file of files) {
    for (const change of file.changes) {
      if (isInsertion(change)) {
        result.push({ path: change.newPath, line: change.newLine });
      }
    }
  }
  return result;
}
