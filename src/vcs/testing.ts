import { VcsQueryError } from "../core/errors";
import type {
  BlameRecord,
  CommitFiles,
  CommitId,
  RevisionRef,
  VcsPort,
} from "./types";

export interface FakeVcsScript {
  diff?: string;
  /** Keyed by `path:line`. */
  blame?: Record<string, BlameRecord | Error>;
  cherry?: CommitId[];
  show?: Record<CommitId, CommitFiles>;
  failCherryPick?: boolean;
}

export type FakeVcsCall =
  | { op: "diff"; repo: string; fromRev: RevisionRef; toRev: RevisionRef }
  | { op: "blame"; repo: string; rev: RevisionRef; path: string; line: number }
  | { op: "cherry"; repo: string; upstreamRev: RevisionRef; modifiedRev: RevisionRef }
  | { op: "show"; repo: string; commit: CommitId }
  | { op: "checkout"; repo: string; rev: RevisionRef }
  | { op: "cherryPick"; repo: string; commits: CommitId[] };

/** Scripted in-memory port. Unscripted queries fail like a missing revision would. */
export class FakeVcs implements VcsPort {
  readonly calls: FakeVcsCall[] = [];

  constructor(private readonly script: FakeVcsScript = {}) {}

  async diff(repo: string, fromRev: RevisionRef, toRev: RevisionRef) {
    this.calls.push({ op: "diff", repo, fromRev, toRev });
    if (this.script.diff === undefined) {
      throw unknownRevision(["diff", fromRev, toRev]);
    }
    return this.script.diff;
  }

  async blame(repo: string, rev: RevisionRef, path: string, line: number) {
    this.calls.push({ op: "blame", repo, rev, path, line });
    const entry = this.script.blame?.[`${path}:${line}`];
    if (entry === undefined) {
      throw new VcsQueryError(
        ["git", "blame", `-L${line},${line}`, rev, "--", path],
        128,
        `fatal: file ${path} has only ${line - 1} lines`,
      );
    }
    if (entry instanceof Error) throw entry;
    return entry;
  }

  async cherry(repo: string, upstreamRev: RevisionRef, modifiedRev: RevisionRef) {
    this.calls.push({ op: "cherry", repo, upstreamRev, modifiedRev });
    if (this.script.cherry === undefined) {
      throw unknownRevision(["cherry", upstreamRev, modifiedRev]);
    }
    return [...this.script.cherry];
  }

  async show(repo: string, commit: CommitId) {
    this.calls.push({ op: "show", repo, commit });
    const files = this.script.show?.[commit];
    if (!files) throw unknownRevision(["show", commit]);
    return { summary: files.summary, paths: [...files.paths] };
  }

  async checkout(repo: string, rev: RevisionRef) {
    this.calls.push({ op: "checkout", repo, rev });
  }

  async cherryPick(repo: string, commits: CommitId[]) {
    this.calls.push({ op: "cherryPick", repo, commits: [...commits] });
    if (this.script.failCherryPick) {
      throw new VcsQueryError(
        ["git", "cherry-pick", ...commits],
        1,
        "error: could not apply",
      );
    }
  }

  callsOf<K extends FakeVcsCall["op"]>(
    op: K,
  ): Array<Extract<FakeVcsCall, { op: K }>> {
    return this.calls.filter(
      (call): call is Extract<FakeVcsCall, { op: K }> => call.op === op,
    );
  }
}

function unknownRevision(args: string[]): VcsQueryError {
  return new VcsQueryError(
    ["git", ...args],
    128,
    "fatal: bad revision",
  );
}

export function blameRecord(
  commitId: CommitId,
  timestamp: string,
  authorName = "Test Author",
): BlameRecord {
  const m = /^(\d{4}-\d{2}-\d{2})T(\d{2}:\d{2}:\d{2})([+-]\d{4})$/.exec(
    timestamp,
  );
  if (!m || !m[1] || !m[2] || !m[3]) {
    throw new Error(`bad test timestamp ${timestamp}`);
  }
  return { commitId, authorName, date: m[1], time: m[2], utcOffset: m[3] };
}
