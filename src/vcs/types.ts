/** Branch name, tag or hash; opaque beyond string equality. */
export type RevisionRef = string;

/** Full commit identifier. Short prefixes are for display only. */
export type CommitId = string;

export type ChangeKind = "insertion" | "deletion";

/**
 * One line-level edit from a unified diff. An insertion carries `newLine`
 * and no `oldLine`; a deletion the reverse. A replaced line shows up as a
 * deletion followed by an insertion.
 */
export interface LineChange {
  kind: ChangeKind;
  newPath?: string;
  oldPath?: string;
  newLine?: number;
  oldLine?: number;
}

export interface FileChanges {
  oldPath?: string;
  newPath?: string;
  changes: LineChange[];
}

export interface BlameRecord {
  commitId: CommitId;
  authorName: string;
  /** YYYY-MM-DD */
  date: string;
  /** HH:MM:SS */
  time: string;
  /** +HHMM or -HHMM */
  utcOffset: string;
}

export interface CommitFiles {
  summary: string;
  paths: string[];
}

/**
 * Everything the engine and the reporter need from version control. Every
 * call names its repository explicitly.
 */
export interface VcsPort {
  diff(repo: string, fromRev: RevisionRef, toRev: RevisionRef): Promise<string>;
  blame(
    repo: string,
    rev: RevisionRef,
    path: string,
    line: number,
  ): Promise<BlameRecord>;
  /** Commits in `modifiedRev` with no patch-equivalent in `upstreamRev`, oldest first. */
  cherry(
    repo: string,
    upstreamRev: RevisionRef,
    modifiedRev: RevisionRef,
  ): Promise<CommitId[]>;
  show(repo: string, commit: CommitId): Promise<CommitFiles>;
  /** Detached checkout. */
  checkout(repo: string, rev: RevisionRef): Promise<void>;
  cherryPick(repo: string, commits: CommitId[]): Promise<void>;
}
