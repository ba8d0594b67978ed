import type { CommitId, RevisionRef, VcsPort } from "../vcs/types";
import { createLogger, type Logger } from "./logger";

export interface PathCommitIndex {
  /** Paths touched by more than one commit, in discovery order. */
  paths: Map<string, CommitId[]>;
  /** First message line of every commit examined. */
  summaries: Map<CommitId, string>;
}

/**
 * Group the commits `git cherry` reports for `modifiedRevision` by the
 * files they touch and keep the files touched more than once. Commits stay
 * in the order the cherry query returned them.
 */
export async function findMultiCommitPaths(
  vcs: VcsPort,
  repo: string,
  modifiedRevision: RevisionRef,
  upstreamRevision: RevisionRef,
  ignorePaths: readonly string[] = [],
  log: Logger = createLogger(),
): Promise<PathCommitIndex> {
  const ignored = new Set(ignorePaths);
  const commits = await vcs.cherry(repo, upstreamRevision, modifiedRevision);
  log.debug(`${commits.length} commit(s) not upstream`);

  const byPath = new Map<string, CommitId[]>();
  const summaries = new Map<CommitId, string>();

  for (const commit of commits) {
    const { summary, paths } = await vcs.show(repo, commit);
    summaries.set(commit, summary);

    for (const path of paths) {
      if (ignored.has(path)) continue;
      const list = byPath.get(path);
      if (list) list.push(commit);
      else byPath.set(path, [commit]);
    }
  }

  const multi = new Map<string, CommitId[]>();
  for (const [path, list] of byPath) {
    if (list.length > 1) multi.set(path, list);
  }
  return { paths: multi, summaries };
}

export function formatPathCommitIndex(
  index: PathCommitIndex,
  shortIdLength = 10,
): string[] {
  const lines: string[] = [];
  for (const [path, commits] of index.paths) {
    lines.push(path);
    for (const commit of commits) {
      const summary = index.summaries.get(commit) ?? "";
      lines.push(`  ${commit.slice(0, shortIdLength)} ${summary}`);
    }
  }
  return lines;
}
