import { validateBlameRecord } from "../vcs/blame";
import { insertionsOf, parseUnifiedDiff } from "../vcs/parse-diff";
import type { CommitId, RevisionRef, VcsPort } from "../vcs/types";
import { AttributionSet, attributionFromBlame } from "./attribution";
import { createLogger, type Logger } from "./logger";

/** Commit ids to cherry-pick, oldest first. */
export type OrderedPlan = CommitId[];

/**
 * Blame every line `modifiedRevision` adds relative to `upstreamRevision`
 * and collect the commits responsible.
 *
 * Lines are blamed at their new position in `modifiedRevision`. Lines that
 * were only deleted have no blameable position and contribute nothing.
 * Queries run one at a time; the first failure rejects the whole call.
 */
export async function collectAttributions(
  vcs: VcsPort,
  repo: string,
  modifiedRevision: RevisionRef,
  upstreamRevision: RevisionRef,
  log: Logger = createLogger(),
): Promise<AttributionSet> {
  const patch = await vcs.diff(repo, upstreamRevision, modifiedRevision);
  const files = parseUnifiedDiff(patch);
  const insertions = insertionsOf(files);
  log.debug(
    `${files.length} changed file(s), ${insertions.length} inserted line(s) to blame`,
  );

  const attributions = new AttributionSet();
  for (const { path, line } of insertions) {
    const raw = await vcs.blame(repo, modifiedRevision, path, line);
    const record = validateBlameRecord(raw, path, line);
    attributions.add(attributionFromBlame(record));
  }
  log.debug(`${attributions.size} commit(s) attributed`);
  return attributions;
}

export async function computeReplayPlan(
  vcs: VcsPort,
  repo: string,
  modifiedRevision: RevisionRef,
  upstreamRevision: RevisionRef,
  log: Logger = createLogger(),
): Promise<OrderedPlan> {
  const attributions = await collectAttributions(
    vcs,
    repo,
    modifiedRevision,
    upstreamRevision,
    log,
  );
  return attributions.toPlan();
}
