import type { BlameRecord, CommitId } from "../vcs/types";
import { InconsistentAttributionError } from "./errors";

export interface Attribution {
  commitId: CommitId;
  /** `${date}T${time}${utcOffset}`, as blamed; the ordering key. */
  timestamp: string;
}

export function attributionFromBlame(record: BlameRecord): Attribution {
  return {
    commitId: record.commitId,
    timestamp: `${record.date}T${record.time}${record.utcOffset}`,
  };
}

/**
 * Oldest first by the timestamp text, then by commit id. Timestamps in
 * different offsets compare as written, not by the instant they denote.
 */
export function compareAttributions(a: Attribution, b: Attribution): number {
  if (a.timestamp !== b.timestamp) return a.timestamp < b.timestamp ? -1 : 1;
  if (a.commitId === b.commitId) return 0;
  return a.commitId < b.commitId ? -1 : 1;
}

/**
 * Commits responsible for the inserted lines of one run, one entry per
 * commit however many lines blame to it.
 */
export class AttributionSet {
  private readonly byCommit = new Map<CommitId, Attribution>();

  add(attribution: Attribution): void {
    const existing = this.byCommit.get(attribution.commitId);
    if (!existing) {
      this.byCommit.set(attribution.commitId, attribution);
      return;
    }
    if (existing.timestamp !== attribution.timestamp) {
      throw new InconsistentAttributionError(
        attribution.commitId,
        existing.timestamp,
        attribution.timestamp,
      );
    }
  }

  has(commitId: CommitId): boolean {
    return this.byCommit.has(commitId);
  }

  get size(): number {
    return this.byCommit.size;
  }

  sorted(): Attribution[] {
    return [...this.byCommit.values()].sort(compareAttributions);
  }

  toPlan(): CommitId[] {
    return this.sorted().map((attribution) => attribution.commitId);
  }
}
