export {
  type Attribution,
  AttributionSet,
  attributionFromBlame,
  compareAttributions,
} from "./core/attribution";
export {
  findMultiCommitPaths,
  formatPathCommitIndex,
  type PathCommitIndex,
} from "./core/co-occurrence";
export { readRepoConfig, type RepoConfig } from "./core/config";
export { createLogger, type Logger } from "./core/logger";
export {
  CherryReplayError,
  ConfigError,
  InconsistentAttributionError,
  MalformedBlameOutputError,
  UsageError,
  VcsQueryError,
} from "./core/errors";
export {
  collectAttributions,
  computeReplayPlan,
  type OrderedPlan,
} from "./core/replay-plan";
export { BlameRecordSchema, parseBlamePorcelain } from "./vcs/blame";
export { createGitVcs, type GitRunner, spawnGitRunner } from "./vcs/git";
export { parseUnifiedDiff } from "./vcs/parse-diff";
export type * from "./vcs/types";
