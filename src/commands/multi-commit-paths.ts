import { readRepoConfig } from "../core/config";
import {
  findMultiCommitPaths,
  formatPathCommitIndex,
} from "../core/co-occurrence";
import { withVerbose } from "../core/logger";
import { parseRevisionArgs } from "./args";
import type { CommandContext } from "./replay";

const USAGE =
  "cherry-replay multi-commit-paths <repo> <modified-rev> <upstream-rev> [ignore-path...] [--verbose]";

/**
 * List files touched by more than one of the branch's commits, as
 * candidates for squashing before a replay.
 */
export async function runMultiCommitPaths(
  argv: string[],
  ctx: CommandContext,
): Promise<number> {
  const args = parseRevisionArgs(argv, { usage: USAGE, variadic: true });
  const log = withVerbose(ctx.logger, args.verbose);

  const config = readRepoConfig(args.repo);
  const index = await findMultiCommitPaths(
    ctx.vcs,
    args.repo,
    args.modifiedRevision,
    args.upstreamRevision,
    [...config.ignore, ...args.rest],
    log,
  );

  for (const line of formatPathCommitIndex(index, config.shortIdLength)) {
    console.log(line);
  }
  return 0;
}
