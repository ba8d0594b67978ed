import color from "picocolors";
import { collectAttributions, computeReplayPlan } from "../core/replay-plan";
import { type Logger, withVerbose } from "../core/logger";
import type { VcsPort } from "../vcs/types";
import { parseRevisionArgs } from "./args";

export interface CommandContext {
  vcs: VcsPort;
  /** Shown in echoed commands. */
  gitBinary: string;
  logger: Logger;
}

const REPLAY_USAGE =
  "cherry-replay replay <repo> <modified-rev> <upstream-rev> [--dry-run] [--verbose]";
const PLAN_USAGE =
  "cherry-replay plan <repo> <modified-rev> <upstream-rev> [--verbose]";

/**
 * Check out `upstream-rev` detached and cherry-pick, oldest first, every
 * commit blamed for a line the modified revision adds. A conflicting
 * cherry-pick stops with git's own instructions; continue it by hand with
 * `git cherry-pick --continue`.
 */
export async function runReplay(
  argv: string[],
  ctx: CommandContext,
): Promise<number> {
  const args = parseRevisionArgs(argv, { usage: REPLAY_USAGE, dryRun: true });
  const log = withVerbose(ctx.logger, args.verbose);

  const plan = await computeReplayPlan(
    ctx.vcs,
    args.repo,
    args.modifiedRevision,
    args.upstreamRevision,
    log,
  );

  if (plan.length === 0) {
    console.log(
      `Nothing to replay: ${args.modifiedRevision} adds no lines over ${args.upstreamRevision}`,
    );
    return 0;
  }

  const git = [ctx.gitBinary, "-C", args.repo];

  log.echoCommand([...git, "checkout", "--detach", args.upstreamRevision]);
  if (!args.dryRun) await ctx.vcs.checkout(args.repo, args.upstreamRevision);

  log.echoCommand([...git, "cherry-pick", ...plan]);
  if (!args.dryRun) await ctx.vcs.cherryPick(args.repo, plan);

  if (args.dryRun) {
    console.log(color.yellow(`Dry run: ${plan.length} commit(s) not applied`));
  } else {
    console.log(
      `Replayed ${plan.length} commit(s). Review with: ${[...git, "diff", args.modifiedRevision].join(" ")}`,
    );
  }
  return 0;
}

/** Print the plan, oldest first, without touching the working tree. */
export async function runPlan(
  argv: string[],
  ctx: CommandContext,
): Promise<number> {
  const args = parseRevisionArgs(argv, { usage: PLAN_USAGE });
  const log = withVerbose(ctx.logger, args.verbose);

  const attributions = await collectAttributions(
    ctx.vcs,
    args.repo,
    args.modifiedRevision,
    args.upstreamRevision,
    log,
  );
  for (const attribution of attributions.sorted()) {
    console.log(`${attribution.timestamp} ${attribution.commitId}`);
  }
  return 0;
}
