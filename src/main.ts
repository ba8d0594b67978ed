import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { runMultiCommitPaths } from "./commands/multi-commit-paths";
import { type CommandContext, runPlan, runReplay } from "./commands/replay";
import { readEnvironment } from "./core/config";
import { CherryReplayError } from "./core/errors";
import { createLogger } from "./core/logger";
import { createGitVcs, spawnGitRunner } from "./vcs/git";

function findPackageRoot(startDir: string): string {
  let dir = startDir;
  while (true) {
    if (existsSync(join(dir, "package.json"))) return dir;
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return startDir;
}

export function getPackageVersion(): string {
  const pkg: unknown = JSON.parse(
    readFileSync(join(findPackageRoot(__dirname), "package.json"), "utf-8"),
  );
  if (pkg && typeof pkg === "object" && "version" in pkg) {
    return String(pkg.version);
  }
  return "0.0.0";
}

export function printHelp(): void {
  console.log(`cherry-replay - move a branch's commits onto a new base

Usage:
  cherry-replay <command> <repo> <modified-rev> <upstream-rev> [options]

Commands:
  replay              Blame every line modified-rev adds over upstream-rev,
                      check out upstream-rev detached and cherry-pick the
                      responsible commits oldest first
  plan                Print the commits replay would cherry-pick
  multi-commit-paths  List files touched by more than one commit
                      (extra positionals are paths to leave out)
  help                Show this help message

Options:
  --dry-run   (replay) Print the git commands without running them
  --verbose   Log every git query to stderr

Environment:
  CHERRY_REPLAY_GIT     git binary [default: git]
  CHERRY_REPLAY_DEBUG   set to 1 for --verbose

Examples:
  cherry-replay plan ~/src/linux my-branch v6.1.4
  cherry-replay replay ~/src/linux my-branch v6.1.4 --dry-run
  cherry-replay multi-commit-paths ~/src/linux my-branch v6.1.4 MAINTAINERS`);
}

/** Context for one run; `verbose` turns on debug output for git queries too. */
export function defaultContext(verbose = false): CommandContext {
  const env = readEnvironment();
  const logger = createLogger(env.debug || verbose);
  return {
    vcs: createGitVcs(spawnGitRunner(env.gitBinary, logger)),
    gitBinary: env.gitBinary,
    logger,
  };
}

/** Route a command line; resolves with the process exit code. */
export async function main(
  argv: string[],
  ctx: CommandContext = defaultContext(argv.includes("--verbose")),
): Promise<number> {
  const [command, ...rest] = argv;

  try {
    switch (command) {
      case "replay":
        return await runReplay(rest, ctx);
      case "plan":
        return await runPlan(rest, ctx);
      case "multi-commit-paths":
        return await runMultiCommitPaths(rest, ctx);
      case "--version":
      case "-v":
        console.log(getPackageVersion());
        return 0;
      case "help":
      case "--help":
      case "-h":
      case undefined:
        printHelp();
        return 0;
      default:
        console.error(`Unknown command: ${command}`);
        printHelp();
        return 1;
    }
  } catch (e) {
    if (e instanceof CherryReplayError) {
      ctx.logger.error(e.message);
      return 1;
    }
    throw e;
  }
}
