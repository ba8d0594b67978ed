import { spawn } from "node:child_process";
import { VcsQueryError } from "../core/errors";
import { createLogger, type Logger } from "../core/logger";
import { parseBlamePorcelain } from "./blame";
import type { CommitFiles, CommitId, VcsPort } from "./types";

export interface GitRunOptions {
  /** Hand the terminal to git (cherry-pick conflict instructions). */
  inheritStdio?: boolean;
}

/** Runs git with `args`; resolves with stdout, rejects with VcsQueryError. */
export type GitRunner = (
  args: string[],
  options?: GitRunOptions,
) => Promise<string>;

export function spawnGitRunner(
  binary = "git",
  log: Logger = createLogger(),
): GitRunner {
  return (args, options) =>
    new Promise((resolve, reject) => {
      const command = [binary, ...args];
      log.debug(`exec ${command.join(" ")}`);

      const proc = spawn(binary, args, {
        stdio: options?.inheritStdio
          ? "inherit"
          : ["ignore", "pipe", "pipe"],
      });
      let stdout = "";
      let stderr = "";

      proc.stdout?.setEncoding("utf-8");
      proc.stderr?.setEncoding("utf-8");
      proc.stdout?.on("data", (data: string) => {
        stdout += data;
      });
      proc.stderr?.on("data", (data: string) => {
        stderr += data;
      });

      proc.on("error", (err) => {
        reject(new VcsQueryError(command, null, err.message));
      });
      proc.on("close", (code) => {
        if (code === 0) resolve(stdout.trimEnd());
        else reject(new VcsQueryError(command, code, stderr));
      });
    });
}

/**
 * Parse `git cherry <upstream> <head>` output. Lines look like
 * `+ e7d7606021c3e80024996a32793b98541368f2b3`; `-` marks a commit that
 * already has an equivalent patch upstream and is skipped.
 */
export function parseCherryOutput(output: string): CommitId[] {
  const commits: CommitId[] = [];
  for (const line of output.split("\n")) {
    if (!line.trim()) continue;
    const m = /^([+-]) (\S+)$/.exec(line.trim());
    if (!m || !m[2]) {
      throw new VcsQueryError(
        ["git", "cherry"],
        0,
        "",
        `Unexpected git cherry output line: "${line}"`,
      );
    }
    if (m[1] === "+") commits.push(m[2]);
  }
  return commits;
}

/**
 * Parse `git show --name-only --pretty=format:%s` output: the commit
 * subject, then one touched path per line.
 */
export function parseShowNameOnly(output: string): CommitFiles {
  const [summary = "", ...rest] = output.split("\n");
  return {
    summary,
    paths: rest.filter((path) => path.length > 0),
  };
}

export function createGitVcs(run: GitRunner = spawnGitRunner()): VcsPort {
  return {
    diff(repo, fromRev, toRev) {
      return run([
        "-C",
        repo,
        "-c",
        "core.quotePath=false",
        "diff",
        "--no-color",
        "--no-ext-diff",
        "--src-prefix=a/",
        "--dst-prefix=b/",
        fromRev,
        toRev,
      ]);
    },

    async blame(repo, rev, path, line) {
      const output = await run([
        "-C",
        repo,
        "blame",
        "--porcelain",
        `-L${line},${line}`,
        rev,
        "--",
        path,
      ]);
      return parseBlamePorcelain(output, path, line);
    },

    async cherry(repo, upstreamRev, modifiedRev) {
      const output = await run(["-C", repo, "cherry", upstreamRev, modifiedRev]);
      return parseCherryOutput(output);
    },

    async show(repo, commit) {
      const output = await run([
        "-C",
        repo,
        "-c",
        "core.quotePath=false",
        "show",
        "--name-only",
        "--pretty=format:%s",
        commit,
      ]);
      return parseShowNameOnly(output);
    },

    async checkout(repo, rev) {
      await run(["-C", repo, "checkout", "--detach", rev], {
        inheritStdio: true,
      });
    },

    async cherryPick(repo, commits) {
      await run(["-C", repo, "cherry-pick", ...commits], {
        inheritStdio: true,
      });
    },
  };
}
