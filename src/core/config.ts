import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors";

export const CONFIG_FILE = ".cherry-replay.json";

export const RepoConfigSchema = z
  .object({
    ignore: z
      .array(z.string())
      .default([])
      .describe("Paths left out of the multi-commit report"),
    shortIdLength: z
      .number()
      .int()
      .min(4)
      .max(40)
      .default(10)
      .describe("Commit id prefix length used in reports"),
  })
  .strict();

export type RepoConfig = z.infer<typeof RepoConfigSchema>;

export interface Environment {
  gitBinary: string;
  debug: boolean;
}

export function readEnvironment(
  env: NodeJS.ProcessEnv = process.env,
): Environment {
  return {
    gitBinary: env.CHERRY_REPLAY_GIT?.trim() || "git",
    debug: env.CHERRY_REPLAY_DEBUG === "1",
  };
}

/**
 * Read `<repo>/.cherry-replay.json`. A missing file yields the defaults;
 * a file that is not valid JSON or fails the schema is an error.
 */
export function readRepoConfig(repo: string): RepoConfig {
  const path = join(repo, CONFIG_FILE);
  if (!existsSync(path)) return RepoConfigSchema.parse({});

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (e) {
    throw new ConfigError(
      `Failed to parse ${path}: ${e instanceof Error ? e.message : String(e)}`,
    );
  }

  const result = RepoConfigSchema.safeParse(parsed);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid ${path}: ${detail}`);
  }
  return result.data;
}
