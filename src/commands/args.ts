import { resolve } from "node:path";
import { parseArgs as nodeParseArgs } from "node:util";
import { UsageError } from "../core/errors";

export interface RevisionArgs {
  repo: string;
  modifiedRevision: string;
  upstreamRevision: string;
  /** Positionals after the three revision arguments. */
  rest: string[];
  dryRun: boolean;
  verbose: boolean;
}

export function parseRevisionArgs(
  argv: string[],
  opts: { usage: string; variadic?: boolean; dryRun?: boolean },
): RevisionArgs {
  let values: { "dry-run"?: boolean; verbose?: boolean };
  let positionals: string[];

  try {
    ({ values, positionals } = nodeParseArgs({
      args: argv,
      options: {
        "dry-run": { type: "boolean" },
        verbose: { type: "boolean" },
      },
      allowPositionals: true,
      strict: true,
    }));
  } catch (err) {
    if (err instanceof TypeError) {
      throw new UsageError(`${err.message}\nUsage: ${opts.usage}`);
    }
    throw err;
  }

  const [repo, modifiedRevision, upstreamRevision, ...rest] = positionals;
  if (!repo || !modifiedRevision || !upstreamRevision) {
    throw new UsageError(`Missing arguments.\nUsage: ${opts.usage}`);
  }
  if (rest.length > 0 && !opts.variadic) {
    throw new UsageError(
      `Unexpected arguments: ${rest.join(" ")}\nUsage: ${opts.usage}`,
    );
  }
  if (values["dry-run"] && !opts.dryRun) {
    throw new UsageError(`--dry-run is not supported here.\nUsage: ${opts.usage}`);
  }

  return {
    repo: resolve(repo),
    modifiedRevision,
    upstreamRevision,
    rest,
    dryRun: values["dry-run"] ?? false,
    verbose: values.verbose ?? false,
  };
}
