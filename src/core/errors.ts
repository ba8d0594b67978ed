export class CherryReplayError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CherryReplayError";
  }
}

/**
 * The version-control service reported a failure: non-zero exit, an
 * unreachable revision, a path or line missing at the requested revision.
 */
export class VcsQueryError extends CherryReplayError {
  readonly command: string[];
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(
    command: string[],
    exitCode: number | null,
    stderr: string,
    message?: string,
  ) {
    super(
      message ??
        `${command.join(" ")} failed (exit ${exitCode ?? "signal"})${stderr.trim() ? `: ${stderr.trim()}` : ""}`,
    );
    this.name = "VcsQueryError";
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export class MalformedBlameOutputError extends CherryReplayError {
  readonly path: string;
  readonly line: number;

  constructor(path: string, line: number, detail: string) {
    super(`Malformed blame output for ${path}:${line}: ${detail}`);
    this.name = "MalformedBlameOutputError";
    this.path = path;
    this.line = line;
  }
}

/** The oracle attributed lines to one commit under two different dates. */
export class InconsistentAttributionError extends CherryReplayError {
  readonly commitId: string;
  readonly timestamps: [string, string];

  constructor(commitId: string, first: string, second: string) {
    super(
      `Commit ${commitId} was blamed with two different timestamps: ${first} and ${second}`,
    );
    this.name = "InconsistentAttributionError";
    this.commitId = commitId;
    this.timestamps = [first, second];
  }
}

export class ConfigError extends CherryReplayError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class UsageError extends CherryReplayError {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}
