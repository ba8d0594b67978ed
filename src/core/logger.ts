import color from "picocolors";

const PREFIX = "cherry-replay:";

export interface Logger {
  readonly verbose: boolean;
  debug(message: string): void;
  error(message: string): void;
  /** Echo a command line before it runs. */
  echoCommand(command: string[]): void;
}

export function createLogger(verbose = false): Logger {
  return {
    verbose,
    debug(message) {
      if (verbose) console.error(color.dim(`${PREFIX} ${message}`));
    },
    error(message) {
      console.error(`${PREFIX} ${color.red(message)}`);
    },
    echoCommand(command) {
      console.log(color.dim(`$ ${command.join(" ")}`));
    },
  };
}

/** `logger` itself when it already logs debug output, else a verbose copy. */
export function withVerbose(logger: Logger, verbose: boolean): Logger {
  return verbose && !logger.verbose ? createLogger(true) : logger;
}
