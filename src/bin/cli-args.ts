import { ConfigError } from "../errors.js";
import { signalNumber } from "../utils/signals.js";

export interface CliConfig {
  command: string[];
  cwd?: string;
  pollMs: number;
  timeoutMs?: number;
  group: boolean;
  verbose: boolean;
  help: boolean;
}

export const DEFAULT_CLI_POLL_MS = 50;

export const HELP_TEXT = `
  jobkeeper: run a command under a supervised job

  Usage: jobkeeper [options] -- <command> [args...]

  Options:
    --cwd <path>       Working directory for the command (default: cwd)
    --poll <ms>        Poll interval (default: ${DEFAULT_CLI_POLL_MS})
    --timeout <ms>     Shut the command down after this long
    --group            Start the command as a process-group leader and
                       signal the whole group on shutdown
    --verbose, -v      Verbose logging
    --help, -h         Show this help
`;

function positiveInt(option: string, value: string | undefined): number {
  const n = value === undefined ? Number.NaN : Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new ConfigError(`${option} requires a positive integer`);
  }
  return n;
}

function requireValue(option: string, value: string | undefined): string {
  if (value === undefined || value === "") {
    throw new ConfigError(`${option} requires a value`);
  }
  return value;
}

/** Parse the arguments after the script name. Everything after `--` is the command. */
export function parseCliArgs(argv: readonly string[]): CliConfig {
  const config: CliConfig = {
    command: [],
    pollMs: DEFAULT_CLI_POLL_MS,
    group: false,
    verbose: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--":
        config.command = argv.slice(i + 1);
        i = argv.length;
        break;
      case "--cwd":
        config.cwd = requireValue(arg, argv[++i]);
        break;
      case "--poll":
        config.pollMs = positiveInt(arg, argv[++i]);
        break;
      case "--timeout":
        config.timeoutMs = positiveInt(arg, argv[++i]);
        break;
      case "--group":
        config.group = true;
        break;
      case "--verbose":
      case "-v":
        config.verbose = true;
        break;
      case "--help":
      case "-h":
        config.help = true;
        break;
      default:
        throw new ConfigError(`Unknown option: ${arg}`);
    }
  }

  if (!config.help && config.command.length === 0) {
    throw new ConfigError("No command given; put it after --");
  }
  return config;
}

/**
 * Shell-style exit status for a job exit code: the code itself, or 128 + signal number
 * for a signal death (reported as the negated signal number).
 */
export function toExitStatus(exitCode: number): number {
  if (exitCode >= 0) return exitCode;
  if (exitCode === -1) return 1;
  return 128 - exitCode;
}

/** Exit status of a shell killed by `signal`. */
export function signalExitStatus(signal: NodeJS.Signals): number {
  const n = signalNumber(signal);
  return n === undefined ? 1 : 128 + n;
}
