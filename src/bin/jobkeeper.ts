#!/usr/bin/env node
import { LogLevel, StructuredLogger } from "../adapters/structured-logger.js";
import { Job } from "../core/job.js";
import { errorMessage } from "../errors.js";
import { registerSignalHandlers } from "../utils/signal-handler.js";
import {
  type CliConfig,
  HELP_TEXT,
  parseCliArgs,
  signalExitStatus,
  toExitStatus,
} from "./cli-args.js";

// ── Arg parsing ────────────────────────────────────────────────────────────

function loadConfig(): CliConfig {
  try {
    return parseCliArgs(process.argv.slice(2));
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}\nRun with --help for usage.`);
    process.exit(1);
  }
}

// ── Main ───────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const config = loadConfig();
  if (config.help) {
    console.log(HELP_TEXT);
    return;
  }

  const logger = new StructuredLogger({
    component: "jobkeeper",
    level: config.verbose ? LogLevel.DEBUG : LogLevel.WARN,
  });

  const job = new Job({
    command: config.command,
    cwd: config.cwd,
    pollIntervalMs: config.pollMs,
    flags: { groupLeader: config.group },
    logger: logger.child({ command: config.command[0] }, "job"),
    onData: (text) => process.stdout.write(text),
    onError: (text) => process.stderr.write(text),
  });

  const removeSignalHandlers = registerSignalHandlers(
    async (signal) => {
      await job.shutdown();
      return signalExitStatus(signal);
    },
    { logger },
  );

  let timeoutTimer: ReturnType<typeof setTimeout> | undefined;
  if (config.timeoutMs !== undefined) {
    const timeoutMs = config.timeoutMs;
    timeoutTimer = setTimeout(() => {
      logger.warn("Timeout reached, shutting down", { timeoutMs });
      job.shutdown().catch((err: unknown) => {
        logger.error("Shutdown after timeout failed", { error: err });
      });
    }, timeoutMs);
  }

  try {
    const exitCode = await job.run();
    logger.debug("Command finished", { exitCode });
    process.exitCode = toExitStatus(exitCode);
  } finally {
    if (timeoutTimer !== undefined) clearTimeout(timeoutTimer);
    removeSignalHandlers();
  }
}

main().catch((err: unknown) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
});
