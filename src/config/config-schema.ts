import { z } from "zod";

const positiveMs = z.number().int().positive();

/**
 * Tick interval for automatic polling; null leaves polling to the host.
 * Fractional values are truncated to whole milliseconds.
 */
export const pollIntervalSchema = z
  .number()
  .finite()
  .transform((ms) => Math.trunc(ms))
  .pipe(positiveMs)
  .nullable();

export const execFlagsSchema = z
  .object({
    mode: z.enum(["async", "sync"]).optional(),
    hideConsole: z.boolean().optional(),
    groupLeader: z.boolean().optional(),
  })
  .strict();

/** argv: program name first, then its arguments. */
export const commandSchema = z
  .array(z.string())
  .nonempty("command must name a program")
  .refine(
    (argv) => argv.length === 0 || argv[0].trim().length > 0,
    "program name must not be empty",
  );

export const jobConfigSchema = z
  .object({
    pollIntervalMs: pollIntervalSchema.optional(),
    readerPollMs: positiveMs.optional(),
    killGracePeriodMs: positiveMs.optional(),
    flags: execFlagsSchema.optional(),
    cwd: z.string().min(1).optional(),
    env: z.record(z.string().optional()).optional(),
  })
  .strict();
