import { z } from 'zod';

export const DEFAULT_MAX_ENTRIES_PER_DIRECTORY = 4096;

/**
 * How a directory is compared against the exception table.
 * `basename` compares the last path component for equality; `prefix` checks
 * whether the full path starts with a table entry.
 */
export const ExceptionMatchSchema = z.enum(['basename', 'prefix']);
export type ExceptionMatch = z.infer<typeof ExceptionMatchSchema>;

export const LayoutConfigSchema = z
  .object({
    extraKnownNames: z.array(z.string().min(1)).default([]),
  })
  .strict();

export const ExceptionsConfigSchema = z
  .object({
    names: z.array(z.string().min(1)).default([]),
    match: ExceptionMatchSchema.default('basename'),
  })
  .strict();

export const LimitsConfigSchema = z
  .object({
    // 0 disables the cap
    maxEntriesPerDirectory: z
      .number()
      .int()
      .nonnegative()
      .default(DEFAULT_MAX_ENTRIES_PER_DIRECTORY),
  })
  .strict();

export const ConfigSchema = z
  .object({
    configVersion: z.literal(1).default(1),
    layout: LayoutConfigSchema.default({}),
    exceptions: ExceptionsConfigSchema.default({}),
    limits: LimitsConfigSchema.default({}),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
