import { z } from 'zod';

export const DEFAULT_READY_URL = 'http://localhost:5000/health';

export const LogLevelSchema = z.enum([ 'error', 'warn', 'info', 'verbose', 'debug', 'silly' ]);

const ServiceSchema = z.object({
  name: z.string().min(1).optional(),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  /** Relative paths resolve against the config file's directory. */
  cwd: z.string().min(1).optional(),
  env: z.record(z.string()).default({}),
});

const ReadinessSchema = z.object({
  /** `http(s)://` for an HTTP probe, `tcp://host:port` for a TCP connect probe. */
  url: z.string().min(1).default(DEFAULT_READY_URL),
  /** `2xx`, `any`, a single status such as `204`, or a range such as `200-399`. */
  expect: z.string().min(1).default('2xx'),
  bodyIncludes: z.string().min(1).optional(),
  intervalMs: z.number().int().positive().default(2_000),
  timeoutMs: z.number().int().positive().default(2_000),
  /** `null` or absent: no attempt limit. */
  maxAttempts: z.number().int().positive().nullable().optional(),
  /** `null` or absent: no deadline. */
  deadlineMs: z.number().int().positive().nullable().optional(),
});

export const StartgateConfigSchema = z.object({
  primary: ServiceSchema,
  dependent: ServiceSchema,
  readiness: ReadinessSchema.default({}),
  shutdownGraceMs: z.number().int().nonnegative().default(5_000),
  /** Stop the primary after the dependent finished normally, not only on aborted runs. */
  stopPrimaryOnExit: z.boolean().default(false),
  logging: z.object({
    level: LogLevelSchema.default('info'),
    file: z.string().min(1).optional(),
  }).default({}),
});

export type StartgateConfigInput = z.input<typeof StartgateConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
