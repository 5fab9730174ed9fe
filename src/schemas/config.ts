import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';
import type { LoopPolicy } from '../types/scanner.js';

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

// Raw option bag as produced by the command line parser
export const ScanOptionsSchema = z
  .object({
    target: z.string().trim().min(1).default('127.0.0.1'),
    ports: z.string().trim().min(1).optional(),
    skipPorts: z.string().trim().min(1).optional(),
    skipNetwork: z.string().trim().min(1).optional(),
    threads: z.coerce.number().int().positive().default(100),
    timeout: z.coerce.number().positive().optional(),
    shuffleHosts: z.boolean().default(false),
    shufflePorts: z.boolean().default(false),
    closed: z.boolean().default(false),
    output: z.string().trim().min(1).optional(),
    dns: z.boolean().default(false),
    verbose: z.boolean().default(false),
    runtime: z.coerce.number().int().positive().optional(),
    loop: z.coerce.number().int().nonnegative().optional(),
    loopOpen: z.boolean().default(false),
    loopClosed: z.boolean().default(false),
    listen: z.boolean().default(false),
    logLevel: LogLevelSchema.default('warn'),
  })
  .superRefine((options, ctx) => {
    if (options.loopOpen && options.loopClosed) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['loopOpen'],
        message: '--loop-open and --loop-closed cannot be combined',
      });
    }
    if ((options.loopOpen || options.loopClosed) && options.loop !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['loop'],
        message: '--loop cannot be combined with --loop-open or --loop-closed',
      });
    }
    if (options.listen && (options.loopOpen || options.loopClosed || options.loop !== undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['listen'],
        message: '--listen cannot be combined with loop options',
      });
    }
    if (options.listen && options.ports === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['ports'],
        message: '--listen requires --ports',
      });
    }
  });

// Values arrive as strings and booleans from the command line
export type RawScanOptions = Record<string, unknown>;

export type LogLevel = z.infer<typeof LogLevelSchema>;

export interface ScanConfig {
  target: string;
  ports?: string | undefined;
  skipPorts?: string | undefined;
  skipNetwork?: string | undefined;
  workers: number;
  timeoutMs?: number | undefined;
  shuffleHosts: boolean;
  shufflePorts: boolean;
  showClosed: boolean;
  outputFile?: string | undefined;
  resolveDns: boolean;
  verbose: boolean;
  runtimeStatsSeconds?: number | undefined;
  loop: LoopPolicy;
  listen: boolean;
  logLevel: LogLevel;
}

function toLoopPolicy(loop: number | undefined, loopOpen: boolean, loopClosed: boolean): LoopPolicy {
  if (loopOpen) return { kind: 'until-open' };
  if (loopClosed) return { kind: 'until-closed' };
  if (loop === 0) return { kind: 'continuous' };
  return { kind: 'count', passes: loop ?? 1 };
}

/**
 * Validate raw command line options into a scan configuration
 */
export function loadConfig(options: RawScanOptions): ScanConfig {
  const result = ScanOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }

  const parsed = result.data;
  return {
    target: parsed.target === '.' ? '127.0.0.1' : parsed.target,
    ports: parsed.ports,
    skipPorts: parsed.skipPorts,
    skipNetwork: parsed.skipNetwork,
    workers: parsed.threads,
    timeoutMs: parsed.timeout !== undefined ? Math.max(1, Math.round(parsed.timeout * 1000)) : undefined,
    shuffleHosts: parsed.shuffleHosts,
    shufflePorts: parsed.shufflePorts,
    showClosed: parsed.closed,
    outputFile: parsed.output,
    resolveDns: parsed.dns,
    verbose: parsed.verbose,
    runtimeStatsSeconds: parsed.runtime,
    loop: toLoopPolicy(parsed.loop, parsed.loopOpen, parsed.loopClosed),
    listen: parsed.listen,
    logLevel: parsed.logLevel,
  };
}
