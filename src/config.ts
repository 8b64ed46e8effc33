import { z } from 'zod';
import { DEFAULT_MAX_COMPRESSION_JUMPS, rangeBoundPolicies, type RangeBoundPolicy } from './dns/packetBuffer.js';

const logLevels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof logLevels)[number];

export type Config = Readonly<{
  LOG_LEVEL: LogLevel;

  // Boundary policy for ranged reads (label bytes) near the end of the 512-byte buffer.
  DNS_RANGE_BOUND: RangeBoundPolicy;
  DNS_MAX_COMPRESSION_JUMPS: number;
}>;

type Env = Record<string, string | undefined>;

const envSchema = z.object({
  LOG_LEVEL: z.enum(logLevels).default('info'),
  DNS_RANGE_BOUND: z.enum(rangeBoundPolicies).optional().default('legacy'),
  DNS_MAX_COMPRESSION_JUMPS: z.coerce.number().int().min(0).max(64).default(DEFAULT_MAX_COMPRESSION_JUMPS),
});

export function loadConfig(env: Env = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration:\n${parsed.error.message}`);
  }

  const raw = parsed.data;
  return {
    LOG_LEVEL: raw.LOG_LEVEL,
    DNS_RANGE_BOUND: raw.DNS_RANGE_BOUND,
    DNS_MAX_COMPRESSION_JUMPS: raw.DNS_MAX_COMPRESSION_JUMPS,
  };
}
