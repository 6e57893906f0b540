/**
 * Parser and service configuration
 * Parser constants are fixed; service settings come from the environment
 */

import { z } from 'zod';

export const PARSER_CONFIG = {
  /**
   * Deadhead detection:
   * - A leg is a deadhead when its flight token starts with one of these carrier codes
   * - LIM9 marks limousine/ground positioning in some bid packages
   */
  DEADHEAD_PREFIXES: ['DH', 'AC', 'UA', 'LIM9', 'AV', 'VB', 'AA'],
  DEADHEAD_PLACEHOLDER: '000DH',
  DEADHEAD_REFERENCE_STATION: 'YLW',

  /**
   * Calendar resolution:
   * - Characters searched on each side of the first "effective"
   */
  EFFECTIVE_WINDOW: 200,

  /**
   * Layovers shorter than this are turn references, not rest periods
   */
  LAYOVER_MIN_MINUTES: 8 * 60,

  REDEYE_INSTANT_MINUTES: 2 * 60,

  COMMUTE: {
    DAYS_OF_WORK: [3, 4, 5],
    REPORT_AFTER_MINUTES: 11 * 60,
    RELEASE_BEFORE_MINUTES: 22 * 60 + 30,
  },

  UNKNOWN_BASE: 'XX',
  EMPTY_MASK: '_______',
  NOT_AVAILABLE: 'N/A',
} as const;

export const prelimIdStrategies = ['fingerprint', 'sequence', 'random'] as const;
export type PrelimIdStrategy = (typeof prelimIdStrategies)[number];

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5000),
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_HTTP: z
    .string()
    .optional()
    .transform(value => value !== '0'),
  DATABASE_URL: z.string().optional(),
  PRELIM_ID_STRATEGY: z.enum(prelimIdStrategies).default('fingerprint'),
});

export type ServerConfig = z.infer<typeof envSchema>;

export function loadServerConfig(
  env: NodeJS.ProcessEnv = process.env
): ServerConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return result.data;
}
