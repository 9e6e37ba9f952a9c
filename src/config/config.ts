/**
 * Run configuration: defaults, environment and explicit overrides,
 * validated with zod
 * @module config/config
 */

import { z } from 'zod'

import { ConfigurationError } from '../utils/errors.js'
import { LOG_LEVELS } from '../utils/logger.js'

export const DEFAULT_DATA_DIR = 'synthea_output/csv'
export const DEFAULT_OUTPUT_FILE = 'joined_claims_data.csv'

export const claimsJoinConfigSchema = z.object({
  /** Directory holding the generator's CSV export */
  dataDir: z.string().min(1).default(DEFAULT_DATA_DIR),
  /** Path of the joined output file */
  outputFile: z.string().min(1).default(DEFAULT_OUTPUT_FILE),
  /** Optional path for the claim-level summary file */
  summaryOutputFile: z.string().min(1).optional(),
  delimiter: z
    .string()
    .length(1)
    .refine((value) => !['"', '\n', '\r'].includes(value), {
      message: 'delimiter cannot be a quote or a line break',
    })
    .default(','),
  inferTypes: z.boolean().default(true),
  conflictSuffixes: z
    .tuple([z.string().min(1), z.string().min(1)])
    .refine(([left, right]) => left !== right, {
      message: 'conflict suffixes must differ',
    })
    .default(['_x', '_y']),
  logLevel: z.enum(LOG_LEVELS).default('info'),
})

/** Fully resolved configuration */
export type ClaimsJoinConfig = z.infer<typeof claimsJoinConfigSchema>

/** Configuration as accepted before defaults are applied */
export type ClaimsJoinConfigInput = z.input<typeof claimsJoinConfigSchema>

/**
 * Validates a configuration object and applies defaults.
 *
 * @throws {ConfigurationError} Listing every invalid field
 */
export function parseConfig(input: unknown): ClaimsJoinConfig {
  const parsed = claimsJoinConfigSchema.safeParse(input)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }))
    throw new ConfigurationError(
      `Invalid configuration: ${issues.map((i) => `${i.path || '(root)'}: ${i.message}`).join('; ')}`,
      issues[0]?.path,
      { issues }
    )
  }
  return parsed.data
}

function parseBooleanFlag(name: string, value: string): boolean {
  const normalized = value.trim().toLowerCase()
  if (['1', 'true', 'yes'].includes(normalized)) return true
  if (['0', 'false', 'no'].includes(normalized)) return false
  throw new ConfigurationError(
    `Environment variable ${name} must be a boolean (true/false), got '${value}'`,
    name
  )
}

/**
 * Reads configuration values from environment variables:
 * `CLAIMS_DATA_DIR`, `CLAIMS_OUTPUT_FILE`, `CLAIMS_SUMMARY_OUTPUT_FILE`,
 * `CLAIMS_DELIMITER`, `CLAIMS_INFER_TYPES`, `CLAIMS_LOG_LEVEL`.
 * Unset variables are omitted so defaults still apply.
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env
): Record<string, unknown> {
  const config: Record<string, unknown> = {}
  if (env.CLAIMS_DATA_DIR) config.dataDir = env.CLAIMS_DATA_DIR
  if (env.CLAIMS_OUTPUT_FILE) config.outputFile = env.CLAIMS_OUTPUT_FILE
  if (env.CLAIMS_SUMMARY_OUTPUT_FILE) {
    config.summaryOutputFile = env.CLAIMS_SUMMARY_OUTPUT_FILE
  }
  if (env.CLAIMS_DELIMITER) config.delimiter = env.CLAIMS_DELIMITER
  if (env.CLAIMS_INFER_TYPES) {
    config.inferTypes = parseBooleanFlag('CLAIMS_INFER_TYPES', env.CLAIMS_INFER_TYPES)
  }
  if (env.CLAIMS_LOG_LEVEL) config.logLevel = env.CLAIMS_LOG_LEVEL
  return config
}

/**
 * Resolves the configuration: explicit overrides win over the environment,
 * which wins over defaults. Overrides set to `undefined` are ignored.
 */
export function resolveConfig(
  overrides: Partial<ClaimsJoinConfigInput> = {},
  env: NodeJS.ProcessEnv = process.env
): ClaimsJoinConfig {
  const explicit = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  )
  return parseConfig({ ...loadConfigFromEnv(env), ...explicit })
}
