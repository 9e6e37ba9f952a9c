/**
 * Fluent builder for configuring a claims join run
 * @module builder/claims-join-builder
 */

import { ClaimsJoiner } from '../core/claims-joiner.js'
import {
  resolveConfig,
  type ClaimsJoinConfig,
  type ClaimsJoinConfigInput,
} from '../config/config.js'
import type { JoinStep } from '../join/join-plan.js'
import { createConsoleLogger, LOG_LEVELS, type Logger } from '../utils/logger.js'
import {
  InvalidParameterError,
  requireNonEmptyArray,
  requireNonEmptyString,
  requireNonNull,
  requireOneOf,
} from '../utils/errors.js'

/**
 * Fluent builder for a {@link ClaimsJoiner}.
 *
 * Values set on the builder win over environment variables, which win
 * over defaults.
 *
 * @example
 * ```typescript
 * const joiner = ClaimsJoinBuilder.create()
 *   .dataDir('synthea_output/csv')
 *   .outputFile('joined_claims_data.csv')
 *   .summaryOutputFile('claims_summary.csv')
 *   .logger(defaultLogger)
 *   .build()
 *
 * await joiner.run()
 * ```
 */
export class ClaimsJoinBuilder {
  private readonly overrides: Partial<ClaimsJoinConfigInput> = {}
  private env: NodeJS.ProcessEnv = process.env
  private loggerInstance?: Logger
  private joinPlan?: readonly JoinStep[]

  static create(): ClaimsJoinBuilder {
    return new ClaimsJoinBuilder()
  }

  /**
   * Directory holding the generator's CSV export
   */
  dataDir(path: string): this {
    this.overrides.dataDir = requireNonEmptyString(path, 'dataDir')
    return this
  }

  outputFile(path: string): this {
    this.overrides.outputFile = requireNonEmptyString(path, 'outputFile')
    return this
  }

  /**
   * Also write a claim-level summary to this path
   */
  summaryOutputFile(path: string): this {
    this.overrides.summaryOutputFile = requireNonEmptyString(path, 'summaryOutputFile')
    return this
  }

  delimiter(delimiter: string): this {
    if (delimiter.length !== 1) {
      throw new InvalidParameterError('delimiter', delimiter, 'must be a single character')
    }
    this.overrides.delimiter = delimiter
    return this
  }

  inferTypes(enabled: boolean): this {
    this.overrides.inferTypes = enabled
    return this
  }

  conflictSuffixes(left: string, right: string): this {
    this.overrides.conflictSuffixes = [
      requireNonEmptyString(left, 'left suffix'),
      requireNonEmptyString(right, 'right suffix'),
    ]
    return this
  }

  /**
   * Minimum level of the console logger (ignored when a logger is given)
   */
  logLevel(level: string): this {
    this.overrides.logLevel = requireOneOf(level, LOG_LEVELS, 'logLevel')
    return this
  }

  logger(logger: Logger): this {
    this.loggerInstance = requireNonNull(logger, 'logger')
    return this
  }

  /**
   * Replaces the join plan. Intended for tests and diagnostics.
   */
  plan(steps: readonly JoinStep[]): this {
    this.joinPlan = requireNonEmptyArray(steps, 'plan')
    return this
  }

  /**
   * Environment consulted for unset values (default `process.env`)
   */
  environment(env: NodeJS.ProcessEnv): this {
    this.env = env
    return this
  }

  /**
   * Resolves and validates the configuration without creating a joiner
   *
   * @throws {ConfigurationError} If the resulting configuration is invalid
   */
  buildConfig(): ClaimsJoinConfig {
    return resolveConfig(this.overrides, this.env)
  }

  /**
   * Creates the joiner. Without an explicit logger, a console logger at the
   * configured log level is used.
   */
  build(): ClaimsJoiner {
    const config = this.buildConfig()
    return new ClaimsJoiner(config, {
      logger: this.loggerInstance ?? createConsoleLogger(config.logLevel),
      plan: this.joinPlan,
    })
  }
}

/**
 * Creates a new {@link ClaimsJoinBuilder}
 */
export function createClaimsJoinBuilder(): ClaimsJoinBuilder {
  return ClaimsJoinBuilder.create()
}
