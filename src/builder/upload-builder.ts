/**
 * Fluent builder for configuring an upload processor
 * @module builder/upload-builder
 */

import type { UploadConfigOverrides } from '../types/config.js'
import type { MergePair } from '../types/identity.js'
import type { ClassificationStrategy } from '../identity/types.js'
import { ExplicitPairsStrategy } from '../identity/explicit-pairs-strategy.js'
import { PositionalStrategy } from '../identity/positional-strategy.js'
import { resolveUploadConfig } from '../core/config.js'
import { UploadProcessor } from '../processor/upload-processor.js'
import { ConfigurationError } from '../utils/errors.js'
import type { Logger } from '../utils/logger.js'
import { createSilentLogger } from '../utils/logger.js'

/**
 * Fluent builder for an {@link UploadProcessor}.
 *
 * Exactly one classification mode must be chosen: `.pairs()` or `.positional()`.
 *
 * @example
 * ```typescript
 * const processor = CommonSupplier.create()
 *   .pairs([
 *     { parent: '1000000003', child: '1000000004' },
 *     { parent: '1000000003', child: '1000000005' },
 *   ])
 *   .config({ namePrefix: 'MERGED SUPPLIER ' })
 *   .logger(defaultLogger)
 *   .build()
 * ```
 */
export class UploadBuilder {
  private strategy?: ClassificationStrategy
  private overrides: UploadConfigOverrides = {}
  private log: Logger = createSilentLogger()
  private checkPairs = true

  /**
   * Merge the given children into their parents.
   * Several parent groups may be listed.
   */
  pairs(pairs: readonly MergePair[]): this {
    this.setStrategy(new ExplicitPairsStrategy(pairs))
    return this
  }

  /**
   * Decide parents from the identifier numbering: 4th character `3`.
   * Every child merges into the first parent of the general sheet.
   */
  positional(): this {
    this.setStrategy(new PositionalStrategy())
    return this
  }

  /**
   * Use a custom classification strategy
   */
  classifyWith(strategy: ClassificationStrategy): this {
    this.setStrategy(strategy)
    return this
  }

  /**
   * Override parts of the default configuration. Repeated calls accumulate.
   */
  config(overrides: UploadConfigOverrides): this {
    this.overrides = {
      ...this.overrides,
      ...overrides,
      sheets: { ...this.overrides.sheets, ...overrides.sheets },
      presentation: { ...this.overrides.presentation, ...overrides.presentation },
    }
    return this
  }

  logger(logger: Logger): this {
    this.log = logger
    return this
  }

  /**
   * Turn the pre-flight pair check on or off (default: on)
   */
  validatePairs(enabled: boolean): this {
    this.checkPairs = enabled
    return this
  }

  /**
   * Build the processor
   *
   * @throws {ConfigurationError} If no classification mode was chosen or the config is invalid
   */
  build(): UploadProcessor {
    if (!this.strategy) {
      throw new ConfigurationError(
        'No classification mode configured. Call pairs() or positional() before build()',
        'strategy'
      )
    }
    return new UploadProcessor({
      strategy: this.strategy,
      config: resolveUploadConfig(this.overrides),
      logger: this.log,
      validatePairs: this.checkPairs,
    })
  }

  private setStrategy(strategy: ClassificationStrategy): void {
    if (this.strategy) {
      throw new ConfigurationError(
        `Classification mode already set to '${this.strategy.mode}'`,
        'strategy'
      )
    }
    this.strategy = strategy
  }
}

/**
 * Entry point for configuring a processor
 */
export const CommonSupplier = {
  create(): UploadBuilder {
    return new UploadBuilder()
  },
}
