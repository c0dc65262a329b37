/**
 * Configuration resolution and validation
 * @module core/config
 */

import type {
  UploadConfig,
  UploadConfigOverrides,
  SheetKey,
} from '../types/config.js'
import {
  DEFAULT_UPLOAD_CONFIG,
  REQUIRED_SHEET_KEYS,
  OPTIONAL_SHEET_KEYS,
} from '../types/config.js'
import { ConfigurationError, requireNonEmptyString } from '../utils/errors.js'

const HEX_COLOR = /^[0-9A-Fa-f]{6}$/

/**
 * Applies overrides on top of the defaults and validates the result.
 *
 * @param overrides - Partial configuration
 * @returns A complete configuration
 * @throws {ConfigurationError} If the merged configuration is invalid
 */
export function resolveUploadConfig(
  overrides: UploadConfigOverrides = {},
  base: UploadConfig = DEFAULT_UPLOAD_CONFIG
): UploadConfig {
  const config: UploadConfig = {
    sheets: { ...base.sheets, ...overrides.sheets },
    sourceIdColumn: overrides.sourceIdColumn ?? base.sourceIdColumn,
    namePrefix: overrides.namePrefix ?? base.namePrefix,
    fallbackParentId: overrides.fallbackParentId ?? base.fallbackParentId,
    presentation: { ...base.presentation, ...overrides.presentation },
  }
  validateUploadConfig(config)
  return config
}

/**
 * Validates a complete configuration
 *
 * @throws {ConfigurationError} If configuration is invalid
 */
export function validateUploadConfig(config: UploadConfig): void {
  const seen = new Map<string, SheetKey>()
  for (const key of [...REQUIRED_SHEET_KEYS, ...OPTIONAL_SHEET_KEYS]) {
    const name = requireNonEmptyString(config.sheets[key], `sheets.${key}`)
    const other = seen.get(name)
    if (other) {
      throw new ConfigurationError(
        `sheets.${key} and sheets.${other} both point at '${name}'`,
        `sheets.${key}`
      )
    }
    seen.set(name, key)
  }

  requireNonEmptyString(config.sourceIdColumn, 'sourceIdColumn')
  requireNonEmptyString(config.fallbackParentId, 'fallbackParentId')
  if (typeof config.namePrefix !== 'string') {
    throw new ConfigurationError('namePrefix must be a string', 'namePrefix')
  }

  const { presentation } = config
  for (const field of ['highlightColor', 'bannerColor', 'bannerBorderColor'] as const) {
    if (!HEX_COLOR.test(presentation[field])) {
      throw new ConfigurationError(
        `presentation.${field} must be a 6-digit hex colour, got '${presentation[field]}'`,
        `presentation.${field}`
      )
    }
  }
  if (!Number.isInteger(presentation.bannerRows) || presentation.bannerRows < 0) {
    throw new ConfigurationError(
      'presentation.bannerRows must be a non-negative integer',
      'presentation.bannerRows'
    )
  }
}

/**
 * Names of the sheets that must exist in the input
 */
export function requiredSheetNames(config: UploadConfig): string[] {
  return REQUIRED_SHEET_KEYS.map((key) => config.sheets[key])
}

/**
 * Names of the sheets processed only when present
 */
export function optionalSheetNames(config: UploadConfig): string[] {
  return OPTIONAL_SHEET_KEYS.map((key) => config.sheets[key])
}
