/**
 * Parent/child pair input for the CLI
 * @module cli/pairs
 */

import { readFile } from 'node:fs/promises'
import type { MergePair } from '../types/identity.js'
import { ConfigurationError } from '../utils/errors.js'

/**
 * Parses `PARENT:CHILD`
 *
 * @throws {ConfigurationError} If the argument is not two non-empty parts
 */
export function parsePairArgument(argument: string): MergePair {
  const parts = argument.split(':').map((part) => part.trim())
  if (parts.length !== 2 || parts[0] === '' || parts[1] === '') {
    throw new ConfigurationError(
      `Invalid pair '${argument}', expected PARENT:CHILD`,
      'pair'
    )
  }
  return { parent: parts[0], child: parts[1] }
}

/**
 * Commander collector for a repeatable `--pair` option
 */
export function collectPair(argument: string, previous: MergePair[] = []): MergePair[] {
  return [...previous, parsePairArgument(argument)]
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Validates parsed JSON as a list of `{ "parent": string, "child": string }`
 *
 * @throws {ConfigurationError} On the first malformed entry
 */
export function parsePairsJson(data: unknown): MergePair[] {
  if (!Array.isArray(data)) {
    throw new ConfigurationError('Pairs file must contain a JSON array', 'pairsFile')
  }
  return data.map((entry: unknown, index) => {
    const parent = isRecord(entry) ? entry.parent : undefined
    const child = isRecord(entry) ? entry.child : undefined
    if (typeof parent !== 'string' || typeof child !== 'string') {
      throw new ConfigurationError(
        `Pairs file entry #${index + 1} must be an object with string 'parent' and 'child'`,
        'pairsFile'
      )
    }
    return { parent: parent.trim(), child: child.trim() }
  })
}

/**
 * Reads a JSON pairs file
 */
export async function loadPairsFile(path: string): Promise<MergePair[]> {
  const text = await readFile(path, 'utf-8')
  let data: unknown
  try {
    data = JSON.parse(text)
  } catch (error) {
    throw new ConfigurationError(
      `Pairs file '${path}' is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      'pairsFile'
    )
  }
  return parsePairsJson(data)
}
