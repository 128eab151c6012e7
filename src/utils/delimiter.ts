import type {Delimiter} from '../types.js'

import {ConfigurationError} from '../errors.js'

export const DEFAULT_DELIMITER: Delimiter = ','
export const OUTPUT_DELIMITER: Delimiter = '|'

const DELIMITER_SPELLINGS = new Map<string, Delimiter>([
  ['\t', '\t'],
  ['\\t', '\t'],
  [',', ','],
  [';', ';'],
  ['comma', ','],
  ['pipe', '|'],
  ['semicolon', ';'],
  ['tab', '\t'],
  ['|', '|'],
])

/**
 * Parses a delimiter given on the command line. Accepts the character itself
 * or its name (`comma`, `semicolon`, `tab`, `pipe`); `\t` may be typed as two characters.
 */
export function parseDelimiter(value: string): Delimiter {
  const delimiter = DELIMITER_SPELLINGS.get(value) ?? DELIMITER_SPELLINGS.get(value.toLowerCase())
  if (!delimiter) {
    throw new ConfigurationError(`invalid delimiter "${value}" (expected one of: , ; | tab)`)
  }

  return delimiter
}

export function isDelimiter(value: string): value is Delimiter {
  return value === '\t' || value === ',' || value === ';' || value === '|'
}

export function describeDelimiter(delimiter: Delimiter): string {
  return delimiter === '\t' ? 'tab' : delimiter
}
