import {resolve} from 'node:path'

import type {Delimiter, SplitConfig, SplitFlags} from '../types.js'

import {ConfigurationError} from '../errors.js'
import {DEFAULT_DELIMITER, OUTPUT_DELIMITER, parseDelimiter} from '../utils/delimiter.js'
import {ensureOutputDir, ensureReadableFile} from '../utils/file-system.js'

function requireValue(value: string | undefined, flag: string): string {
  if (value === undefined || value.trim() === '') {
    throw new ConfigurationError(`missing required option --${flag}`)
  }

  return value
}

/**
 * Validates raw flag values into the configuration a split run works from.
 * Checks the input file and prepares the output directory, so every
 * configuration problem surfaces here before a single row is read.
 */
export function resolveSplitConfig(flags: SplitFlags, fallbackDelimiter: Delimiter = DEFAULT_DELIMITER): SplitConfig {
  const inputPath = resolve(requireValue(flags.path, 'path'))
  const groupColumn = requireValue(flags.column, 'column')
  const outputDir = resolve(requireValue(flags.dir, 'dir'))
  const inputDelimiter = flags.delimiter === undefined ? fallbackDelimiter : parseDelimiter(flags.delimiter)

  ensureReadableFile(inputPath)
  ensureOutputDir(outputDir)

  return Object.freeze({
    append: flags.append ?? false,
    dropGroupColumn: flags.dropColumn ?? false,
    groupColumn,
    inputDelimiter,
    inputPath,
    outputDelimiter: OUTPUT_DELIMITER,
    outputDir,
    splitIntoSubdirs: flags.createDir ?? false,
  })
}
