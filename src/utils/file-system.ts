import {accessSync, constants, existsSync, mkdirSync, statSync} from 'node:fs'

import {ConfigurationError, describeError} from '../errors.js'

/**
 * Checks that `filePath` names a regular file this process can read.
 */
export function ensureReadableFile(filePath: string): void {
  if (!existsSync(filePath)) {
    throw new ConfigurationError(`input file not found: ${filePath}`)
  }

  if (!statSync(filePath).isFile()) {
    throw new ConfigurationError(`input path is not a file: ${filePath}`)
  }

  try {
    accessSync(filePath, constants.R_OK)
  } catch (error) {
    throw new ConfigurationError(`input file is not readable: ${filePath}`, {cause: error})
  }
}

/**
 * Creates the output directory when it is missing and checks that it is writable.
 */
export function ensureOutputDir(dirPath: string): void {
  if (existsSync(dirPath)) {
    if (!statSync(dirPath).isDirectory()) {
      throw new ConfigurationError(`output path is not a directory: ${dirPath}`)
    }
  } else {
    try {
      mkdirSync(dirPath, {recursive: true})
    } catch (error) {
      throw new ConfigurationError(`cannot create output directory ${dirPath} (${describeError(error)})`, {cause: error})
    }
  }

  try {
    accessSync(dirPath, constants.W_OK)
  } catch (error) {
    throw new ConfigurationError(`output directory is not writable: ${dirPath}`, {cause: error})
  }
}

export function isNonEmptyFile(filePath: string): boolean {
  return existsSync(filePath) && statSync(filePath).size > 0
}
