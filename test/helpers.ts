import {mkdtempSync, rmSync, writeFileSync} from 'node:fs'
import {tmpdir} from 'node:os'
import {join} from 'node:path'

import type {SplitConfig} from '../src/types.js'

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'csv-split-'))
}

export function removeDir(dir: string): void {
  rmSync(dir, {force: true, recursive: true})
}

export function writeInput(dir: string, content: string, name = 'input.csv'): string {
  const filePath = join(dir, name)
  writeFileSync(filePath, content)
  return filePath
}

export function makeConfig(overrides: Partial<SplitConfig> & Pick<SplitConfig, 'inputPath' | 'outputDir'>): SplitConfig {
  return {
    append: false,
    dropGroupColumn: false,
    groupColumn: 'State',
    inputDelimiter: ',',
    outputDelimiter: '|',
    splitIntoSubdirs: false,
    ...overrides,
  }
}

export async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise
  } catch (error) {
    return error
  }

  throw new Error('expected the promise to reject')
}

export function captureSyncError(fn: () => unknown): unknown {
  try {
    fn()
  } catch (error) {
    return error
  }

  throw new Error('expected the call to throw')
}
