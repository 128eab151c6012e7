import {existsSync, mkdirSync, statSync} from 'node:fs'
import {join} from 'node:path'

import type {Fields, OutputFileSummary, SplitConfig} from '../types.js'

import {ColumnNotFoundError, describeError, GroupKeyCollisionError, IoError, UnsafeGroupKeyError} from '../errors.js'
import {isNonEmptyFile} from '../utils/file-system.js'
import {OutputFile} from './output-file.js'

export const UNKNOWN_GROUP = 'unknown'

export function resolveColumnIndex(header: readonly string[], columnName: string): number {
  const index = header.indexOf(columnName)
  if (index === -1) throw new ColumnNotFoundError(columnName, header)
  return index
}

/**
 * Returns the value a record is grouped by. Blank values map to `unknown`.
 */
export function computeGroupKey(record: readonly string[], index: number): string {
  if (index < 0 || index >= record.length) {
    throw new RangeError(`group column index ${index} is outside a record of ${record.length} fields`)
  }

  const value = record[index]
  return value.trim() === '' ? UNKNOWN_GROUP : value
}

export function isSafeGroupKey(key: string): boolean {
  return key !== '.' && key !== '..' && !/[/\\\0]/.test(key)
}

export function outputPathFor(outputDir: string, splitIntoSubdirs: boolean, key: string): string {
  return splitIntoSubdirs ? join(outputDir, key, `${key}.csv`) : join(outputDir, `${key}.csv`)
}

/**
 * Routes records to one output file per group key.
 *
 * Writers are opened on the first record of a key and kept until `finalize()`,
 * so no key ever has two handles on its file and earlier rows are never truncated.
 */
export class RowRouter {
  readonly groupIndex: number
  private readonly header: Fields
  private readonly writers = new Map<string, OutputFile>()

  constructor(header: Fields, private readonly config: SplitConfig) {
    this.groupIndex = resolveColumnIndex(header, config.groupColumn)
    this.header = this.project(header)
  }

  get openFiles(): number {
    return this.writers.size
  }

  async finalize(): Promise<OutputFileSummary[]> {
    const failures = await this.release()
    if (failures.length > 0) throw failures[0]
    return [...this.writers.values()].map((writer) => writer.summary())
  }

  async getOrCreateWriter(key: string): Promise<OutputFile> {
    const existing = this.writers.get(key)
    if (existing) return existing

    if (!isSafeGroupKey(key)) throw new UnsafeGroupKeyError(key)

    const {append, outputDelimiter, outputDir, splitIntoSubdirs} = this.config
    const path = outputPathFor(outputDir, splitIntoSubdirs, key)
    if (splitIntoSubdirs) {
      const groupDir = join(outputDir, key)
      if (!existsSync(groupDir)) {
        try {
          mkdirSync(groupDir, {recursive: true})
        } catch (error) {
          throw new IoError(groupDir, `cannot create group directory (${describeError(error)})`, {cause: error})
        }
      }
    }

    // Case-insensitive filesystems (and links) can map two keys onto one file.
    const sameFile = this.writerForFile(path)
    if (sameFile) throw new GroupKeyCollisionError(key, sameFile.key, path)

    const needsHeader = !(append && isNonEmptyFile(path))
    const writer = new OutputFile(key, path, outputDelimiter, append)
    this.writers.set(key, writer)
    await writer.ready()
    if (needsHeader) await writer.writeHeader(this.header)
    return writer
  }

  /**
   * Closes every open writer and returns the errors raised while closing.
   * Used on the failure path, where the original error is what gets reported.
   */
  async release(): Promise<Error[]> {
    const results = await Promise.allSettled([...this.writers.values()].map((writer) => writer.close()))
    return results.flatMap((result) => {
      if (result.status === 'fulfilled') return []
      return [result.reason instanceof Error ? result.reason : new Error(String(result.reason))]
    })
  }

  async route(record: Fields): Promise<string> {
    const key = computeGroupKey(record, this.groupIndex)
    const writer = await this.getOrCreateWriter(key)
    await writer.writeRow(this.project(record))
    return key
  }

  private writerForFile(path: string): OutputFile | undefined {
    if (!existsSync(path)) return undefined
    const {dev, ino} = statSync(path)
    return [...this.writers.values()].find((writer) => writer.isSameFile(dev, ino))
  }

  private project(fields: Fields): Fields {
    if (!this.config.dropGroupColumn) return fields
    return fields.filter((_, index) => index !== this.groupIndex)
  }
}
