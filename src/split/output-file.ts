import {stringify} from 'csv-stringify/sync'
import {once} from 'node:events'
import {createWriteStream, statSync, type WriteStream} from 'node:fs'
import {finished} from 'node:stream/promises'

import type {Delimiter, Fields, OutputFileSummary} from '../types.js'

import {IoError} from '../errors.js'

/**
 * Serialises one record as a single output line. Fields holding the delimiter,
 * a double quote or a line break are quoted; everything else is written as is.
 * A record made of one empty field is written as `""` so it does not become a blank line.
 */
export function formatRecord(fields: Fields, delimiter: Delimiter): string {
  return stringify([fields], {
    delimiter,
    eof: true,
    quoted_empty: fields.length === 1,
    record_delimiter: 'unix',
  })
}

/**
 * A buffered writer for one group's output file.
 */
export class OutputFile {
  rows = 0
  private closed = false
  private identity: {dev: number; ino: number} | undefined
  private failure: Error | null = null
  private readonly stream: WriteStream

  constructor(
    readonly key: string,
    readonly path: string,
    private readonly delimiter: Delimiter,
    append: boolean,
  ) {
    this.stream = createWriteStream(path, {flags: append ? 'a' : 'w'})
    // Reported by the next write or by close().
    this.stream.on('error', (error) => {
      this.failure = error
    })
  }

  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    this.stream.end()
    try {
      await finished(this.stream)
    } catch (error) {
      throw new IoError(this.path, 'cannot write output file', {cause: error})
    }
  }

  isSameFile(dev: number, ino: number): boolean {
    return this.identity !== undefined && this.identity.dev === dev && this.identity.ino === ino
  }

  /**
   * Waits for the file to be opened and records which file it is on disk.
   */
  async ready(): Promise<void> {
    try {
      if (this.stream.pending) await once(this.stream, 'ready')
    } catch (error) {
      throw new IoError(this.path, 'cannot open output file', {cause: error})
    }

    const {dev, ino} = statSync(this.path)
    this.identity = {dev, ino}
  }

  summary(): OutputFileSummary {
    return {key: this.key, path: this.path, rows: this.rows}
  }

  async writeHeader(header: Fields): Promise<void> {
    await this.writeLine(formatRecord(header, this.delimiter))
  }

  async writeRow(fields: Fields): Promise<void> {
    await this.writeLine(formatRecord(fields, this.delimiter))
    this.rows++
  }

  private async writeLine(line: string): Promise<void> {
    if (this.failure) {
      throw new IoError(this.path, 'cannot write output file', {cause: this.failure})
    }

    if (!this.stream.write(line)) {
      try {
        await once(this.stream, 'drain')
      } catch (error) {
        throw new IoError(this.path, 'cannot write output file', {cause: error})
      }
    }
  }
}
