import {CsvError, parse} from 'csv-parse'
import {createReadStream} from 'node:fs'

import type {Delimiter, Fields} from '../types.js'

import {IoError, MalformedRowError, SplitError} from '../errors.js'

function toFields(record: unknown): Fields {
  if (!Array.isArray(record)) {
    throw new TypeError(`expected a record array, got ${typeof record}`)
  }

  return record.map((field) => String(field))
}

function toReadError(error: unknown, inputPath: string): unknown {
  if (error instanceof SplitError) return error
  if (error instanceof CsvError) {
    const line: unknown = error.lines
    return new MalformedRowError(error.message, typeof line === 'number' ? line : undefined, {cause: error})
  }

  if (error instanceof Error && 'code' in error) {
    return new IoError(inputPath, 'cannot read input file', {cause: error})
  }

  return error
}

/**
 * Streams the records of a delimited file, header included.
 *
 * Every record must have as many fields as the first one; a shorter or longer
 * row, or a broken quote, ends the stream with a `MalformedRowError`.
 */
export async function * readRecords(inputPath: string, delimiter: Delimiter): AsyncGenerator<Fields> {
  const input = createReadStream(inputPath)
  const parser = parse({
    bom: true,
    delimiter,
    skip_empty_lines: true,
  })

  input.on('error', (error) => parser.destroy(error))
  input.pipe(parser)

  try {
    for await (const record of parser) {
      yield toFields(record)
    }
  } catch (error) {
    throw toReadError(error, inputPath)
  } finally {
    input.destroy()
    parser.destroy()
  }
}
