import ora from 'ora'

import type {SplitConfig, SplitRunOptions, SplitSummary} from '../types.js'

import {describeError, SchemaError} from '../errors.js'
import {readRecords} from './records.js'
import {RowRouter} from './router.js'

const PROGRESS_INTERVAL = 10_000

/**
 * Splits `config.inputPath` into one file per distinct value of the group column.
 *
 * A single pass: the first record is the header, every other record is routed
 * as it is read. On failure every open output file is still closed before the
 * error propagates; rows already written stay on disk.
 */
export async function splitFile(config: SplitConfig, options: SplitRunOptions = {}): Promise<SplitSummary> {
  const spinner = ora({isSilent: options.silent, text: `Splitting ${config.inputPath} by "${config.groupColumn}"...`}).start()
  let router: RowRouter | undefined
  let rows = 0

  try {
    for await (const record of readRecords(config.inputPath, config.inputDelimiter)) {
      if (!router) {
        router = new RowRouter(record, config)
        continue
      }

      await router.route(record)
      rows++
      if (rows % PROGRESS_INTERVAL === 0) {
        spinner.text = `Routed ${rows} rows into ${router.openFiles} files...`
        options.onProgress?.(rows, router.openFiles)
      }
    }

    if (!router) throw new SchemaError(`input file has no header row: ${config.inputPath}`)

    const files = await router.finalize()
    spinner.succeed(`Split ${rows} rows into ${files.length} files.`)
    return {files, outputDir: config.outputDir, rows}
  } catch (error) {
    spinner.fail(`Split failed after ${rows} rows: ${describeError(error)}`)
    const closeFailures = router ? await router.release() : []
    for (const failure of closeFailures) {
      spinner.warn(`Could not close output file: ${failure.message}`)
    }

    throw error
  }
}
