import {Command, Flags} from '@oclif/core'

import {SplitError} from './errors.js'
import {resolveSplitConfig} from './split/options.js'
import {splitFile} from './split/split-file.js'
import {getConfigPath, getDefaultDelimiter, saveDefaultDelimiter} from './utils/config.js'
import {describeDelimiter} from './utils/delimiter.js'
import {formatSummary} from './utils/formatting.js'

const EXAMPLE_SPLIT = `$ csv-split -p cities.csv -c State -o out\nWrite out/CA.csv, out/NY.csv, ... one file per State value`
const EXAMPLE_SUBDIRS = `$ csv-split -p cities.csv -c State -o out --create-dir\nWrite out/CA/CA.csv, out/NY/NY.csv, ...`
const EXAMPLE_DELIMITER = `$ csv-split -p export.txt -d tab -c Region -o regions --remember-delimiter\nSplit a tab-separated file and make tab the default input delimiter`

export default class CsvSplit extends Command {
  static description = 'Split a delimited file into one pipe-delimited file per value of a column'
  static enableJsonFlag = false
  static examples = [
    EXAMPLE_SPLIT,
    EXAMPLE_SUBDIRS,
    EXAMPLE_DELIMITER,
  ]
  static flags = {
    append: Flags.boolean({
      char: 'a',
      description: 'Append to existing output files instead of overwriting them',
    }),
    column: Flags.string({
      char: 'c',
      description: 'Column to split the file by',
      required: true,
    }),
    'create-dir': Flags.boolean({
      char: 'r',
      description: 'Save each file in a directory named after its column value',
    }),
    delimiter: Flags.string({
      char: 'd',
      description: 'Delimiter used in the input file: , ; | or tab (default: ",", or the remembered delimiter)',
    }),
    dir: Flags.string({
      char: 'o',
      description: 'Output directory for the split files',
      required: true,
    }),
    'drop-column': Flags.boolean({
      char: 'x',
      description: 'Leave the split column out of the output files',
    }),
    help: Flags.help({char: 'h', description: 'Show CLI help'}),
    path: Flags.string({
      char: 'p',
      description: 'Path to the file to split',
      required: true,
    }),
    'remember-delimiter': Flags.boolean({
      dependsOn: ['delimiter'],
      description: 'Use --delimiter as the default for later runs',
    }),
    version: Flags.version({char: 'v', description: 'Show CLI version'}),
  }

  async run(): Promise<void> {
    const {flags} = await this.parse(CsvSplit)

    try {
      const config = resolveSplitConfig(
        {
          append: flags.append,
          column: flags.column,
          createDir: flags['create-dir'],
          delimiter: flags.delimiter,
          dir: flags.dir,
          dropColumn: flags['drop-column'],
          path: flags.path,
        },
        getDefaultDelimiter(),
      )

      if (flags['remember-delimiter']) {
        saveDefaultDelimiter(config.inputDelimiter)
        this.log(`Default delimiter set to ${describeDelimiter(config.inputDelimiter)} (${getConfigPath()})`)
      }

      this.log(`Reading file: ${config.inputPath}`)
      const summary = await splitFile(config)
      for (const line of formatSummary(summary)) {
        this.log(line)
      }
    } catch (error) {
      if (error instanceof SplitError) {
        this.error(`${error.kind} error: ${error.message}`, {exit: error.exitCode})
      }

      throw error
    }
  }
}
