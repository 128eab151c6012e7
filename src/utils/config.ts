import Conf from 'conf'

import type {Delimiter} from '../types.js'

import {DEFAULT_DELIMITER, isDelimiter} from './delimiter.js'

interface SettingsSchema {
  defaultDelimiter: string
}

export type SettingsStore = Conf<SettingsSchema>

export function createSettingsStore(cwd?: string): SettingsStore {
  return new Conf<SettingsSchema>({
    cwd,
    projectName: 'csv-split',
    schema: {
      defaultDelimiter: {
        default: DEFAULT_DELIMITER,
        enum: ['\t', ',', ';', '|'],
        type: 'string',
      },
    },
  })
}

let settings: SettingsStore | undefined

// Opened on first use so that commands which never read settings don't touch the config dir.
function getSettings(): SettingsStore {
  settings ??= createSettingsStore(process.env.CSV_SPLIT_CONFIG_DIR)
  return settings
}

export function getDefaultDelimiter(store: SettingsStore = getSettings()): Delimiter {
  const stored = store.get('defaultDelimiter')
  return isDelimiter(stored) ? stored : DEFAULT_DELIMITER
}

export function saveDefaultDelimiter(delimiter: Delimiter, store: SettingsStore = getSettings()): void {
  store.set('defaultDelimiter', delimiter)
}

export function getConfigPath(store: SettingsStore = getSettings()): string {
  return store.path
}
