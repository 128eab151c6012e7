export type Delimiter = '\t' | ',' | ';' | '|'

export type Fields = string[]

export interface SplitConfig {
  readonly append: boolean
  readonly dropGroupColumn: boolean
  readonly groupColumn: string
  readonly inputDelimiter: Delimiter
  readonly inputPath: string
  readonly outputDelimiter: Delimiter
  readonly outputDir: string
  readonly splitIntoSubdirs: boolean
}

/**
 * Raw option values as they come off the command line, before validation.
 */
export interface SplitFlags {
  append?: boolean
  column?: string
  createDir?: boolean
  delimiter?: string
  dir?: string
  dropColumn?: boolean
  path?: string
}

export interface OutputFileSummary {
  key: string
  path: string
  rows: number
}

export interface SplitSummary {
  files: OutputFileSummary[]
  outputDir: string
  rows: number
}

export interface SplitRunOptions {
  /** Called every 10,000 routed rows with the rows so far and the files open. */
  onProgress?: (rows: number, files: number) => void
  /** Suppress the progress spinner. */
  silent?: boolean
}
