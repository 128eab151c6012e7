import {relative} from 'node:path'

import type {SplitSummary} from '../types.js'

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`
}

/**
 * Formats the end-of-run report, one entry per line.
 */
export function formatSummary(summary: SplitSummary): string[] {
  const lines = [
    '\nSplit Summary:',
    `- Rows routed: ${summary.rows}`,
    `- Files written: ${summary.files.length}`,
    `- Output directory: ${summary.outputDir}`,
  ]

  for (const file of summary.files) {
    lines.push(`  - ${relative(summary.outputDir, file.path)} (${plural(file.rows, 'row')})`)
  }

  return lines
}
