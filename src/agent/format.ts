/**
 * Output formatting utilities for the agent console
 */

import chalk from 'chalk'

export function heading(text: string): void {
  console.log(chalk.bold.cyan(`\n${text}`))
  console.log(chalk.dim('─'.repeat(Math.min(text.length + 4, 60))))
}

export function error(text: string): void {
  console.error(chalk.red(`✗ ${text}`))
}

export function warn(text: string): void {
  console.log(chalk.yellow(`! ${text}`))
}

export type TableRow = Record<string, string | number>

export interface TableOptions {
  columns?: string[]
  /** Per-column styling, applied to the cell after it has been padded */
  colors?: Record<string, (cell: string, rowIndex: number) => string>
}

/**
 * Render rows as an aligned table; columns default to the first row's keys
 * Widths are measured on the plain values, so colour codes never shift a column
 */
export function formatTable(rows: TableRow[], options: TableOptions = {}): string[] {
  if (rows.length === 0) {
    return [chalk.dim('  No results')]
  }

  const cols = options.columns ?? Object.keys(rows[0])
  const widths = cols.map((c) => Math.max(c.length, ...rows.map((r) => String(r[c] ?? '').length)))

  const header = cols.map((c, i) => c.padEnd(widths[i])).join('  ')
  const lines = [chalk.bold(`  ${header}`), chalk.dim(`  ${widths.map((w) => '─'.repeat(w)).join('──')}`)]

  rows.forEach((row, rowIndex) => {
    const cells = cols.map((c, i) => {
      const cell = String(row[c] ?? '').padEnd(widths[i])
      const color = options.colors?.[c]
      return color ? color(cell, rowIndex) : cell
    })
    lines.push(`  ${cells.join('  ')}`)
  })
  return lines
}

export function table(rows: TableRow[], options?: TableOptions): void {
  for (const line of formatTable(rows, options)) {
    console.log(line)
  }
}
