/**
 * Date utility functions
 * Calendar days are represented as UTC midnight so formatting never drifts with the host time zone
 */

const MONTH_DAY_YEAR = /^(\d{1,2})-(\d{1,2})-(\d{4})$/

/**
 * Parse an MM-DD-YYYY string into a UTC midnight Date
 * Month and day may drop their leading zero (1-4-2025)
 * Returns null when the text does not match or names a day that does not exist
 */
export function parseMonthDayYear(text: string): Date | null {
  const match = MONTH_DAY_YEAR.exec(text.trim())
  if (!match) return null

  const month = Number(match[1])
  const day = Number(match[2])
  const year = Number(match[3])

  const date = new Date(Date.UTC(year, month - 1, day))
  // Date.UTC rolls 02-30 over into March; reject anything that moved
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null
  }
  return date
}

/**
 * Format a UTC calendar day as YYYY-MM-DD
 */
export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10)
}
