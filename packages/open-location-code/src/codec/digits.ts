/**
 * Alphabet / Digit Table
 *
 * Maps every code symbol (either case) to its digit value.
 * Padding and separator map to -1 so they can be recognised but never
 * contribute to a coordinate.
 */

import { plusCodeKeywords } from '../vocabulary'

const { alphabet, padding, separator } = plusCodeKeywords

const NON_DIGIT = -1

const paddingRun = new RegExp(`${padding}+`, 'g')

function buildDigitTable(): ReadonlyMap<string, number> {
  const table = new Map<string, number>()

  Array.from(alphabet).forEach((symbol, value) => {
    table.set(symbol, value)
    table.set(symbol.toLowerCase(), value)
  })

  table.set(padding, NON_DIGIT)
  table.set(separator, NON_DIGIT)

  return table
}

// Built once at module load, never written afterwards
const digitTable = buildDigitTable()

/**
 * Read-only view of the digit table
 */
export function getDigitTable(): ReadonlyMap<string, number> {
  return digitTable
}

/**
 * Digit value of a symbol: 0-19 for alphabet symbols, -1 for padding and
 * separator, undefined for anything else
 */
export function getDigitValue(symbol: string): number | undefined {
  return digitTable.get(symbol)
}

/**
 * Symbol for a digit value (0-19)
 */
export function getSymbol(value: number): string {
  return alphabet.charAt(value)
}

/**
 * Contiguous runs of the padding symbol, in order
 *
 * @example
 * getPaddingRuns('8F0000+') // ['0000']
 */
export function getPaddingRuns(code: string): Array<string> {
  return code.match(paddingRun) ?? []
}

/**
 * Strip separator and padding, uppercase what is left
 *
 * @example
 * toSignificantDigits('8fvc0000+') // '8FVC'
 */
export function toSignificantDigits(code: string): string {
  return code.split(separator).join('').replace(paddingRun, '').toUpperCase()
}
