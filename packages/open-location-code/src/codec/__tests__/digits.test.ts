/**
 * Digit Table Tests
 */

import { describe, expect, it } from 'vitest'
import { getDigitTable, getDigitValue, plusCodeKeywords } from '@plus-codes/open-location-code'
import { getPaddingRuns, getSymbol, toSignificantDigits } from '../digits'

describe('Digit Table', () => {
  it('should map every alphabet symbol to its position', () => {
    Array.from(plusCodeKeywords.alphabet).forEach((symbol, index) => {
      expect(getDigitValue(symbol)).toBe(index)
    })
  })

  it('should accept lowercase symbols', () => {
    expect(getDigitValue('c')).toBe(8)
    expect(getDigitValue('x')).toBe(19)
    expect(getDigitValue('v')).toBe(getDigitValue('V'))
  })

  it('should map padding and separator to -1', () => {
    expect(getDigitValue('0')).toBe(-1)
    expect(getDigitValue('+')).toBe(-1)
  })

  it('should not know characters outside the format', () => {
    expect(getDigitValue('A')).toBeUndefined()
    expect(getDigitValue('1')).toBeUndefined()
    expect(getDigitValue(' ')).toBeUndefined()
  })

  it('should expose the same table on every call', () => {
    const table = getDigitTable()

    expect(getDigitTable()).toBe(table)
    // 8 digits, 12 letters in two cases, padding and separator
    expect(table.size).toBe(34)
  })

  it('should convert digit values back to symbols', () => {
    expect(getSymbol(0)).toBe('2')
    expect(getSymbol(8)).toBe('C')
    expect(getSymbol(19)).toBe('X')
  })

  it('should strip separator and padding', () => {
    expect(toSignificantDigits('8fvc0000+')).toBe('8FVC')
    expect(toSignificantDigits('8FVC2222+22')).toBe('8FVC222222')
    expect(toSignificantDigits('+2x')).toBe('2X')
  })

  it('should list padding runs in order', () => {
    expect(getPaddingRuns('8F0000+')).toEqual(['0000'])
    expect(getPaddingRuns('8F00V00+')).toEqual(['00', '00'])
    expect(getPaddingRuns('8FVC2222+22')).toEqual([])
  })
})
