/**
 * Decoder Tests
 */

import { describe, expect, it } from 'vitest'
import {
  PlusCodeError,
  codeBoundsSchema,
  decode,
  decodeOrThrow,
  getCodeAreaBounds,
  plusCodeErrorKeywords,
  safeParseCodeArea,
} from '@plus-codes/open-location-code'

describe('decode', () => {
  it('should decode a 10 digit code', () => {
    const area = decodeOrThrow('8FVC2222+22')

    expect(area.southLatitude).toBe(47)
    expect(area.westLongitude).toBe(8)
    expect(area.latitudeHeight).toBeCloseTo(0.000125, 12)
    expect(area.longitudeWidth).toBeCloseTo(0.000125, 12)
    expect(area.latitudeCenter).toBeCloseTo(47.0000625, 10)
    expect(area.longitudeCenter).toBeCloseTo(8.0000625, 10)
    expect(area.codeLength).toBe(10)
  })

  it('should decode lowercase codes', () => {
    const area = decodeOrThrow('8fvc2222+22')

    expect(area.southLatitude).toBe(47)
    expect(area.westLongitude).toBe(8)
    expect(area.codeLength).toBe(10)
  })

  it('should decode padded codes', () => {
    const area = decodeOrThrow('8FVC0000+')

    expect(area.southLatitude).toBe(47)
    expect(area.westLongitude).toBe(8)
    expect(area.latitudeHeight).toBe(1)
    expect(area.longitudeWidth).toBe(1)
    expect(area.latitudeCenter).toBe(47.5)
    expect(area.longitudeCenter).toBe(8.5)
    expect(area.codeLength).toBe(4)
  })

  it('should decode grid digits as 5x4 sub-cells', () => {
    const area = decodeOrThrow('784P88WC+7C9R525')

    expect(area.codeLength).toBe(15)
    expect(area.southLatitude).toBeCloseTo(12.34567, 9)
    expect(area.westLongitude).toBeCloseTo(-45.679, 6)
    expect(area.latitudeHeight).toBeCloseTo(0.00000004, 14)
    expect(area.longitudeWidth).toBeCloseTo(0.0000001220703125, 14)
  })

  it('should narrow an 11 digit code by one grid step', () => {
    const ten = decodeOrThrow('784P88WC+7C')
    const eleven = decodeOrThrow('784P88WC+7C9')

    expect(eleven.latitudeHeight).toBeCloseTo(ten.latitudeHeight / 5, 14)
    expect(eleven.longitudeWidth).toBeCloseTo(ten.longitudeWidth / 4, 14)
    expect(eleven.codeLength).toBe(11)
  })

  it('should ignore digits past 15', () => {
    const area = decodeOrThrow('8FVC2222+223456789')

    expect(area.codeLength).toBe(15)
  })

  it('should keep the north edge at the pole', () => {
    const bounds = getCodeAreaBounds(decodeOrThrow('CFX30000+'))

    expect(bounds).toEqual({ south: 89, west: 1, north: 90, east: 2 })
    expect(codeBoundsSchema.safeParse(bounds).success).toBe(true)
  })

  it('should produce frozen areas that match the schema', () => {
    const area = decodeOrThrow('8FVC2222+22')

    expect(Object.isFrozen(area)).toBe(true)
    expect(safeParseCodeArea(area).success).toBe(true)
  })

  describe('errors', () => {
    it.each(['2222+22', '+22', '8FVC2222+2', 'not a code', ''])(
      'should reject %j',
      (code) => {
        const result = decode(code)

        expect(result.success).toBe(false)
        if (!result.success) {
          expect(result.error.kind).toBe(plusCodeErrorKeywords.notFullCode)
          expect(result.error.message).toContain(code)
        }
      },
    )

    it('should throw from the throwing variant', () => {
      expect(() => decodeOrThrow('2222+22')).toThrow(PlusCodeError)
    })
  })
})
