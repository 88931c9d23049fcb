/**
 * Plus Code Codec
 *
 * A configured front for the pure functions in this package.
 * Holds a default code length and an optional reference location, and
 * reports every failed operation through one error hook.
 *
 * @example
 * ```ts
 * const codec = createPlusCodeCodec({
 *   defaultCodeLength: 11,
 *   reference: { latitude: 47.37, longitude: 8.54 },
 *   onError: (error) => metrics.increment(error.kind),
 * })
 *
 * const code = codec.encode(47.3769, 8.5417)
 * const short = codec.shortenNear('8FVC9G8F+6XQ')
 * ```
 */

import {
  PlusCodeError,
  codeLengthSchema,
  latLngSchema,
  plusCodeErrorKeywords,
  plusCodeKeywords,
} from '../vocabulary'
import type { CodeArea, LatLng, PlusCodeResult } from '../vocabulary'
import { decode, encode } from '../codec'
import { isFull, isPadded, isShort, isValid } from '../validation'
import { recoverNearest, shorten } from '../shortening'

const { logPrefix, maxCodeLength } = plusCodeKeywords

/**
 * Options for creating a codec
 */
export type PlusCodeCodecOptions = {
  /**
   * Length used by encode when none is given. Defaults to 10.
   * Values above 15 are accepted and clamped.
   */
  defaultCodeLength?: number

  /**
   * Reference used by shortenNear and recoverNear
   */
  reference?: LatLng

  /**
   * Called with every error a fallible operation returns.
   * Defaults to a console warning.
   */
  onError?: (error: PlusCodeError) => void
}

/**
 * Codec API
 */
export type PlusCodeCodec = {
  readonly defaultCodeLength: number
  readonly reference: LatLng | undefined

  encode: (
    latitude: number,
    longitude: number,
    codeLength?: number,
  ) => PlusCodeResult<string>
  decode: (code: string) => PlusCodeResult<CodeArea>

  isValid: (code: unknown) => boolean
  isShort: (code: unknown) => boolean
  isFull: (code: unknown) => boolean
  isPadded: (code: unknown) => boolean

  shorten: (
    code: string,
    latitude: number,
    longitude: number,
  ) => PlusCodeResult<string>
  recoverNearest: (
    shortCode: string,
    latitude: number,
    longitude: number,
  ) => PlusCodeResult<string>

  /** Shorten against the configured reference */
  shortenNear: (code: string) => PlusCodeResult<string>

  /** Recover against the configured reference */
  recoverNear: (shortCode: string) => PlusCodeResult<string>
}

const warnOnError = (error: PlusCodeError) => {
  console.warn(`${logPrefix} ${error.kind}: ${error.message}`)
}

/**
 * Create a configured codec
 *
 * @throws PlusCodeError when defaultCodeLength or reference is invalid
 */
export function createPlusCodeCodec(
  options: PlusCodeCodecOptions = {},
): PlusCodeCodec {
  const {
    defaultCodeLength = plusCodeKeywords.defaultCodeLength,
    reference,
    onError = warnOnError,
  } = options

  if (!codeLengthSchema.safeParse(defaultCodeLength).success) {
    throw new PlusCodeError(
      plusCodeErrorKeywords.invalidLength,
      `Invalid default code length: ${defaultCodeLength}`,
      defaultCodeLength,
    )
  }

  if (defaultCodeLength > maxCodeLength) {
    console.warn(
      `${logPrefix} Default code length ${defaultCodeLength} exceeds ${maxCodeLength}, codes will have ${maxCodeLength} digits`,
    )
  }

  if (reference !== undefined && !latLngSchema.safeParse(reference).success) {
    throw new PlusCodeError(
      plusCodeErrorKeywords.invalidCoordinate,
      `Reference location must be finite numbers: (${reference.latitude}, ${reference.longitude})`,
      reference,
    )
  }

  const report = <T>(result: PlusCodeResult<T>): PlusCodeResult<T> => {
    if (!result.success) {
      onError(result.error)
    }
    return result
  }

  const requireReference = (): LatLng => {
    if (!reference) {
      throw new Error(`${logPrefix} No reference location configured`)
    }
    return reference
  }

  const api = {
    defaultCodeLength,
    reference,

    encode: (latitude, longitude, codeLength = defaultCodeLength) =>
      report(encode(latitude, longitude, codeLength)),

    decode: (code) => report(decode(code)),

    isValid,
    isShort,
    isFull,
    isPadded,

    shorten: (code, latitude, longitude) =>
      report(shorten(code, latitude, longitude)),

    recoverNearest: (shortCode, latitude, longitude) =>
      report(recoverNearest(shortCode, latitude, longitude)),

    shortenNear: (code) => {
      const { latitude, longitude } = requireReference()
      return report(shorten(code, latitude, longitude))
    },

    recoverNear: (shortCode) => {
      const { latitude, longitude } = requireReference()
      return report(recoverNearest(shortCode, latitude, longitude))
    },
  } satisfies PlusCodeCodec

  return api
}
