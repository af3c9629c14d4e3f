import { concat } from 'uint8arrays/concat'
import { equals } from 'uint8arrays/equals'
import { fromString } from 'uint8arrays/from-string'
import { toString } from 'uint8arrays/to-string'

export const utf8ToBytes = (str: string): Uint8Array => fromString(str, 'utf8')

export const bytesToUtf8 = (bytes: Uint8Array): string => toString(bytes, 'utf8')

export const bytesToHex = (bytes: Uint8Array): string =>
  toString(bytes, 'base16')

export const bytesToBase64 = (bytes: Uint8Array): string =>
  toString(bytes, 'base64pad')

export const concatBytes = (...arrays: Uint8Array[]): Uint8Array =>
  concat(arrays)

export const equalsBytes = (a: Uint8Array, b: Uint8Array): boolean =>
  equals(a, b)

/**
 * Minimal big-endian encoding of a non-negative safe integer. Zero encodes
 * as an empty array.
 */
export function intToBytes(value: number): Uint8Array {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`cannot encode ${value} as unsigned integer bytes`)
  }
  const out: number[] = []
  let n = value
  while (n > 0) {
    out.unshift(n % 256)
    n = Math.floor(n / 256)
  }
  return Uint8Array.from(out)
}

export function bytesToInt(bytes: Uint8Array): number {
  let n = 0
  for (const b of bytes) {
    n = n * 256 + b
  }
  if (!Number.isSafeInteger(n)) {
    throw new RangeError('integer exceeds safe range')
  }
  return n
}

export const writeUint32BE = (value: number): Uint8Array => {
  const out = new Uint8Array(4)
  new DataView(out.buffer).setUint32(0, value, false)
  return out
}

export const readUint32BE = (bytes: Uint8Array, offset = 0): number =>
  new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getUint32(
    offset,
    false,
  )
