// XOR distance over 256-bit identifiers, used to order peers by proximity

import { bytesToHex, utf8ToBytes } from '@meshwork/utils'
import { keccak256 } from 'ethereum-cryptography/keccak.js'

export const ID_BITS = 256

/**
 * XOR two Uint8Arrays of potentially different lengths.
 */
export function xor(a: Uint8Array, b: Uint8Array): Uint8Array {
  const length = Math.min(a.length, b.length)
  const result = new Uint8Array(length)
  for (let i = 0; i < length; ++i) {
    result[i] = a[i] ^ b[i]
  }
  return result
}

/**
 * Calculate XOR distance as a bigint for exact comparisons.
 */
export function xorDistanceBigInt(a: Uint8Array, b: Uint8Array): bigint {
  const xored = xor(a, b)
  if (xored.length === 0) return 0n
  return BigInt(`0x${bytesToHex(xored)}`)
}

/**
 * Number of leading zero bits in a byte string.
 */
export function leadingZeros(bytes: Uint8Array): number {
  let zeros = 0
  for (const byte of bytes) {
    if (byte === 0) {
      zeros += 8
      continue
    }
    return zeros + Math.clz32(byte) - 24
  }
  return zeros
}

/**
 * Bucket for `other` as seen from `self`: `nBuckets - leadingZeros(self ^ other)`
 * clamped to `[0, nBuckets - 1]`, and 0 for identical ids. The clamp keeps
 * identifiers wider than `nBuckets` bits in range at both ends.
 */
export function bucketIndex(
  self: Uint8Array,
  other: Uint8Array,
  nBuckets = ID_BITS,
): number {
  const distance = xor(self, other)
  if (distance.every((b) => b === 0)) return 0
  const idx = nBuckets - leadingZeros(distance)
  return Math.min(nBuckets - 1, Math.max(0, idx))
}

/**
 * Hash a string ID into a fixed-size key using keccak256.
 */
export function hashToId(data: string | Uint8Array): Uint8Array {
  const input = typeof data === 'string' ? utf8ToBytes(data) : data
  return keccak256(input)
}

/**
 * Sorts `items` by XOR distance of `toId(item)` to `key`, closest first.
 * Returns a new array.
 */
export function sortByDistance<T>(
  key: Uint8Array,
  items: readonly T[],
  toId: (item: T) => Uint8Array,
): T[] {
  return items
    .map((item) => ({ item, dist: xorDistanceBigInt(key, toId(item)) }))
    .sort((a, b) => (a.dist < b.dist ? -1 : a.dist > b.dist ? 1 : 0))
    .map(({ item }) => item)
}

export { xorDistanceBigInt as distance }
