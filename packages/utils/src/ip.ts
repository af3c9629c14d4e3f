import { InvalidParametersError } from '@libp2p/interface'
import { isIPv4, isIPv6 } from 'node:net'

export { isIPv4, isIPv6 }

/**
 * Strips the brackets URL hosts put around IPv6 literals.
 */
export function unbracketHost(host: string): string {
  return host.startsWith('[') && host.endsWith(']') ? host.slice(1, -1) : host
}

export function ipv4ToBytes(ip: string): Uint8Array {
  if (!isIPv4(ip)) throw new InvalidParametersError(`invalid IPv4 address: ${ip}`)
  return Uint8Array.from(ip.split('.').map((part) => Number.parseInt(part, 10)))
}

export function ipv6ToBytes(ip: string): Uint8Array {
  if (!isIPv6(ip)) throw new InvalidParametersError(`invalid IPv6 address: ${ip}`)

  let text = ip
  const zone = text.indexOf('%')
  if (zone !== -1) text = text.slice(0, zone)

  // trailing dotted quad, e.g. ::ffff:10.0.0.1
  let tail: number[] = []
  const lastColon = text.lastIndexOf(':')
  const last = text.slice(lastColon + 1)
  if (isIPv4(last)) {
    tail = Array.from(ipv4ToBytes(last))
    text = `${text.slice(0, lastColon + 1)}0:0`
  }

  const [head, rest] = text.split('::')
  const left = head === '' ? [] : head.split(':')
  const right = rest === undefined || rest === '' ? [] : rest.split(':')
  const missing = rest === undefined ? 0 : 8 - left.length - right.length
  const groups = [...left, ...new Array<string>(missing).fill('0'), ...right]

  const out = new Uint8Array(16)
  groups.forEach((group, i) => {
    const value = Number.parseInt(group, 16)
    out[i * 2] = value >> 8
    out[i * 2 + 1] = value & 0xff
  })
  if (tail.length === 4) out.set(tail, 12)
  return out
}

export function bytesToIp(bytes: Uint8Array): string {
  if (bytes.length === 4) return Array.from(bytes).join('.')
  if (bytes.length !== 16) {
    throw new InvalidParametersError(`invalid IP byte length: ${bytes.length}`)
  }
  const groups: string[] = []
  for (let i = 0; i < 16; i += 2) {
    groups.push(((bytes[i] << 8) | bytes[i + 1]).toString(16))
  }
  return groups.join(':')
}

export function isLoopback(host: string): boolean {
  const ip = unbracketHost(host)
  if (ip === 'localhost' || ip === 'localhost.localdomain') return true
  if (isIPv4(ip)) return ip.startsWith('127.')
  if (isIPv6(ip)) {
    const bytes = ipv6ToBytes(ip)
    return bytes.subarray(0, 15).every((b) => b === 0) && bytes[15] === 1
  }
  return false
}

/**
 * True when the host is a name or address that cannot be reached from the
 * public internet: localhost names, loopback, private, link-local, shared
 * and unspecified ranges.
 */
export function isLocalHost(host: string): boolean {
  const ip = unbracketHost(host)
  if (isLoopback(ip)) return true

  if (isIPv4(ip)) {
    const [a, b] = ipv4ToBytes(ip)
    return (
      a === 0 ||
      a === 10 ||
      (a === 100 && b >= 64 && b <= 127) ||
      (a === 169 && b === 254) ||
      (a === 172 && b >= 16 && b <= 31) ||
      (a === 192 && b === 168) ||
      a >= 224
    )
  }

  if (isIPv6(ip)) {
    const bytes = ipv6ToBytes(ip)
    if (bytes.every((b) => b === 0)) return true
    // fc00::/7 unique local, fe80::/10 link local, ff00::/8 multicast
    if ((bytes[0] & 0xfe) === 0xfc) return true
    if (bytes[0] === 0xfe && (bytes[1] & 0xc0) === 0x80) return true
    if (bytes[0] === 0xff) return true
    // ::ffff:a.b.c.d
    const mapped =
      bytes.subarray(0, 10).every((b) => b === 0) &&
      bytes[10] === 0xff &&
      bytes[11] === 0xff
    if (mapped) return isLocalHost(bytesToIp(bytes.subarray(12)))
    return false
  }

  return false
}
