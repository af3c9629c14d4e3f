import debug from 'debug'
import type { Socket } from 'node:net'
import type { Duplex } from 'node:stream'
import {
  bytesToIp,
  bytesToUtf8,
  concatBytes,
  ipv4ToBytes,
  ipv6ToBytes,
  isIPv4,
  isIPv6,
  unbracketHost,
  utf8ToBytes,
} from '@meshwork/utils'
import { ConfigError, ConnectError, ErrorCode } from '../errors'
import type { ProxyUrl } from '../settings'
import { StreamReader, writeAll } from './stream-reader'
import { withTimeout } from '../system/time'
import { connectSocket, type DialOptions, timeoutError } from './tcp'

const log = debug('meshwork:transport:socks5')

const SOCKS_VERSION = 0x05
const METHOD_NO_AUTH = 0x00
const METHOD_NONE_ACCEPTABLE = 0xff
const CMD_CONNECT = 0x01

export const ATYP_IPV4 = 0x01
export const ATYP_DOMAIN = 0x03
export const ATYP_IPV6 = 0x04

const REPLY_ERRORS: Record<number, [ErrorCode, string]> = {
  0x01: [ErrorCode.CONNECT_FAILED, 'general SOCKS server failure'],
  0x02: [ErrorCode.CONNECTION_NOT_ALLOWED, 'connection not allowed by ruleset'],
  0x03: [ErrorCode.NETWORK_UNREACHABLE, 'network unreachable'],
  0x04: [ErrorCode.HOST_UNREACHABLE, 'host unreachable'],
  0x05: [ErrorCode.CONNECTION_REFUSED, 'connection refused'],
  0x06: [ErrorCode.CONNECT_TIMEOUT, 'TTL expired'],
  0x07: [ErrorCode.PROXY_COMMAND_NOT_SUPPORTED, 'command not supported'],
  0x08: [ErrorCode.PROXY_ADDRESS_TYPE_NOT_SUPPORTED, 'address type not supported'],
}

export interface SocksTarget {
  host: string
  port: number
}

/** Address the proxy reports it bound for the tunnel */
export interface SocksBoundAddress {
  host: string
  port: number
}

function encodeTarget(target: SocksTarget): Uint8Array {
  const host = unbracketHost(target.host)
  const port = Uint8Array.of((target.port >>> 8) & 0xff, target.port & 0xff)

  if (isIPv4(host)) {
    return concatBytes(Uint8Array.of(ATYP_IPV4), ipv4ToBytes(host), port)
  }
  if (isIPv6(host)) {
    return concatBytes(Uint8Array.of(ATYP_IPV6), ipv6ToBytes(host), port)
  }

  const name = utf8ToBytes(host)
  if (name.length === 0 || name.length > 255) {
    throw new ConfigError(`SOCKS5 hostname must be 1-255 bytes: ${host}`, {
      code: ErrorCode.INVALID_ADDRESS,
      context: { address: host },
    })
  }
  return concatBytes(Uint8Array.of(ATYP_DOMAIN, name.length), name, port)
}

function proxyError(code: ErrorCode, message: string, socksReply?: number): ConnectError {
  return new ConnectError(`SOCKS5: ${message}`, {
    code,
    context: { operation: 'socks5', socksReply },
  })
}

/**
 * Runs the SOCKS5 no-auth CONNECT exchange over `stream`. On success the
 * stream carries the tunnelled connection to `target`; on any failure it is
 * destroyed.
 */
export async function socks5Connect(
  stream: Duplex,
  target: SocksTarget,
  signal?: AbortSignal,
): Promise<SocksBoundAddress> {
  try {
    return await negotiate(stream, target, signal)
  } catch (err) {
    stream.destroy()
    throw err
  }
}

async function negotiate(
  stream: Duplex,
  target: SocksTarget,
  signal?: AbortSignal,
): Promise<SocksBoundAddress> {
  const request = encodeTarget(target)
  const reader = new StreamReader(stream)

  await writeAll(stream, Uint8Array.of(SOCKS_VERSION, 1, METHOD_NO_AUTH))
  const [version, method] = await reader.readExact(2, signal)
  if (version !== SOCKS_VERSION) {
    throw proxyError(ErrorCode.PROXY_UNSUPPORTED_VERSION, `unsupported version ${version}`)
  }
  if (method === METHOD_NONE_ACCEPTABLE || method !== METHOD_NO_AUTH) {
    throw proxyError(ErrorCode.PROXY_NO_ACCEPTABLE_METHODS, 'no acceptable auth methods')
  }

  await writeAll(stream, concatBytes(Uint8Array.of(SOCKS_VERSION, CMD_CONNECT, 0x00), request))

  const [replyVersion, reply, rsv, atyp] = await reader.readExact(4, signal)
  if (replyVersion !== SOCKS_VERSION) {
    throw proxyError(ErrorCode.PROXY_UNSUPPORTED_VERSION, `unsupported version ${replyVersion}`)
  }
  if (reply !== 0x00) {
    const [code, message] = REPLY_ERRORS[reply] ?? [
      ErrorCode.PROXY_UNASSIGNED_REPLY,
      `unassigned reply 0x${reply.toString(16).padStart(2, '0')}`,
    ]
    throw proxyError(code, message, reply)
  }
  if (rsv !== 0x00) {
    throw proxyError(ErrorCode.PROXY_MALFORMED_REPLY, 'reserved byte not zero')
  }

  let host: string
  switch (atyp) {
    case ATYP_IPV4:
      host = bytesToIp(await reader.readExact(4, signal))
      break
    case ATYP_IPV6:
      host = bytesToIp(await reader.readExact(16, signal))
      break
    case ATYP_DOMAIN: {
      const len = await reader.readByte(signal)
      host = bytesToUtf8(await reader.readExact(len, signal))
      break
    }
    default:
      throw proxyError(ErrorCode.PROXY_MALFORMED_REPLY, `unknown address type ${atyp}`)
  }
  const [hi, lo] = await reader.readExact(2, signal)
  const bound = { host, port: (hi << 8) | lo }
  log('tunnel to %s:%d open, proxy bound %s:%d', target.host, target.port, bound.host, bound.port)
  return bound
}

/**
 * Connects to `proxy` and opens a tunnel to `target` through it.
 */
export async function dialSocks5(
  proxy: ProxyUrl,
  target: SocksTarget,
  options: DialOptions,
): Promise<Socket> {
  if (proxy.username !== undefined || proxy.password !== undefined) {
    log('proxy credentials configured but not sent, only no-auth is offered')
  }

  const startedAt = Date.now()
  const socket = await connectSocket({ host: proxy.host, port: proxy.port }, options)
  const remaining = Math.max(1, options.timeout - (Date.now() - startedAt))
  try {
    await withTimeout(
      socks5Connect(socket, target, options.signal),
      remaining,
      () => timeoutError(`${target.host}:${target.port}`, options.timeout),
      options.signal,
    )
    return socket
  } catch (err) {
    socket.destroy()
    throw err
  }
}
