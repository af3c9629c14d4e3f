import { ConfigError, ErrorCode } from './errors'

export const TRANSPORT_SCHEMES = ['tcp', 'tcp+tls', 'tor', 'tor+tls', 'unix'] as const

export type TransportScheme = (typeof TRANSPORT_SCHEMES)[number]

/**
 * Normalized `scheme://host:port` (or `unix:///path`) string. Two addresses
 * are the same peer iff their strings are equal.
 */
export type Address = string

/** Schemes a dialer may substitute when the peer's own scheme is not allowed. */
const MIXING_RULES: Partial<Record<TransportScheme, TransportScheme>> = {
  tcp: 'tor',
  'tcp+tls': 'tor+tls',
}

export function isTransportScheme(scheme: string): scheme is TransportScheme {
  return TRANSPORT_SCHEMES.some((s) => s === scheme)
}

export function parseAddress(input: string): URL {
  let url: URL
  try {
    url = new URL(input)
  } catch (err) {
    throw new ConfigError(`invalid address: ${input}`, {
      code: ErrorCode.INVALID_ADDRESS,
      context: { address: input },
      cause: err,
    })
  }

  const scheme = url.protocol.slice(0, -1)
  if (!isTransportScheme(scheme)) {
    throw new ConfigError(`unsupported transport scheme "${scheme}" in ${input}`, {
      code: ErrorCode.DISALLOWED_TRANSPORT,
      context: { address: input },
    })
  }

  if (scheme === 'unix') {
    if (url.host !== '' || !url.pathname.startsWith('/') || url.pathname === '/') {
      throw new ConfigError(`unix address needs an absolute path: ${input}`, {
        code: ErrorCode.INVALID_ADDRESS,
        context: { address: input },
      })
    }
    return url
  }

  if (url.hostname === '' || url.port === '') {
    throw new ConfigError(`address needs host and port: ${input}`, {
      code: ErrorCode.INVALID_ADDRESS,
      context: { address: input },
    })
  }
  if (url.pathname !== '' && url.pathname !== '/') {
    throw new ConfigError(`unexpected path in address: ${input}`, {
      code: ErrorCode.INVALID_ADDRESS,
      context: { address: input },
    })
  }
  return url
}

export function normalizeAddress(input: string | URL): Address {
  const url = typeof input === 'string' ? parseAddress(input) : input
  const scheme = url.protocol.slice(0, -1)
  if (scheme === 'unix') return `unix://${url.pathname}`
  return `${scheme}://${url.hostname.toLowerCase()}:${url.port}`
}

/**
 * `normalizeAddress` that returns undefined instead of throwing.
 */
export function tryNormalizeAddress(input: string): Address | undefined {
  try {
    return normalizeAddress(input)
  } catch {
    return undefined
  }
}

export function schemeOf(addr: Address): string {
  const end = addr.indexOf('://')
  return end === -1 ? '' : addr.slice(0, end)
}

/**
 * Scheme to dial `scheme` peers with, or undefined when neither the scheme
 * nor its mixing substitute is allowed.
 */
export function dialScheme(
  scheme: string,
  allowed: readonly string[],
  mixing: boolean,
): TransportScheme | undefined {
  if (!isTransportScheme(scheme)) return undefined
  if (allowed.includes(scheme)) return scheme
  if (!mixing) return undefined
  const via = MIXING_RULES[scheme]
  return via !== undefined && allowed.includes(via) ? via : undefined
}

/**
 * Every peer scheme that can be dialed under `allowed`, mixing included.
 */
export function dialableSchemes(allowed: readonly string[], mixing: boolean): TransportScheme[] {
  return TRANSPORT_SCHEMES.filter((s) => dialScheme(s, allowed, mixing) !== undefined)
}
