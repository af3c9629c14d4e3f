import { InvalidParametersError } from '@libp2p/interface'
import { type Multiaddr, multiaddr } from '@multiformats/multiaddr'
import { isIPv4, isIPv6, unbracketHost } from './ip'

export interface TcpNetConfig {
  type: 'tcp'
  host: string
  port: number
  family: 4 | 6
}

export interface IpcNetConfig {
  type: 'ipc'
  path: string
}

export type NetConfig = TcpNetConfig | IpcNetConfig

export function hostPortToMultiaddr(
  host: string,
  port: number | string,
): Multiaddr {
  const ip = unbracketHost(host)
  const p = typeof port === 'string' ? Number.parseInt(port, 10) : port

  if (!Number.isInteger(p) || p < 0 || p > 65535) {
    throw new InvalidParametersError(`invalid port provided: ${port}`)
  }
  if (ip === '') {
    throw new InvalidParametersError('empty host')
  }

  if (isIPv4(ip)) return multiaddr(`/ip4/${ip}/tcp/${p}`)
  if (isIPv6(ip)) return multiaddr(`/ip6/${ip}/tcp/${p}`)
  return multiaddr(`/dns/${ip}/tcp/${p}`)
}

/**
 * Resolves a `scheme://host:port` or `unix:///path` URL into the options
 * `net.connect` and `server.listen` take.
 */
export function urlToNetConfig(url: URL): NetConfig {
  if (url.protocol === 'unix:') {
    if (!url.pathname.startsWith('/')) {
      throw new InvalidParametersError(`unix address must be absolute: ${url.href}`)
    }
    return { type: 'ipc', path: decodeURIComponent(url.pathname) }
  }

  if (url.hostname === '' || url.port === '') {
    throw new InvalidParametersError(`address needs host and port: ${url.href}`)
  }

  return multiaddrToNetConfig(hostPortToMultiaddr(url.hostname, url.port))
}

export function multiaddrToNetConfig(ma: Multiaddr): TcpNetConfig {
  const { family, address, port } = ma.nodeAddress()
  return {
    type: 'tcp',
    host: address,
    port,
    family: family === 6 ? 6 : 4,
  }
}
