import debug from 'debug'
import type { Duplex } from 'node:stream'
import { unbracketHost, urlToNetConfig } from '@meshwork/utils'
import {
  type Address,
  dialScheme,
  parseAddress,
  schemeOf,
  type TransportScheme,
} from '../address'
import { ConfigError, ErrorCode } from '../errors'
import { type ProxyUrl, parseProxyUrl, type Settings } from '../settings'
import { TransportListener } from './listener'
import { dialSocks5 } from './socks5'
import { connectSocket, timeoutError } from './tcp'
import { TlsUpgrader, type TlsUpgraderInit } from './tls/tls-upgrader'
import type { DialOptions } from './tcp'
import type { Listener, Transport } from './types'

export * from './listener'
export * from './socks5'
export * from './stream-reader'
export * from './tcp'
export * from './tls/cert'
export * from './tls/tls-upgrader'
export * from './types'

const log = debug('meshwork:transport')

export type TransportsInit = Pick<
  Settings,
  'allowedTransports' | 'transportMixing' | 'torSocksProxy' | 'channelHandshakeTimeout'
> & {
  tls?: TlsUpgrader | TlsUpgraderInit
}

/**
 * The built-in transports: tcp, tcp+tls, unix, and tor / tor+tls through a
 * SOCKS5 proxy. Dials a disallowed scheme through its mixing substitute
 * when mixing is on.
 */
export class Transports implements Transport {
  readonly tls: TlsUpgrader
  private readonly proxy: ProxyUrl

  constructor(private readonly init: TransportsInit) {
    this.tls = init.tls instanceof TlsUpgrader ? init.tls : new TlsUpgrader(init.tls)
    const proxy = parseProxyUrl(init.torSocksProxy)
    if (proxy === undefined) {
      throw new ConfigError(`invalid SOCKS5 proxy ${init.torSocksProxy}`, {
        code: ErrorCode.INVALID_ADDRESS,
      })
    }
    this.proxy = proxy
  }

  async dial(addr: Address, options: DialOptions): Promise<Duplex> {
    const url = parseAddress(addr)
    const via = dialScheme(schemeOf(addr), this.init.allowedTransports, this.init.transportMixing)
    if (via === undefined) {
      throw new ConfigError(`transport of ${addr} is not allowed`, {
        code: ErrorCode.DISALLOWED_TRANSPORT,
        context: { address: addr },
      })
    }

    const deadline = AbortSignal.timeout(options.timeout)
    const signal =
      options.signal === undefined ? deadline : AbortSignal.any([options.signal, deadline])
    log('dialing %s via %s', addr, via)
    try {
      return await this.dialVia(via, url, { timeout: options.timeout, signal })
    } catch (err) {
      if (deadline.aborted && options.signal?.aborted !== true) {
        throw timeoutError(addr, options.timeout)
      }
      throw err
    }
  }

  async listen(addr: Address): Promise<Listener> {
    const scheme = schemeOf(addr)
    if (!this.init.allowedTransports.includes(scheme)) {
      throw new ConfigError(`cannot listen on ${addr}: transport not allowed`, {
        code: ErrorCode.DISALLOWED_TRANSPORT,
        context: { address: addr },
      })
    }
    if (scheme === 'tor' || scheme === 'tor+tls') {
      throw new ConfigError(`cannot listen on ${addr}: tor transports dial only`, {
        code: ErrorCode.DISALLOWED_TRANSPORT,
        context: { address: addr },
      })
    }

    const listener = new TransportListener({
      address: addr,
      upgradeTimeout: this.init.channelHandshakeTimeout,
      upgrade:
        scheme === 'tcp+tls'
          ? async (socket, signal) => (await this.tls.upgradeInbound(socket, signal)).socket
          : undefined,
    })
    await listener.listen()
    return listener
  }

  private async dialVia(via: TransportScheme, url: URL, options: DialOptions): Promise<Duplex> {
    switch (via) {
      case 'unix': {
        const config = urlToNetConfig(url)
        if (config.type !== 'ipc') throw new Error(`not a unix address: ${url.href}`)
        return connectSocket({ path: config.path }, options)
      }
      case 'tcp':
        return connectSocket(this.hostPort(url), options)
      case 'tcp+tls': {
        const socket = await connectSocket(this.hostPort(url), options)
        return (await this.tls.upgradeOutbound(socket, options.signal)).socket
      }
      case 'tor':
        return dialSocks5(this.proxy, this.hostPort(url), options)
      case 'tor+tls': {
        const socket = await dialSocks5(this.proxy, this.hostPort(url), options)
        return (await this.tls.upgradeOutbound(socket, options.signal)).socket
      }
    }
  }

  private hostPort(url: URL): { host: string; port: number } {
    return { host: unbracketHost(url.hostname), port: Number.parseInt(url.port, 10) }
  }
}
