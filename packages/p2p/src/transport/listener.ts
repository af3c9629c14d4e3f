import debug from 'debug'
import { EventEmitter } from 'eventemitter3'
import net, { type Server, type Socket } from 'node:net'
import { rm } from 'node:fs/promises'
import type { Duplex } from 'node:stream'
import { isIPv6, urlToNetConfig } from '@meshwork/utils'
import { type Address, normalizeAddress, parseAddress, schemeOf } from '../address'
import type { Listener, ListenerEvents } from './types'

const log = debug('meshwork:transport:listener')

/** Upgrades an accepted socket, e.g. with TLS, before it is handed out */
export type InboundUpgrade = (socket: Socket, signal: AbortSignal) => Promise<Duplex>

export interface TransportListenerInit {
  address: Address
  upgrade?: InboundUpgrade
  /** Milliseconds an accepted socket has to finish its upgrade */
  upgradeTimeout: number
}

type Status = { code: 'INACTIVE' } | { code: 'ACTIVE'; boundAddress: Address }

export class TransportListener extends EventEmitter<ListenerEvents> implements Listener {
  private readonly server: Server
  private readonly sockets = new Set<Socket>()
  private unixAccepted = 0
  private status: Status = { code: 'INACTIVE' }

  constructor(private readonly init: TransportListenerInit) {
    super()
    this.server = net.createServer((socket) => this.onSocket(socket))
    this.server
      .on('error', (err) => {
        log('server error on %s: %s', init.address, err.message)
        this.emit('error', err)
      })
      .on('close', () => {
        log('server on %s closed', init.address)
        this.emit('close')
      })
  }

  get boundAddress(): Address {
    return this.status.code === 'ACTIVE' ? this.status.boundAddress : this.init.address
  }

  async listen(): Promise<void> {
    if (this.status.code === 'ACTIVE') {
      throw new Error(`already listening on ${this.boundAddress}`)
    }
    const config = urlToNetConfig(parseAddress(this.init.address))
    if (config.type === 'ipc') {
      await rm(config.path, { force: true })
    }

    await new Promise<void>((resolve, reject) => {
      this.server.once('error', reject)
      const onListening = (): void => {
        this.server.off('error', reject)
        resolve()
      }
      if (config.type === 'ipc') this.server.listen(config.path, onListening)
      else this.server.listen({ host: config.host, port: config.port }, onListening)
    })

    this.status = { code: 'ACTIVE', boundAddress: this.resolveBound() }
    log('listening on %s', this.boundAddress)
  }

  async close(): Promise<void> {
    if (this.status.code === 'INACTIVE') return
    this.status = { code: 'INACTIVE' }
    for (const socket of this.sockets) socket.destroy()
    this.sockets.clear()
    await new Promise<void>((resolve) => {
      this.server.close(() => resolve())
    })
  }

  private resolveBound(): Address {
    const bound = this.server.address()
    if (bound === null || typeof bound === 'string') return this.init.address
    return this.remoteAddress(bound.address, bound.port)
  }

  private remoteAddress(ip: string | undefined, port: number | undefined): Address {
    const scheme = schemeOf(this.init.address)
    if (scheme === 'unix' || ip === undefined || port === undefined) return this.init.address
    const host = isIPv6(ip) ? `[${ip}]` : ip
    return normalizeAddress(`${scheme}://${host}:${port}`)
  }

  private onSocket(socket: Socket): void {
    if (this.status.code !== 'ACTIVE') {
      log('not listening, dropping socket')
      socket.destroy()
      return
    }

    // unix peers share the listen path, so each stream gets its own suffix
    const remote =
      schemeOf(this.init.address) === 'unix'
        ? `${this.init.address}#${++this.unixAccepted}`
        : this.remoteAddress(socket.remoteAddress, socket.remotePort)
    log('incoming socket from %s', remote)
    this.sockets.add(socket)
    socket.on('error', (err) => log('socket %s error: %s', remote, err.message))
    socket.once('close', () => this.sockets.delete(socket))

    const upgrade = this.init.upgrade
    if (upgrade === undefined) {
      this.emit('connection', socket, remote)
      return
    }

    upgrade(socket, AbortSignal.timeout(this.init.upgradeTimeout)).then(
      (stream) => this.emit('connection', stream, remote),
      (err: unknown) => {
        log('upgrade of %s failed: %s', remote, err instanceof Error ? err.message : String(err))
        socket.destroy()
      },
    )
  }
}
