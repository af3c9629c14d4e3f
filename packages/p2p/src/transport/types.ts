import type { EventEmitter } from 'eventemitter3'
import type { Duplex } from 'node:stream'
import type { Address } from '../address'
import type { DialOptions } from './tcp'

export interface ListenerEvents {
  /** An accepted stream, upgraded where the scheme requires it */
  connection: (stream: Duplex, remote: Address) => void
  error: (error: Error) => void
  close: () => void
}

export interface Listener extends EventEmitter<ListenerEvents> {
  /** Address actually bound, with the kernel-assigned port filled in */
  readonly boundAddress: Address
  close(): Promise<void>
}

/**
 * Dials and listens on transport addresses. Sessions only ever see byte
 * streams; framing and encryption differences stay behind this interface.
 */
export interface Transport {
  dial(addr: Address, options: DialOptions): Promise<Duplex>
  listen(addr: Address): Promise<Listener>
}
