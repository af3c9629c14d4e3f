import debug from 'debug'
import { secp256k1 } from 'ethereum-cryptography/secp256k1'
import { LRUCache } from 'lru-cache'
import { pEvent } from 'p-event'
import { createHash } from 'node:crypto'
import type { Socket } from 'node:net'
import { TLSSocket, type TLSSocketOptions, connect as tlsConnect } from 'node:tls'
import { ConnectError, ErrorCode } from '../../errors'
import { type BoundCertificate, generateBoundCertificate, verifyPeerCertificate } from './cert'

const log = debug('meshwork:transport:tls')

export interface TlsUpgraderInit {
  /** secp256k1 node key; a random one is generated when omitted */
  nodeKey?: Uint8Array
  /** Verified certificate fingerprints remembered between handshakes */
  trustedCacheSize?: number
}

export interface SecuredSocket {
  socket: TLSSocket
  /** Compressed secp256k1 key the peer's certificate is bound to */
  remoteNodeKey: Uint8Array
}

/**
 * Wraps raw sockets in TLS 1.3 with self-signed certificates bound to a
 * node key. Chain validation is off; the binding signature is checked instead.
 */
export class TlsUpgrader {
  private readonly nodeKey: Uint8Array
  private readonly trusted: LRUCache<string, Uint8Array>
  private credentials?: Promise<BoundCertificate>

  constructor(init: TlsUpgraderInit = {}) {
    this.nodeKey = init.nodeKey ?? secp256k1.utils.randomPrivateKey()
    this.trusted = new LRUCache({ max: init.trustedCacheSize ?? 1024 })
  }

  get nodePublicKey(): Uint8Array {
    return secp256k1.getPublicKey(this.nodeKey, true)
  }

  async upgradeOutbound(socket: Socket, signal?: AbortSignal): Promise<SecuredSocket> {
    const creds = await this.getCredentials()
    const tlsSocket = tlsConnect({ ...this.baseOptions(creds), socket })
    return this.secure(tlsSocket, 'secureConnect', signal)
  }

  async upgradeInbound(socket: Socket, signal?: AbortSignal): Promise<SecuredSocket> {
    const creds = await this.getCredentials()
    const tlsSocket = new TLSSocket(socket, {
      ...this.baseOptions(creds),
      isServer: true,
      requestCert: true,
    })
    return this.secure(tlsSocket, 'secure', signal)
  }

  private getCredentials(): Promise<BoundCertificate> {
    this.credentials ??= generateBoundCertificate(this.nodeKey)
    return this.credentials
  }

  private baseOptions(creds: BoundCertificate): TLSSocketOptions {
    return {
      cert: creds.certPEM,
      key: creds.keyPEM,
      minVersion: 'TLSv1.3',
      maxVersion: 'TLSv1.3',
      rejectUnauthorized: false,
    }
  }

  private async secure(
    tlsSocket: TLSSocket,
    readyEvent: 'secure' | 'secureConnect',
    signal?: AbortSignal,
  ): Promise<SecuredSocket> {
    try {
      await pEvent(tlsSocket, readyEvent, { signal })
      const remoteNodeKey = await this.verify(tlsSocket)
      return { socket: tlsSocket, remoteNodeKey }
    } catch (err) {
      tlsSocket.destroy()
      if (signal?.aborted === true) throw err
      const message = err instanceof Error ? err.message : String(err)
      log('TLS handshake failed: %s', message)
      throw new ConnectError(`TLS handshake failed: ${message}`, {
        code: ErrorCode.TLS_VERIFICATION_FAILED,
        cause: err,
      })
    }
  }

  private async verify(tlsSocket: TLSSocket): Promise<Uint8Array> {
    const peer = tlsSocket.getPeerCertificate(true)
    if (!('raw' in peer) || peer.raw === undefined) {
      throw new Error('peer sent no certificate')
    }
    const fingerprint = createHash('sha256').update(peer.raw).digest('hex')
    const cached = this.trusted.get(fingerprint)
    if (cached !== undefined) return cached

    const verified = await verifyPeerCertificate(peer.raw)
    this.trusted.set(fingerprint, verified.nodePublicKey)
    return verified.nodePublicKey
  }
}
