import debug from 'debug'
import type { Channel } from '../channel/channel'
import { ChannelStoppedError, ErrorCode, HandshakeError, isNetError, ProtocolError } from '../errors'
import {
  VerackCodec,
  type VerackMessage,
  VersionCodec,
  type VersionMessage,
} from '../message/messages'
import { PROTOCOL_VERSION, type Settings } from '../settings'
import type { Subscription } from '../system/subscriber'
import { withTimeout } from '../system/time'

const log = debug('meshwork:protocol:version')

const major = (version: string): string => version.split('.')[0]

/**
 * Version exchange run on every new channel before any other protocol.
 * Both sides send `version`, answer the other's with `verack`, and wait for
 * their own to be acknowledged. Subscribes on construction so it must be
 * created before the channel starts.
 */
export class ProtocolVersion {
  private readonly versionSub: Subscription<VersionMessage>
  private readonly verackSub: Subscription<VerackMessage>

  constructor(
    private readonly channel: Channel,
    private readonly settings: Pick<
      Settings,
      'nodeId' | 'appVersion' | 'externalAddrs' | 'channelHandshakeTimeout'
    >,
    private readonly features: Array<[string, number]> = [],
  ) {
    this.versionSub = channel.subscribeMsg(VersionCodec)
    this.verackSub = channel.subscribeMsg(VerackCodec)
  }

  /**
   * Runs the exchange under the handshake timeout and returns the peer's
   * version. Failures are `HandshakeError`s; the channel is left to the
   * caller.
   */
  async run(): Promise<VersionMessage> {
    const timeout = this.settings.channelHandshakeTimeout
    try {
      const [, remote] = await withTimeout(
        Promise.all([this.sendVersion(), this.receiveVersion()]),
        timeout,
        () =>
          new HandshakeError(`handshake with ${this.channel.address} timed out`, {
            code: ErrorCode.HANDSHAKE_TIMEOUT,
            context: { address: this.channel.address },
          }),
      )
      this.channel.setRemoteVersion(remote)
      log('handshake with %s done, peer runs %s', this.channel.address, remote.appVersion)
      return remote
    } catch (err) {
      throw this.toHandshakeError(err)
    } finally {
      this.versionSub.unsubscribe()
      this.verackSub.unsubscribe()
    }
  }

  private async sendVersion(): Promise<void> {
    await this.channel.send(VersionCodec, {
      protocolVersion: PROTOCOL_VERSION,
      appVersion: this.settings.appVersion,
      nodeId: this.settings.nodeId,
      timestamp: Date.now(),
      connectRecvAddr: this.channel.address,
      externalAddrs: [...this.settings.externalAddrs],
      features: this.features,
    })
    await this.verackSub.receive()
  }

  private async receiveVersion(): Promise<VersionMessage> {
    const remote = await this.versionSub.receive()
    if (major(remote.protocolVersion) !== major(PROTOCOL_VERSION)) {
      throw new HandshakeError(
        `peer protocol ${remote.protocolVersion} incompatible with ${PROTOCOL_VERSION}`,
        {
          code: ErrorCode.HANDSHAKE_VERSION_MISMATCH,
          context: { address: this.channel.address },
        },
      )
    }
    await this.channel.send(VerackCodec, { appVersion: this.settings.appVersion })
    return remote
  }

  private toHandshakeError(err: unknown): Error {
    if (err instanceof HandshakeError) return err
    const cause = err instanceof ChannelStoppedError ? err.cause : err
    if (cause instanceof ProtocolError) {
      return new HandshakeError(`malformed handshake from ${this.channel.address}`, {
        code: ErrorCode.HANDSHAKE_MALFORMED,
        context: { address: this.channel.address },
        cause,
      })
    }
    if (isNetError(err)) return err
    return new HandshakeError(`handshake with ${this.channel.address} failed`, {
      code: ErrorCode.HANDSHAKE_MALFORMED,
      context: { address: this.channel.address },
      cause: err,
    })
  }
}
