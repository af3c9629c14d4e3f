import type { Duplex } from 'node:stream'
import { assert, describe, it } from 'vitest'
import {
  Channel,
  type ChannelInit,
  ChannelStoppedError,
  Dnet,
  EndOfStreamError,
  ErrorCode,
  HandshakeError,
  type MessageCodec,
  PingCodec,
  ProtocolError,
  ProtocolVersion,
  SESSION_INBOUND,
  SESSION_OUTBOUND,
  VersionCodec,
  createSettings,
} from '../../src/index.ts'
import { duplexPair } from './duplex-pair.ts'

const OUT_ADDR = 'tcp://198.51.100.2:26661'
const IN_ADDR = 'tcp://198.51.100.1:40000'

function channelPair(
  extra: Partial<ChannelInit> = {},
): { out: Channel; in: Channel; outStream: Duplex; inStream: Duplex } {
  const [outStream, inStream] = duplexPair()
  return {
    out: new Channel({
      stream: outStream,
      address: OUT_ADDR,
      direction: 'outbound',
      sessionFlag: SESSION_OUTBOUND,
      ...extra,
    }),
    in: new Channel({
      stream: inStream,
      address: IN_ADDR,
      direction: 'inbound',
      sessionFlag: SESSION_INBOUND,
    }),
    outStream,
    inStream,
  }
}

const brokenPing: MessageCodec<null> = {
  name: 'ping',
  encode: () => Uint8Array.of(0xc0),
  decode: () => null,
}

describe('[channel]: message dispatch', () => {
  it('delivers messages to every subscriber of the command', async () => {
    const { out, in: inbound } = channelPair()
    const first = inbound.subscribeMsg(PingCodec)
    const second = inbound.subscribeMsg(PingCodec)
    out.start()
    inbound.start()

    await out.send(PingCodec, { nonce: 7 })
    assert.deepEqual(await first.receive(), { nonce: 7 })
    assert.deepEqual(await second.receive(), { nonce: 7 })

    await out.stop()
    await inbound.stop()
  })

  it('drops messages nobody subscribed to and keeps running', async () => {
    const { out, in: inbound } = channelPair()
    const pings = inbound.subscribeMsg(PingCodec)
    out.start()
    inbound.start()

    await out.send(VersionCodec, {
      protocolVersion: '0.1.0',
      appVersion: '0.1.0',
      nodeId: '',
      timestamp: 0,
      connectRecvAddr: IN_ADDR,
      externalAddrs: [],
      features: [],
    })
    await out.send(PingCodec, { nonce: 1 })
    assert.deepEqual(await pings.receive(), { nonce: 1 })
    assert.isFalse(inbound.isStopped)

    await out.stop()
    await inbound.stop()
  })

  it('stops on a payload the subscriber cannot decode', async () => {
    const { out, in: inbound } = channelPair()
    const pings = inbound.subscribeMsg(PingCodec)
    out.start()
    inbound.start()

    await out.send(brokenPing, null)
    const reason = await inbound.closed
    assert.instanceOf(reason, ProtocolError)
    if (reason instanceof ProtocolError) assert.equal(reason.code, ErrorCode.MALFORMED_MESSAGE)

    try {
      await pings.receive()
      assert.fail('expected the subscription to close')
    } catch (err) {
      assert.instanceOf(err, ChannelStoppedError)
    }
    await out.stop()
  })

  it('stops on bad framing', async () => {
    const { outStream, in: inbound } = channelPair()
    inbound.start()
    outStream.write(Uint8Array.of(1, 2, 3, 4, 5, 6, 7, 8))

    const reason = await inbound.closed
    assert.instanceOf(reason, ProtocolError)
    if (reason instanceof ProtocolError) assert.equal(reason.code, ErrorCode.MALFORMED_PACKET)
  })
})

describe('[channel]: stop', () => {
  it('fails pending receives and notifies stop subscribers', async () => {
    const { out, in: inbound } = channelPair()
    const pings = out.subscribeMsg(PingCodec)
    const stops = out.subscribeStop()
    out.start()
    inbound.start()

    const pending = pings.receive().then(
      () => undefined,
      (err: unknown) => err,
    )
    const reason = new Error('shutting down')
    await out.stop(reason)

    assert.instanceOf(await pending, ChannelStoppedError)
    assert.equal(await stops.receive(), reason)
    assert.equal(await out.closed, reason)
    assert.isTrue(out.info().stopped)
  })

  it('ends the peer channel when the stream closes', async () => {
    const { out, in: inbound } = channelPair()
    let stoppedEvents = 0
    inbound.on('stopped', () => stoppedEvents++)
    out.start()
    inbound.start()

    await out.stop()
    assert.instanceOf(await inbound.closed, EndOfStreamError)
    assert.equal(stoppedEvents, 1)
  })

  it('is idempotent and refuses further use', async () => {
    const { out } = channelPair()
    const first = new Error('first')
    await out.stop(first)
    await out.stop(new Error('second'))

    assert.equal(await out.closed, first)
    assert.throws(() => out.subscribeStop(), ChannelStoppedError)
    assert.throws(() => out.start(), ChannelStoppedError)
    try {
      await out.send(PingCodec, { nonce: 1 })
      assert.fail('expected ChannelStoppedError')
    } catch (err) {
      assert.instanceOf(err, ChannelStoppedError)
    }
  })
})

describe('[channel]: bans', () => {
  it('only logs under the relaxed policy', async () => {
    const banned: string[] = []
    const { out } = channelPair({ banPolicy: 'relaxed', onBan: (_c, reason) => banned.push(reason) })
    await out.ban('spam')
    assert.isFalse(out.isStopped)
    assert.lengthOf(banned, 0)
    await out.stop()
  })

  it('reports and stops under the strict policy', async () => {
    const banned: string[] = []
    const { out } = channelPair({ banPolicy: 'strict', onBan: (c, reason) => banned.push(`${c.address} ${reason}`) })
    await out.ban('spam')
    assert.isTrue(out.isStopped)
    assert.deepEqual(banned, [`${OUT_ADDR} spam`])
    assert.instanceOf(await out.closed, ProtocolError)
  })
})

describe('[channel]: dnet', () => {
  it('records traffic only while enabled', async () => {
    const dnet = new Dnet()
    const sent: Array<{ command: string; size: number }> = []
    dnet.on('channel:send', ({ command, size }) => sent.push({ command, size }))
    const { out, in: inbound } = channelPair({ dnet })
    out.start()
    inbound.start()

    await out.send(PingCodec, { nonce: 1 })
    assert.lengthOf(out.messageHistory(), 0)

    dnet.enable()
    await out.send(PingCodec, { nonce: 1 })
    assert.deepEqual(sent, [{ command: 'ping', size: 2 }])
    assert.deepEqual(
      out.messageHistory().map((e) => [e.direction, e.command, e.size]),
      [['send', 'ping', 2]],
    )

    await out.stop()
    await inbound.stop()
  })
})

describe('[protocol]: version handshake', () => {
  const settingsA = createSettings({ nodeId: 'node-a', appVersion: '1.0.0', channelHandshakeTimeout: 2_000 })
  const settingsB = createSettings({
    nodeId: 'node-b',
    appVersion: '2.0.0',
    externalAddrs: ['tcp+tls://203.0.113.9:26661'],
    channelHandshakeTimeout: 2_000,
  })

  it('exchanges versions both ways', async () => {
    const { out, in: inbound } = channelPair()
    const outVersion = new ProtocolVersion(out, settingsA)
    const inVersion = new ProtocolVersion(inbound, settingsB)
    out.start()
    inbound.start()

    const [seenByOut, seenByIn] = await Promise.all([outVersion.run(), inVersion.run()])
    assert.equal(seenByOut.nodeId, 'node-b')
    assert.deepEqual(seenByOut.externalAddrs, ['tcp+tls://203.0.113.9:26661'])
    assert.equal(seenByIn.nodeId, 'node-a')
    assert.equal(seenByIn.connectRecvAddr, OUT_ADDR)
    assert.equal(out.remoteVersion?.appVersion, '2.0.0')
    assert.equal(out.info().remoteNodeId, 'node-b')

    await out.stop()
    await inbound.stop()
  })

  it('rejects a peer on another major version', async () => {
    const { out, in: inbound } = channelPair()
    const outVersion = new ProtocolVersion(out, settingsA)
    out.start()
    inbound.start()

    const run = outVersion.run()
    await inbound.send(VersionCodec, {
      protocolVersion: '9.0.0',
      appVersion: '9.0.0',
      nodeId: 'future',
      timestamp: Date.now(),
      connectRecvAddr: IN_ADDR,
      externalAddrs: [],
      features: [],
    })
    try {
      await run
      assert.fail('expected HandshakeError')
    } catch (err) {
      assert.instanceOf(err, HandshakeError)
      if (err instanceof HandshakeError) {
        assert.equal(err.code, ErrorCode.HANDSHAKE_VERSION_MISMATCH)
      }
    }
    await out.stop()
    await inbound.stop()
  })

  it('times out on a silent peer', async () => {
    const { out, in: inbound } = channelPair()
    const outVersion = new ProtocolVersion(
      out,
      createSettings({ channelHandshakeTimeout: 50 }),
    )
    out.start()
    inbound.start()

    try {
      await outVersion.run()
      assert.fail('expected HandshakeError')
    } catch (err) {
      assert.instanceOf(err, HandshakeError)
      if (err instanceof HandshakeError) assert.equal(err.code, ErrorCode.HANDSHAKE_TIMEOUT)
    }
    await out.stop()
    await inbound.stop()
  })
})
