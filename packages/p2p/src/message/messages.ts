import { encodeRlp, int, type MessageCodec, RlpReader, str } from './codec'

export interface VersionMessage {
  protocolVersion: string
  appVersion: string
  nodeId: string
  /** Sender clock, milliseconds since the epoch */
  timestamp: number
  /** Address the sender dialed, or saw the connection arrive from */
  connectRecvAddr: string
  /** Addresses the sender is reachable at */
  externalAddrs: string[]
  /** Protocol names and versions the sender runs */
  features: Array<[string, number]>
}

export interface VerackMessage {
  appVersion: string
}

export interface PingMessage {
  nonce: number
}

export interface PongMessage {
  nonce: number
}

export interface GetAddrsMessage {
  /** Most entries the requester wants back */
  max: number
  /** Schemes the requester can dial, empty for any */
  transports: string[]
}

export interface AddrEntry {
  addr: string
  lastSeen: number
}

export interface AddrsMessage {
  addrs: AddrEntry[]
}

export const VersionCodec: MessageCodec<VersionMessage> = {
  name: 'version',
  encode: (m) =>
    encodeRlp([
      str(m.protocolVersion),
      str(m.appVersion),
      str(m.nodeId),
      int(m.timestamp),
      str(m.connectRecvAddr),
      m.externalAddrs.map(str),
      m.features.map(([name, version]) => [str(name), int(version)]),
    ]),
  decode: (payload) => {
    const r = RlpReader.decode('version', payload).expectLength(7)
    return {
      protocolVersion: r.string(0),
      appVersion: r.string(1),
      nodeId: r.string(2),
      timestamp: r.int(3),
      connectRecvAddr: r.string(4),
      externalAddrs: r.list(5).map((l, i) => l.string(i)),
      features: r.list(6).map((l, i): [string, number] => {
        const feature = l.list(i).expectLength(2)
        return [feature.string(0), feature.int(1)]
      }),
    }
  },
}

export const VerackCodec: MessageCodec<VerackMessage> = {
  name: 'verack',
  encode: (m) => encodeRlp([str(m.appVersion)]),
  decode: (payload) => ({
    appVersion: RlpReader.decode('verack', payload).expectLength(1).string(0),
  }),
}

export const PingCodec: MessageCodec<PingMessage> = {
  name: 'ping',
  encode: (m) => encodeRlp([int(m.nonce)]),
  decode: (payload) => ({ nonce: RlpReader.decode('ping', payload).expectLength(1).int(0) }),
}

export const PongCodec: MessageCodec<PongMessage> = {
  name: 'pong',
  encode: (m) => encodeRlp([int(m.nonce)]),
  decode: (payload) => ({ nonce: RlpReader.decode('pong', payload).expectLength(1).int(0) }),
}

export const GetAddrsCodec: MessageCodec<GetAddrsMessage> = {
  name: 'getaddrs',
  encode: (m) => encodeRlp([int(m.max), m.transports.map(str)]),
  decode: (payload) => {
    const r = RlpReader.decode('getaddrs', payload).expectLength(2)
    return { max: r.int(0), transports: r.list(1).map((l, i) => l.string(i)) }
  },
}

export const AddrsCodec: MessageCodec<AddrsMessage> = {
  name: 'addrs',
  encode: (m) => encodeRlp(m.addrs.map((e) => [str(e.addr), int(e.lastSeen)])),
  decode: (payload) => ({
    addrs: RlpReader.decode('addrs', payload).map((l, i) => {
      const entry = l.list(i).expectLength(2)
      return { addr: entry.string(0), lastSeen: entry.int(1) }
    }),
  }),
}
