// Peer-to-peer networking engine
// Transports, framed channels, a tiered host store and the sessions that
// keep a node connected.

export * from './address'
export * from './settings'
export * from './errors'
export * from './logging'

// Wire format
export * from './message'

// Transports (tcp, tcp+tls, unix, tor via SOCKS5)
export * from './transport'

// Channels and message dispatch
export * from './channel/channel'
export * from './channel/message-subsystem'

// Host registry
export * from './hosts'

// Protocols and sessions
export * from './protocol'
export * from './session'

export * from './system/stoppable-task'
export * from './system/subscriber'
export * from './system/time'
export * from './connector'
export * from './dnet'
export * from './types'
export * from './p2p'
