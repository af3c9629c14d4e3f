import type { RegistryMetricCreator } from '../utils/registryMetricCreator'

export type NetworkMetrics = ReturnType<typeof createNetworkMetrics>

/**
 * Create network metrics
 */
export function createNetworkMetrics(register: RegistryMetricCreator) {
  return {
    peerCount: register.gauge({
      name: 'meshwork_network_peer_count',
      help: 'Current number of connected channels',
    }),
    peerConnections: register.counter<'direction'>({
      name: 'meshwork_network_peer_connections_total',
      help: 'Total number of channels registered after a handshake',
      labelNames: ['direction'],
    }),
    peerDisconnections: register.counter({
      name: 'meshwork_network_peer_disconnections_total',
      help: 'Total number of registered channels that stopped',
    }),
    peerBans: register.counter({
      name: 'meshwork_network_peer_bans_total',
      help: 'Total number of peers moved to the blacklist',
    }),
    connectionAttempts: register.counter<'status'>({
      name: 'meshwork_network_connection_attempts_total',
      help: 'Total number of outbound dial attempts',
      labelNames: ['status'],
    }),
    handshakeFailures: register.counter({
      name: 'meshwork_network_handshake_failures_total',
      help: 'Total number of failed version handshakes',
    }),
    refineryProbes: register.counter<'result'>({
      name: 'meshwork_network_refinery_probes_total',
      help: 'Total number of greylist probes',
      labelNames: ['result'],
    }),
    hostlistSize: register.gauge<'tier'>({
      name: 'meshwork_network_hostlist_size',
      help: 'Number of entries per host tier',
      labelNames: ['tier'],
    }),
    bytesReceived: register.counter({
      name: 'meshwork_network_bytes_received_total',
      help: 'Total bytes received from channels',
    }),
    bytesSent: register.counter({
      name: 'meshwork_network_bytes_sent_total',
      help: 'Total bytes sent to channels',
    }),
  }
}
