export { createMetrics, type Metrics } from './metrics'
export { createNetworkMetrics, type NetworkMetrics } from './metrics/network'
export { defaultMetricsOptions, type MetricsOptions } from './options'
export {
  getHttpMetricsServer,
  type HttpMetricsServer,
  type HttpMetricsServerOpts,
} from './server/http'
export { RegistryMetricCreator } from './utils/registryMetricCreator'
