import type { HttpMetricsServerOpts } from './server/http'

export type MetricsOptions = HttpMetricsServerOpts & {
  enabled?: boolean
  /** Whether to collect default Node.js metrics */
  collectDefaultMetrics?: boolean
}

export const defaultMetricsOptions: MetricsOptions = {
  enabled: false,
  port: 8008,
  address: '127.0.0.1',
  collectDefaultMetrics: true,
}
