import {
  Counter,
  type CounterConfiguration,
  Gauge,
  type GaugeConfiguration,
  Histogram,
  type HistogramConfiguration,
  Registry,
} from 'prom-client'

/**
 * Registry that creates metrics already registered on itself.
 */
export class RegistryMetricCreator extends Registry {
  gauge<T extends string = never>(
    config: Omit<GaugeConfiguration<T>, 'registers'>,
  ): Gauge<T> {
    return new Gauge<T>({ ...config, registers: [this] })
  }

  counter<T extends string = never>(
    config: Omit<CounterConfiguration<T>, 'registers'>,
  ): Counter<T> {
    return new Counter<T>({ ...config, registers: [this] })
  }

  histogram<T extends string = never>(
    config: Omit<HistogramConfiguration<T>, 'registers'>,
  ): Histogram<T> {
    return new Histogram<T>({ ...config, registers: [this] })
  }
}
