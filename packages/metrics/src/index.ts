import { collectDefaultMetrics, Counter, Gauge, Histogram, Registry } from 'prom-client';

export type { Counter, Gauge, Histogram, Registry } from 'prom-client';

const registry = new Registry();
collectDefaultMetrics({ register: registry });

export type CounterOpts = {
  name: string;
  help: string;
  labelNames?: string[];
};

function existing(name: string): unknown {
  return registry.getSingleMetric(name);
}

export function registerCounter(opts: CounterOpts): Counter<string> {
  const found = existing(opts.name);
  if (found instanceof Counter) return found;
  return new Counter({ ...opts, registers: [registry] });
}

export type GaugeOpts = CounterOpts;

export function registerGauge(opts: GaugeOpts): Gauge<string> {
  const found = existing(opts.name);
  if (found instanceof Gauge) return found;
  return new Gauge({ ...opts, registers: [registry] });
}

export type HistogramOpts = CounterOpts & {
  buckets?: number[];
};

export function registerHistogram(opts: HistogramOpts): Histogram<string> {
  const found = existing(opts.name);
  if (found instanceof Histogram) return found;
  return new Histogram({ ...opts, registers: [registry] });
}

export function getRegistry(): Registry {
  return registry;
}
