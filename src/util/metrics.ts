export type MetricLabels = Record<string, string>;

export type Metrics = {
  incCounter: (name: string, labels?: MetricLabels, value?: number) => void;
  observeHistogram: (name: string, value: number, labels?: MetricLabels) => void;
  setGauge: (name: string, value: number, labels?: MetricLabels) => void;
  counterValue: (name: string, labels?: MetricLabels) => number;
  render: () => string;
};

type CounterEntry = { name: string; labels: MetricLabels; value: number };

type HistogramEntry = {
  name: string;
  labels: MetricLabels;
  buckets: number[];
  counts: number[];
  sum: number;
  count: number;
};

type GaugeEntry = { name: string; labels: MetricLabels; value: number };

const HISTOGRAM_BUCKETS: Record<string, number[]> = {
  dispatch_latency_ms_histogram: [100, 250, 500, 1000, 2500, 5000, 10000, 30000, 60000, 120000],
  prompt_tokens_histogram: [250, 500, 1000, 2000, 4000, 8000, 16000, 32000],
};
const DEFAULT_BUCKETS = [1, 5, 10, 50, 100, 500, 1000];

export class InMemoryMetrics implements Metrics {
  private counters = new Map<string, CounterEntry>();
  private histograms = new Map<string, HistogramEntry>();
  private gauges = new Map<string, GaugeEntry>();

  incCounter(name: string, labels: MetricLabels = {}, value = 1): void {
    const key = keyFor(name, labels);
    const existing = this.counters.get(key);
    if (existing) {
      existing.value += value;
      return;
    }
    this.counters.set(key, { name, labels, value });
  }

  observeHistogram(name: string, value: number, labels: MetricLabels = {}): void {
    const key = keyFor(name, labels);
    let entry = this.histograms.get(key);
    if (!entry) {
      const buckets = HISTOGRAM_BUCKETS[name] ?? DEFAULT_BUCKETS;
      entry = {
        name,
        labels,
        buckets,
        counts: new Array<number>(buckets.length).fill(0),
        sum: 0,
        count: 0,
      };
      this.histograms.set(key, entry);
    }

    entry.sum += value;
    entry.count += 1;
    for (let i = 0; i < entry.buckets.length; i += 1) {
      if (value <= entry.buckets[i]) {
        entry.counts[i] += 1;
      }
    }
  }

  setGauge(name: string, value: number, labels: MetricLabels = {}): void {
    this.gauges.set(keyFor(name, labels), { name, labels, value });
  }

  counterValue(name: string, labels: MetricLabels = {}): number {
    return this.counters.get(keyFor(name, labels))?.value ?? 0;
  }

  render(): string {
    const lines: string[] = [];

    for (const entry of this.counters.values()) {
      lines.push(`${entry.name}${formatLabels(entry.labels)} ${entry.value}`);
    }

    for (const entry of this.gauges.values()) {
      lines.push(`${entry.name}${formatLabels(entry.labels)} ${entry.value}`);
    }

    for (const entry of this.histograms.values()) {
      for (let i = 0; i < entry.buckets.length; i += 1) {
        const bucketLabels = { ...entry.labels, le: entry.buckets[i].toString() };
        lines.push(`${entry.name}_bucket${formatLabels(bucketLabels)} ${entry.counts[i]}`);
      }
      lines.push(`${entry.name}_sum${formatLabels(entry.labels)} ${entry.sum}`);
      lines.push(`${entry.name}_count${formatLabels(entry.labels)} ${entry.count}`);
    }

    return lines.join('\n') + '\n';
  }
}

function keyFor(name: string, labels: MetricLabels): string {
  const entries = Object.entries(labels)
    .sort((a, b) => a[0].localeCompare(b[0]))
    .map(([key, value]) => `${key}=${value}`)
    .join(',');
  return `${name}|${entries}`;
}

function formatLabels(labels: MetricLabels): string {
  const entries = Object.entries(labels);
  if (entries.length === 0) return '';
  const formatted = entries.map(([key, value]) => `${key}="${escapeLabel(value)}"`).join(',');
  return `{${formatted}}`;
}

function escapeLabel(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}
