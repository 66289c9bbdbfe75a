import { performance } from 'perf_hooks';

/**
 * In-process metrics registry, rendered in Prometheus text format
 */

export type Labels = Record<string, string>;

export interface CounterMetric {
  name: string;
  help: string;
  values: Map<string, number>;
}

export interface GaugeMetric {
  name: string;
  help: string;
  values: Map<string, number>;
}

export interface HistogramMetric {
  name: string;
  help: string;
  buckets: number[];
  counts: Map<string, number[]>;
  sums: Map<string, number>;
  totalCounts: Map<string, number>;
}

export interface Timer {
  stop: (labels?: Labels) => number;
}

const DEFAULT_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30, 60];

class MetricsCollector {
  private counters = new Map<string, CounterMetric>();
  private gauges = new Map<string, GaugeMetric>();
  private histograms = new Map<string, HistogramMetric>();

  counter(name: string, help: string = ''): CounterMetric {
    let counter = this.counters.get(name);
    if (!counter) {
      counter = { name, help, values: new Map() };
      this.counters.set(name, counter);
    }
    return counter;
  }

  gauge(name: string, help: string = ''): GaugeMetric {
    let gauge = this.gauges.get(name);
    if (!gauge) {
      gauge = { name, help, values: new Map() };
      this.gauges.set(name, gauge);
    }
    return gauge;
  }

  histogram(name: string, help: string = '', buckets: number[] = DEFAULT_BUCKETS): HistogramMetric {
    let histogram = this.histograms.get(name);
    if (!histogram) {
      histogram = { name, help, buckets, counts: new Map(), sums: new Map(), totalCounts: new Map() };
      this.histograms.set(name, histogram);
    }
    return histogram;
  }

  incrementCounter(name: string, labels?: Labels, value: number = 1): void {
    const counter = this.counter(name);
    const labelKey = this.getLabelKey(labels);
    counter.values.set(labelKey, (counter.values.get(labelKey) || 0) + value);
  }

  incrementGauge(name: string, value: number = 1, labels?: Labels): void {
    const gauge = this.gauge(name);
    const labelKey = this.getLabelKey(labels);
    gauge.values.set(labelKey, (gauge.values.get(labelKey) || 0) + value);
  }

  decrementGauge(name: string, value: number = 1, labels?: Labels): void {
    this.incrementGauge(name, -value, labels);
  }

  observeHistogram(name: string, value: number, labels?: Labels): void {
    const histogram = this.histogram(name);
    const labelKey = this.getLabelKey(labels);

    const counts = histogram.counts.get(labelKey) ?? new Array<number>(histogram.buckets.length + 1).fill(0);
    histogram.counts.set(labelKey, counts);

    histogram.buckets.forEach((bucket, i) => {
      if (value <= bucket) {
        counts[i] = (counts[i] || 0) + 1;
      }
    });
    // +Inf bucket
    counts[histogram.buckets.length] = (counts[histogram.buckets.length] || 0) + 1;

    histogram.sums.set(labelKey, (histogram.sums.get(labelKey) || 0) + value);
    histogram.totalCounts.set(labelKey, (histogram.totalCounts.get(labelKey) || 0) + 1);
  }

  /**
   * Start a timer; labels may be given late, once the outcome is known
   */
  startTimer(name: string, labels?: Labels): Timer {
    const startTime = performance.now();
    return {
      stop: (finalLabels?: Labels): number => {
        const duration = (performance.now() - startTime) / 1000;
        this.observeHistogram(name, duration, { ...labels, ...finalLabels });
        return duration;
      },
    };
  }

  getPrometheusMetrics(): string {
    let output = '';

    const writeHeader = (name: string, help: string, type: string): void => {
      if (help) {
        output += `# HELP ${name} ${help}\n`;
      }
      output += `# TYPE ${name} ${type}\n`;
    };

    for (const counter of this.counters.values()) {
      writeHeader(counter.name, counter.help, 'counter');
      for (const [labelKey, value] of counter.values) {
        output += `${counter.name}${labelKey ? `{${labelKey}}` : ''} ${value}\n`;
      }
    }

    for (const gauge of this.gauges.values()) {
      writeHeader(gauge.name, gauge.help, 'gauge');
      for (const [labelKey, value] of gauge.values) {
        output += `${gauge.name}${labelKey ? `{${labelKey}}` : ''} ${value}\n`;
      }
    }

    for (const histogram of this.histograms.values()) {
      writeHeader(histogram.name, histogram.help, 'histogram');
      for (const [labelKey, counts] of histogram.counts) {
        const baseLabels = labelKey ? labelKey + ',' : '';
        histogram.buckets.forEach((bucket, i) => {
          output += `${histogram.name}_bucket{${baseLabels}le="${bucket}"} ${counts[i] || 0}\n`;
        });
        output += `${histogram.name}_bucket{${baseLabels}le="+Inf"} ${counts[histogram.buckets.length] || 0}\n`;

        const labels = labelKey ? `{${labelKey}}` : '';
        output += `${histogram.name}_sum${labels} ${histogram.sums.get(labelKey) || 0}\n`;
        output += `${histogram.name}_count${labels} ${histogram.totalCounts.get(labelKey) || 0}\n`;
      }
    }

    return output;
  }

  private getLabelKey(labels?: Labels): string {
    if (!labels || Object.keys(labels).length === 0) {
      return '';
    }

    return Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([key, value]) => `${key}="${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`)
      .join(',');
  }
}

export const metrics = new MetricsCollector();

export { MetricsCollector };

/**
 * Metric names used across the relay, registered up front so /metrics
 * lists them with their help text before the first observation
 */
export const RelayMetrics = {
  httpRequestsTotal: metrics.counter('relay_http_requests_total', 'Total HTTP requests').name,
  httpRequestDuration: metrics.histogram('relay_http_request_duration_seconds', 'HTTP request duration').name,
  httpRequestsInFlight: metrics.gauge('relay_http_requests_in_flight', 'HTTP requests currently being processed').name,

  dispatchTotal: metrics.counter('relay_dispatch_total', 'Forwarded tasks by delivery mode and outcome').name,
  dispatchDuration: metrics.histogram('relay_dispatch_duration_seconds', 'Time from submission to dispatch return').name,
  streamsActive: metrics.gauge('relay_streams_active', 'Blocking streams currently open').name,

  webhookDeliveries: metrics.counter('relay_webhook_deliveries_total', 'Webhook deliveries by outcome').name,

  storeAppends: metrics.counter('relay_event_store_appends_total', 'Event store appends by kind and result').name,
} as const;
