export interface AttemptMetric {
  mode: 'single' | 'batch';
  method: string;
  endpoint: string; // Path only, sanitized
  status: number;
  attempt: number;
  /** Batch round the attempt ran in; absent for single sends. */
  round?: number | undefined;
  durationMs: number;
  timestamp: number;
  error?: string | undefined;
}

export interface MetricsSummary {
  total: number;
  avgDuration: number;
  byStatus: Record<string, number>;
  byEndpoint: Record<string, EndpointMetrics>;
}

export interface EndpointMetrics {
  calls: number;
  avgDuration: number;
}

/**
 * Collects one metric per transport call. Retries count as separate calls.
 */
export class InstrumentationCollector {
  private metrics: AttemptMetric[] = [];

  record(metric: AttemptMetric): void {
    this.metrics.push(metric);
  }

  getMetrics(): readonly AttemptMetric[] {
    return this.metrics;
  }

  reset(): void {
    this.metrics = [];
  }

  getSummary(): MetricsSummary {
    const byStatus: Record<string, number> = {};
    const byEndpoint: Record<string, EndpointMetrics> = {};
    let totalDuration = 0;

    for (const metric of this.metrics) {
      const statusKey = String(metric.status);
      byStatus[statusKey] = (byStatus[statusKey] ?? 0) + 1;

      const endpointKey = `${metric.method} ${metric.endpoint}`;
      const current = byEndpoint[endpointKey] ?? { calls: 0, avgDuration: 0 };
      const endpointDuration = current.avgDuration * current.calls + metric.durationMs;
      current.calls += 1;
      current.avgDuration = endpointDuration / current.calls;
      byEndpoint[endpointKey] = current;

      totalDuration += metric.durationMs;
    }

    return {
      total: this.metrics.length,
      avgDuration: this.metrics.length === 0 ? 0 : totalDuration / this.metrics.length,
      byStatus,
      byEndpoint,
    };
  }
}

/**
 * Reduce a URL to its path, replacing long opaque segments (ids, keys, hashes).
 */
export function sanitizeEndpoint(url: string): string {
  try {
    const { pathname } = new URL(url, 'http://placeholder.invalid');

    return pathname
      .replace(/\/[0-9]+(?=\/|$)/g, '/{id}')
      .replace(/\/[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}(?=\/|$)/gi, '/{uuid}')
      .replace(/\/[A-Za-z0-9_-]{24,}(?=\/|$)/g, '/{token}');
  } catch {
    return url;
  }
}
