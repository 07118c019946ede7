export interface RequestMetric {
  provider: string;
  service: string;
  endpoint: string; // Path only, sanitized
  method: string;
  status: number; // 0 when no response arrived
  durationMs: number;
  timestamp: number;
  error?: string | undefined;
}

export interface MetricsSummary {
  total: number;
  failures: number;
  avgDuration: number;
  byProvider: Record<string, number>;
  byService: Record<string, number>;
  byStatus: Record<string, number>;
  byEndpoint: Record<string, EndpointMetrics>;
}

export interface EndpointMetrics {
  calls: number;
  avgDuration: number;
}

const increment = (counts: Record<string, number>, key: string): void => {
  counts[key] = (counts[key] ?? 0) + 1;
};

/**
 * In-memory sink for per-request metrics, fed by HttpClient when configured.
 */
export class InstrumentationCollector {
  private metrics: RequestMetric[] = [];

  record(metric: RequestMetric): void {
    this.metrics.push(metric);
  }

  getMetrics(): readonly RequestMetric[] {
    return this.metrics;
  }

  reset(): void {
    this.metrics = [];
  }

  getSummary(): MetricsSummary {
    const byProvider: Record<string, number> = {};
    const byService: Record<string, number> = {};
    const byStatus: Record<string, number> = {};
    const byEndpoint: Record<string, EndpointMetrics> = {};
    let totalDuration = 0;
    let failures = 0;

    for (const m of this.metrics) {
      increment(byProvider, m.provider);
      increment(byService, m.service);
      increment(byStatus, String(m.status));
      totalDuration += m.durationMs;
      if (m.error !== undefined) failures++;

      const key = `${m.provider}:${m.endpoint}`;
      const current = byEndpoint[key] ?? { calls: 0, avgDuration: 0 };
      const endpointDuration = current.avgDuration * current.calls + m.durationMs;
      current.calls += 1;
      current.avgDuration = endpointDuration / current.calls;
      byEndpoint[key] = current;
    }

    return {
      total: this.metrics.length,
      failures,
      avgDuration: this.metrics.length === 0 ? 0 : totalDuration / this.metrics.length,
      byProvider,
      byService,
      byStatus,
      byEndpoint,
    };
  }
}

/**
 * Reduce an endpoint to its path so query strings never reach metrics or hooks.
 */
export function sanitizeEndpoint(endpoint: string): string {
  try {
    return new URL(endpoint, 'http://placeholder.invalid').pathname;
  } catch {
    return endpoint;
  }
}
