/**
 * Metrics Tracking
 *
 * In-memory metrics for monitoring and alerting.
 * Metrics reset when the process restarts.
 */

export interface OperationMetric {
  count: number;
  errors: number;
  latencies: number[];
}

export interface RequestMetric extends OperationMetric {
  notModified: number;
}

export interface BattleMetric {
  decided: number;
  arenaPairs: number;
  treasuryShares: bigint;
}

interface MetricsStore {
  operations: Record<string, OperationMetric>;
  requests: Record<string, RequestMetric>;
  battles: BattleMetric;
  startTime: number;
}

// In-memory metrics store
const store: MetricsStore = {
  operations: {},
  requests: {},
  battles: { decided: 0, arenaPairs: 0, treasuryShares: 0n },
  startTime: Date.now(),
};

// Keep only last N latencies to prevent memory growth
const MAX_LATENCIES = 1000;

function pushLatency(latencies: number[], durationMs: number): void {
  latencies.push(durationMs);
  if (latencies.length > MAX_LATENCIES) {
    latencies.shift();
  }
}

/**
 * Record one arena operation (committed or rolled back)
 */
export function recordOperation(operation: string, durationMs: number, isError: boolean = false): void {
  const metric = store.operations[operation] ?? { count: 0, errors: 0, latencies: [] };
  store.operations[operation] = metric;
  metric.count++;
  if (isError) {
    metric.errors++;
  }
  pushLatency(metric.latencies, durationMs);
}

/**
 * Record a request metric
 */
export function recordRequest(endpoint: string, status: number, durationMs: number): void {
  const metric = store.requests[endpoint] ?? { count: 0, errors: 0, latencies: [], notModified: 0 };
  store.requests[endpoint] = metric;
  metric.count++;

  if (status >= 500) {
    metric.errors++;
  }

  if (status === 304) {
    metric.notModified++;
  }

  pushLatency(metric.latencies, durationMs);
}

/**
 * Record a decided pair
 */
export function recordBattle(againstArena: boolean, treasuryShares: bigint): void {
  store.battles.decided++;
  if (againstArena) {
    store.battles.arenaPairs++;
  }
  store.battles.treasuryShares += treasuryShares;
}

/**
 * Calculate percentile from array of values
 */
function percentile(arr: number[], p: number): number {
  if (arr.length === 0) return 0;
  const sorted = [...arr].sort((a, b) => a - b);
  const index = Math.ceil((p / 100) * sorted.length) - 1;
  return sorted[Math.max(0, index)];
}

export interface LatencyStats {
  min: number;
  max: number;
  avg: number;
  p50: number;
  p95: number;
  p99: number;
}

/**
 * Calculate statistics from latency array
 */
function calculateStats(latencies: number[]): LatencyStats {
  if (latencies.length === 0) {
    return { min: 0, max: 0, avg: 0, p50: 0, p95: 0, p99: 0 };
  }

  const sum = latencies.reduce((a, b) => a + b, 0);
  return {
    min: Math.min(...latencies),
    max: Math.max(...latencies),
    avg: Math.round(sum / latencies.length),
    p50: percentile(latencies, 50),
    p95: percentile(latencies, 95),
    p99: percentile(latencies, 99),
  };
}

export interface MetricSummary {
  count: number;
  errors: number;
  errorRate: number;
  latency: LatencyStats;
}

function summarize(metric: OperationMetric): MetricSummary {
  const errorRate = metric.count > 0 ? metric.errors / metric.count : 0;
  return {
    count: metric.count,
    errors: metric.errors,
    errorRate: Math.round(errorRate * 10000) / 100, // percentage with 2 decimals
    latency: calculateStats(metric.latencies),
  };
}

/**
 * Get all metrics for reporting
 */
export function getMetrics(): {
  uptime: number;
  operations: Record<string, MetricSummary>;
  requests: Record<string, MetricSummary & { notModified: number }>;
  battles: { decided: number; arenaPairs: number; treasuryShares: string };
  totals: { operations: number; rejected: number; rejectionRate: number };
} {
  const operations: Record<string, MetricSummary> = {};
  let totalOperations = 0;
  let totalRejected = 0;
  for (const [name, metric] of Object.entries(store.operations)) {
    operations[name] = summarize(metric);
    totalOperations += metric.count;
    totalRejected += metric.errors;
  }

  const requests: Record<string, MetricSummary & { notModified: number }> = {};
  for (const [endpoint, metric] of Object.entries(store.requests)) {
    requests[endpoint] = { ...summarize(metric), notModified: metric.notModified };
  }

  const rejectionRate = totalOperations > 0 ? totalRejected / totalOperations : 0;

  return {
    uptime: Math.round((Date.now() - store.startTime) / 1000),
    operations,
    requests,
    battles: {
      decided: store.battles.decided,
      arenaPairs: store.battles.arenaPairs,
      treasuryShares: store.battles.treasuryShares.toString(),
    },
    totals: {
      operations: totalOperations,
      rejected: totalRejected,
      rejectionRate: Math.round(rejectionRate * 10000) / 100,
    },
  };
}

/**
 * Reset all metrics (useful for testing)
 */
export function resetMetrics(): void {
  store.operations = {};
  store.requests = {};
  store.battles = { decided: 0, arenaPairs: 0, treasuryShares: 0n };
  store.startTime = Date.now();
}
