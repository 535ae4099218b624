/**
 * Metrics Collector
 *
 * Collects challenge resolution metrics in Prometheus text format.
 * Tracks: resolution results by challenge type, resolver state
 * transitions, and resolution duration histogram.
 *
 * Uses simple in-memory counters; the entry point dumps format() on exit.
 */

interface MetricCounters {
  [key: string]: number;
}

const COUNTER_HELP: Array<[name: string, help: string]> = [
  ["challenge_resolve_total", "Challenge resolution calls by result"],
  ["challenge_state_transitions_total", "Resolver state transitions"],
];

const DURATION_BUCKETS = [5, 15, 30, 60, 120];

export class MetricsCollector {
  private counters: MetricCounters = {};
  private durations: number[] = [];
  private maxDurationSamples = 1000;

  /** Increment a counter metric */
  increment(name: string, labels: Record<string, string> = {}): void {
    const key = this.buildKey(name, labels);
    this.counters[key] = (this.counters[key] || 0) + 1;
  }

  /** Current value of a counter (0 when never incremented) */
  get(name: string, labels: Record<string, string> = {}): number {
    return this.counters[this.buildKey(name, labels)] || 0;
  }

  /** Record a resolution duration for the histogram */
  recordDuration(durationSeconds: number): void {
    this.durations.push(durationSeconds);
    // Keep only the last N samples
    if (this.durations.length > this.maxDurationSamples) {
      this.durations = this.durations.slice(-this.maxDurationSamples);
    }
  }

  reset(): void {
    this.counters = {};
    this.durations = [];
  }

  /**
   * Format all metrics as Prometheus text exposition format.
   */
  format(): string {
    const lines: string[] = [];

    for (const [name, help] of COUNTER_HELP) {
      lines.push(`# HELP ${name} ${help}`);
      lines.push(`# TYPE ${name} counter`);
      for (const [key, value] of Object.entries(this.counters)) {
        if (key === name || key.startsWith(`${name}{`)) {
          lines.push(`${key} ${value}`);
        }
      }
      lines.push("");
    }

    lines.push("# HELP challenge_resolve_duration_seconds Challenge resolution duration");
    lines.push("# TYPE challenge_resolve_duration_seconds histogram");
    for (const le of DURATION_BUCKETS) {
      const count = this.durations.filter((d) => d <= le).length;
      lines.push(`challenge_resolve_duration_seconds_bucket{le="${le}"} ${count}`);
    }
    lines.push(
      `challenge_resolve_duration_seconds_bucket{le="+Inf"} ${this.durations.length}`
    );
    lines.push(`challenge_resolve_duration_seconds_count ${this.durations.length}`);
    const sum = this.durations.reduce((a, b) => a + b, 0);
    lines.push(`challenge_resolve_duration_seconds_sum ${sum.toFixed(2)}`);

    return lines.join("\n");
  }

  private buildKey(name: string, labels: Record<string, string>): string {
    if (Object.keys(labels).length === 0) return name;
    const labelStr = Object.entries(labels)
      .map(([k, v]) => `${k}="${v}"`)
      .join(",");
    return `${name}{${labelStr}}`;
  }
}

/** Singleton metrics collector instance */
export const metrics = new MetricsCollector();
