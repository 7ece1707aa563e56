import { performance } from 'node:perf_hooks';

export const METRIC_PHASES = {
  ENUMERATE: 'enumerateMs',
  SAMPLE: 'sampleMs',
  APPLY: 'applyMs',
} as const;

export type MetricPhase = keyof typeof METRIC_PHASES;

export interface MetricsSnapshot {
  enumerateMs: number;
  sampleMs: number;
  applyMs: number;
  pathsEnumerated: number;
  samplesDrawn: number;
  sourcesVisited: number;
  sourcesChanged: number;
  collapsedFanOut: number;
}

type MetricsPhaseKey = (typeof METRIC_PHASES)[MetricPhase];
type CounterKey = Exclude<keyof MetricsSnapshot, MetricsPhaseKey>;

const EMPTY_SNAPSHOT: MetricsSnapshot = {
  enumerateMs: 0,
  sampleMs: 0,
  applyMs: 0,
  pathsEnumerated: 0,
  samplesDrawn: 0,
  sourcesVisited: 0,
  sourcesChanged: 0,
  collapsedFanOut: 0,
};

export interface MetricsCollectorOptions {
  now?: () => number;
}

/**
 * Phase timers and counters for one engine call. Callers that do not want
 * metrics pass no collector at all.
 */
export class MetricsCollector {
  private readonly now: () => number;
  private readonly openedAt = new Map<MetricPhase, number>();
  private readonly snapshot: MetricsSnapshot = { ...EMPTY_SNAPSHOT };

  constructor(options: MetricsCollectorOptions = {}) {
    this.now = options.now ?? (() => performance.now());
  }

  public begin(phase: MetricPhase): void {
    if (this.openedAt.has(phase)) {
      throw new Error(`Metrics timer for ${phase} already started`);
    }
    this.openedAt.set(phase, this.now());
  }

  public end(phase: MetricPhase): void {
    const startedAt = this.openedAt.get(phase);
    if (startedAt === undefined) {
      throw new Error(`Metrics timer for ${phase} was not started`);
    }
    this.openedAt.delete(phase);
    // Clocks that step backwards count as zero
    this.snapshot[METRIC_PHASES[phase]] += Math.max(0, this.now() - startedAt);
  }

  /**
   * Runs `fn` between `begin` and `end`, closing the timer on throw as well
   */
  public time<T>(phase: MetricPhase, fn: () => T): T {
    this.begin(phase);
    try {
      return fn();
    } finally {
      this.end(phase);
    }
  }

  public add(counter: CounterKey, count = 1): void {
    this.snapshot[counter] += count;
  }

  public snapshotMetrics(): MetricsSnapshot {
    return { ...this.snapshot };
  }
}
