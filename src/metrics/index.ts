type CounterMap = Record<string, number>;

export type LogLevelChange = {
  level: string;
  previous: string | null;
  changedAt: string;
};

export type MetricsSnapshot = {
  createdAt: string;
  logs: {
    byLevel: CounterMap;
    level: LogLevelChange | null;
  };
  counters: Record<string, CounterMap>;
  gauges: CounterMap;
};

class MetricsRegistry {
  private readonly logLevelCounters = new Map<string, number>();
  private readonly counters = new Map<string, Map<string, number>>();
  private readonly gauges = new Map<string, number>();
  private readonly resetListeners = new Set<() => void>();
  private lastLevelChange: LogLevelChange | null = null;

  reset() {
    this.logLevelCounters.clear();
    this.counters.clear();
    this.gauges.clear();
    this.lastLevelChange = null;
    for (const listener of this.resetListeners) {
      listener();
    }
  }

  onReset(listener: () => void) {
    this.resetListeners.add(listener);
    return () => {
      this.resetListeners.delete(listener);
    };
  }

  incrementLogLevel(level: string) {
    const normalized = level.toLowerCase();
    this.logLevelCounters.set(normalized, (this.logLevelCounters.get(normalized) ?? 0) + 1);
  }

  recordLogLevelChange(level: string, previous?: string | null) {
    this.lastLevelChange = {
      level,
      previous: previous ?? null,
      changedAt: new Date().toISOString()
    };
  }

  increment(group: string, counter: string, amount = 1) {
    let entries = this.counters.get(group);
    if (!entries) {
      entries = new Map();
      this.counters.set(group, entries);
    }
    entries.set(counter, (entries.get(counter) ?? 0) + amount);
  }

  getCounter(group: string, counter: string): number {
    return this.counters.get(group)?.get(counter) ?? 0;
  }

  setGauge(name: string, value: number) {
    if (!Number.isFinite(value)) {
      return;
    }
    this.gauges.set(name, value);
  }

  getGauge(name: string): number | undefined {
    return this.gauges.get(name);
  }

  snapshot(): MetricsSnapshot {
    const counters: Record<string, CounterMap> = {};
    for (const [group, entries] of this.counters) {
      counters[group] = mapFrom(entries);
    }

    return {
      createdAt: new Date().toISOString(),
      logs: {
        byLevel: mapFrom(this.logLevelCounters),
        level: this.lastLevelChange ? { ...this.lastLevelChange } : null
      },
      counters,
      gauges: mapFrom(this.gauges)
    };
  }
}

function mapFrom(source: Map<string, number>): CounterMap {
  return Object.fromEntries(Array.from(source.entries()).sort(([a], [b]) => a.localeCompare(b)));
}

const defaultRegistry = new MetricsRegistry();

export { MetricsRegistry };
export default defaultRegistry;
