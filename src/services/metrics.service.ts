type Labels = Record<string, string>;

/**
 * Render `name{key="value",...}` with label keys sorted
 */
export function metricKey(name: string, labels?: Labels): string {
    if (!labels || Object.keys(labels).length === 0) {
        return name;
    }
    const rendered = Object.keys(labels)
        .sort()
        .map(key => `${key}="${labels[key]}"`)
        .join(',');
    return `${name}{${rendered}}`;
}

/**
 * In-process counters and gauges exposed on /metrics
 */
export class MetricsRegistry {
    private readonly counters = new Map<string, number>();
    private readonly gauges = new Map<string, number>();
    private lastProcessedAt: Date | undefined;

    increment(name: string, labels?: Labels, by: number = 1): void {
        const key = metricKey(name, labels);
        this.counters.set(key, (this.counters.get(key) ?? 0) + by);
    }

    setGauge(name: string, value: number, labels?: Labels): void {
        this.gauges.set(metricKey(name, labels), value);
    }

    getCounter(name: string, labels?: Labels): number {
        return this.counters.get(metricKey(name, labels)) ?? 0;
    }

    getGauge(name: string, labels?: Labels): number {
        return this.gauges.get(metricKey(name, labels)) ?? 0;
    }

    /** Stamp the completion time of the latest document or job */
    markProcessed(at: Date = new Date()): void {
        this.lastProcessedAt = at;
    }

    getLastProcessedAt(): Date | undefined {
        return this.lastProcessedAt;
    }

    snapshot(): { counters: Record<string, number>; gauges: Record<string, number> } {
        return {
            counters: Object.fromEntries(this.counters),
            gauges: Object.fromEntries(this.gauges),
        };
    }

    reset(): void {
        this.counters.clear();
        this.gauges.clear();
        this.lastProcessedAt = undefined;
    }
}
