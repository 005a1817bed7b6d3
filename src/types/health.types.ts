import type { AnalysisProviderMetrics } from './analysis-provider.types.js';
import type { CircuitStateEnumType } from './enums.js';

/**
 * Point-in-time view of one circuit breaker
 */
export interface CircuitBreakerSnapshot {
    name: string;
    state: CircuitStateEnumType;
    failures: number;
    lastFailureAt?: Date;
    failureThreshold: number;
    resetTimeoutMs: number;
    halfOpenTimeoutMs: number;
}

export interface HealthReport {
    status: 'healthy' | 'degraded';
    version: string;
    uptimeSeconds: number;
    activeJobs: number;
    queueDepth: number;
    breakers: CircuitBreakerSnapshot[];
    lastProcessedAt?: string;
}

export interface MetricsReport {
    counters: Record<string, number>;
    gauges: Record<string, number>;
    breakers: CircuitBreakerSnapshot[];
    analysis: AnalysisProviderMetrics;
}
