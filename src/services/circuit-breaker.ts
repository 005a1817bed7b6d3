import type { CircuitBreakerConfig } from '../types/config.types.js';
import type { CircuitBreakerSnapshot } from '../types/health.types.js';
import { CircuitStateEnum, type CircuitStateEnumType } from '../types/enums.js';
import {
    ErrorCategoryEnum,
    OcrPipelineError,
    ServiceUnavailableError,
} from '../errors/index.js';
import type { Logger } from '../utils/logger.js';
import type { PipelineEventEmitter } from '../utils/events.js';
import { withTimeout } from '../utils/timeout.js';
import type { MetricsRegistry } from './metrics.service.js';

export interface CircuitBreakerOptions extends CircuitBreakerConfig {
    /** Decides whether an error counts towards tripping; caller errors do not by default */
    shouldTrip?: (error: unknown) => boolean;
}

export interface ExecuteOptions {
    /** Overrides `callTimeoutMs` for this call */
    timeoutMs?: number;
}

type StateListener = (name: string, from: CircuitStateEnumType, to: CircuitStateEnumType) => void;

/**
 * Invalid input means the downstream answered correctly, so it never trips a breaker
 */
export function isDownstreamFailure(error: unknown): boolean {
    return !(error instanceof OcrPipelineError && error.category === ErrorCategoryEnum.INVALID_INPUT);
}

/**
 * Circuit breaker for one call site
 *
 * closed: calls pass; `failureThreshold` consecutive failures open the circuit.
 * open: calls are rejected until `resetTimeoutMs` has passed since the last failure.
 * half-open: one probe at a time, once `halfOpenTimeoutMs` has passed since the last
 * failure; success closes the circuit, failure reopens it.
 */
export class CircuitBreaker {
    readonly name: string;
    private readonly options: CircuitBreakerOptions;
    private readonly logger: Logger;
    private readonly onStateChange?: StateListener;

    private state: CircuitStateEnumType = CircuitStateEnum.CLOSED;
    private failures = 0;
    private lastFailureAt: number | null = null;
    private probeInFlight = false;

    constructor(
        name: string,
        options: CircuitBreakerOptions,
        logger: Logger,
        onStateChange?: StateListener
    ) {
        this.name = name;
        this.options = options;
        this.logger = logger;
        this.onStateChange = onStateChange;
    }

    /**
     * Run `fn` through the breaker with the per-call timeout
     * @throws ServiceUnavailableError when the circuit rejects the call
     */
    async execute<T>(fn: () => Promise<T>, options: ExecuteOptions = {}): Promise<T> {
        const isProbe = this.acquire();
        const timeoutMs = options.timeoutMs ?? this.options.callTimeoutMs;

        try {
            const result = await withTimeout(fn(), timeoutMs, `${this.name} call`);
            this.recordSuccess();
            return result;
        } catch (error) {
            const shouldTrip = this.options.shouldTrip ?? isDownstreamFailure;
            if (shouldTrip(error)) {
                this.recordFailure();
            }
            throw error;
        } finally {
            if (isProbe) {
                this.probeInFlight = false;
            }
        }
    }

    /**
     * Whether a call would be admitted now; moves an expired open circuit to half-open
     */
    canRequest(now: number = Date.now()): boolean {
        if (this.state === CircuitStateEnum.OPEN) {
            if (now - this.lastFailureTime() < this.options.resetTimeoutMs) {
                return false;
            }
            this.transition(CircuitStateEnum.HALF_OPEN);
        }

        if (this.state === CircuitStateEnum.HALF_OPEN) {
            return !this.probeInFlight && now - this.lastFailureTime() >= this.options.halfOpenTimeoutMs;
        }

        return true;
    }

    recordSuccess(): void {
        this.failures = 0;
        if (this.state !== CircuitStateEnum.CLOSED) {
            this.transition(CircuitStateEnum.CLOSED);
        }
    }

    recordFailure(now: number = Date.now()): void {
        this.failures += 1;
        this.lastFailureAt = now;

        if (this.state === CircuitStateEnum.HALF_OPEN) {
            this.transition(CircuitStateEnum.OPEN);
            return;
        }

        if (this.state === CircuitStateEnum.CLOSED && this.failures >= this.options.failureThreshold) {
            this.transition(CircuitStateEnum.OPEN);
        }
    }

    getState(): CircuitStateEnumType {
        return this.state;
    }

    getSnapshot(): CircuitBreakerSnapshot {
        return {
            name: this.name,
            state: this.state,
            failures: this.failures,
            lastFailureAt: this.lastFailureAt === null ? undefined : new Date(this.lastFailureAt),
            failureThreshold: this.options.failureThreshold,
            resetTimeoutMs: this.options.resetTimeoutMs,
            halfOpenTimeoutMs: this.options.halfOpenTimeoutMs,
        };
    }

    /**
     * @returns true when the admitted call is the half-open probe
     */
    private acquire(): boolean {
        const now = Date.now();
        if (!this.canRequest(now)) {
            const retryAfterMs = this.state === CircuitStateEnum.OPEN
                ? Math.max(0, this.options.resetTimeoutMs - (now - this.lastFailureTime()))
                : undefined;
            throw new ServiceUnavailableError(this.name, retryAfterMs);
        }

        if (this.state === CircuitStateEnum.HALF_OPEN) {
            this.probeInFlight = true;
            return true;
        }
        return false;
    }

    private lastFailureTime(): number {
        return this.lastFailureAt ?? 0;
    }

    private transition(to: CircuitStateEnumType): void {
        const from = this.state;
        this.state = to;

        const meta = { breaker: this.name, from, to, failures: this.failures };
        if (to === CircuitStateEnum.OPEN) {
            this.logger.warn('Circuit breaker opened', meta);
        } else {
            this.logger.info('Circuit breaker state changed', meta);
        }

        this.onStateChange?.(this.name, from, to);
    }
}

/**
 * Holds the single breaker instance of each call site
 *
 * @example
 * ```typescript
 * const breakers = new CircuitBreakerRegistry(config.breaker, logger, events, metrics);
 * const output = await breakers.get('ocr').execute(() => runTesseract(image));
 * ```
 */
export class CircuitBreakerRegistry {
    private readonly breakers = new Map<string, CircuitBreaker>();
    private readonly config: CircuitBreakerConfig;
    private readonly logger: Logger;
    private readonly events?: PipelineEventEmitter;
    private readonly metrics?: MetricsRegistry;

    constructor(
        config: CircuitBreakerConfig,
        logger: Logger,
        events?: PipelineEventEmitter,
        metrics?: MetricsRegistry
    ) {
        this.config = config;
        this.logger = logger;
        this.events = events;
        this.metrics = metrics;
    }

    /**
     * Shared breaker for `name`; options only apply when the breaker is first created
     */
    get(name: string, options: Partial<CircuitBreakerOptions> = {}): CircuitBreaker {
        const existing = this.breakers.get(name);
        if (existing) {
            return existing;
        }

        const breaker = new CircuitBreaker(
            name,
            { ...this.config, ...options },
            this.logger,
            (breakerName, from, to) => {
                if (to === CircuitStateEnum.OPEN) {
                    this.metrics?.increment('breaker_trips_total', { name: breakerName });
                }
                this.events?.emit('breaker:state', { name: breakerName, from, to });
            }
        );
        this.breakers.set(name, breaker);
        return breaker;
    }

    snapshot(): CircuitBreakerSnapshot[] {
        return [...this.breakers.values()].map(breaker => breaker.getSnapshot());
    }

    /** True when every breaker is closed */
    allClosed(): boolean {
        return [...this.breakers.values()].every(breaker => breaker.getState() === CircuitStateEnum.CLOSED);
    }

    reset(): void {
        this.breakers.clear();
    }
}
