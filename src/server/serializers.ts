import type { ExtractResult, UploadResult } from '../types/extraction.types.js';
import type { JobResultView, JobStatusView } from '../types/job.types.js';
import type { ProgressSnapshot } from '../types/progress.types.js';
import type { HealthReport, MetricsReport, CircuitBreakerSnapshot } from '../types/health.types.js';

/**
 * Wire shapes of the HTTP API (snake_case)
 */

export function serializeExtract(result: ExtractResult): Record<string, unknown> {
    const { metadata } = result;
    return {
        text: result.text,
        metadata: {
            num_pages: metadata.numPages,
            processing_time_seconds: metadata.processingTimeSeconds,
            dpi: metadata.dpi,
            job_id: metadata.jobId,
            filename: metadata.filename,
            workers: metadata.workers,
            failed_pages: metadata.failedPages,
            file_hash: metadata.fileHash,
        },
        confidence: result.confidence,
    };
}

export function serializeProgress(snapshot: ProgressSnapshot): Record<string, unknown> {
    return {
        job_id: snapshot.jobId,
        unit: snapshot.unit,
        total_pages: snapshot.total,
        processed_pages: snapshot.processed,
        status: snapshot.status,
        progress_percentage: snapshot.percentage,
        ...(snapshot.estimatedTimeRemaining !== undefined && {
            estimated_time_remaining: snapshot.estimatedTimeRemaining,
        }),
        ...(snapshot.error !== undefined && { error: snapshot.error }),
    };
}

export function serializeUpload(result: UploadResult): Record<string, unknown> {
    return {
        job_id: result.jobId,
        file_name: result.fileName,
        total_pages: result.totalPages,
        total_chunks: result.totalChunks,
    };
}

export function serializeStatus(view: JobStatusView): Record<string, unknown> {
    return {
        job_id: view.jobId,
        file_name: view.filename,
        status: view.status,
        progress: {
            completed_chunks: view.progress.completedChunks,
            total_chunks: view.progress.totalChunks,
            percentage: view.progress.percentage,
        },
        ...(view.error !== undefined && { error: view.error }),
    };
}

export function serializeResult(view: JobResultView): Record<string, unknown> {
    return {
        job_id: view.jobId,
        file_name: view.filename,
        status: view.status,
        total_chunks: view.totalChunks,
        content: view.content,
        confidence: view.confidence,
        results: view.results.map(result => ({
            chunk_id: result.chunkId,
            index: result.index,
            start_page: result.startPage,
            end_page: result.endPage,
            status: result.status,
            content: result.content,
            confidence: result.confidence,
            model: result.model,
            processing_ms: result.processingMs,
            retry_count: result.retryCount,
            ...(result.usage && { usage: result.usage }),
            ...(result.error !== undefined && { error: result.error }),
        })),
        ...(view.error !== undefined && { error: view.error }),
    };
}

function serializeBreaker(breaker: CircuitBreakerSnapshot): Record<string, unknown> {
    return {
        name: breaker.name,
        state: breaker.state,
        failures: breaker.failures,
        failure_threshold: breaker.failureThreshold,
        ...(breaker.lastFailureAt && { last_failure_at: breaker.lastFailureAt.toISOString() }),
    };
}

export function serializeHealth(report: HealthReport): Record<string, unknown> {
    return {
        status: report.status,
        version: report.version,
        uptime_seconds: report.uptimeSeconds,
        active_jobs: report.activeJobs,
        queue_depth: report.queueDepth,
        circuit_breakers: report.breakers.map(serializeBreaker),
        last_processed_at: report.lastProcessedAt ?? null,
    };
}

export function serializeMetrics(report: MetricsReport): Record<string, unknown> {
    return {
        counters: report.counters,
        gauges: report.gauges,
        circuit_breakers: report.breakers.map(serializeBreaker),
        analysis: {
            provider: report.analysis.provider,
            total_requests: report.analysis.totalRequests,
            successful_requests: report.analysis.successfulRequests,
            failed_requests: report.analysis.failedRequests,
            success_rate: report.analysis.successRate,
            total_tokens: report.analysis.totalTokens,
            estimated_cost: report.analysis.estimatedCost,
        },
    };
}
