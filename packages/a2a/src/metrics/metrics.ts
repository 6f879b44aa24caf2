/**
 * Protocol metrics: one record per A2A request, plus a pure aggregation over records.
 */

import { randomUUID } from 'crypto';

export interface ProtocolMetricRecord {
    readonly requestId: string;
    readonly endpoint: string;
    readonly method: string;
    readonly statusCode: number | null;
    readonly latencyMs: number;
    readonly inputTokens: number | null;
    readonly outputTokens: number | null;
    readonly contextId: string | null;
    readonly error: string | null;
    /** ISO-8601 UTC */
    readonly timestamp: string;
}

export interface AggregatedMetrics {
    totalRequests: number;
    totalTokens: number;
    totalLatencyMs: number;
    avgLatencyMs: number;
    errorCount: number;
}

export type MetricRecordFields = Pick<ProtocolMetricRecord, 'endpoint' | 'latencyMs'> &
    Partial<Omit<ProtocolMetricRecord, 'endpoint' | 'latencyMs'>>;

/**
 * Rough token count: four characters per token. Not a tokenizer; deterministic.
 */
export function estimateTokens(text: string | null | undefined): number {
    if (!text) {
        return 0;
    }
    // Code points, so astral characters count once
    return Math.floor([...text].length / 4);
}

export function createMetricRecord(fields: MetricRecordFields): ProtocolMetricRecord {
    return Object.freeze({
        requestId: fields.requestId ?? randomUUID(),
        endpoint: fields.endpoint,
        method: fields.method ?? 'POST',
        statusCode: fields.statusCode ?? null,
        latencyMs: fields.latencyMs,
        inputTokens: fields.inputTokens ?? null,
        outputTokens: fields.outputTokens ?? null,
        contextId: fields.contextId ?? null,
        error: fields.error ?? null,
        timestamp: fields.timestamp ?? new Date().toISOString(),
    });
}

/**
 * Reduce records to totals. Order-independent; average latency is 0 for an empty list.
 */
export function aggregateMetrics(records: readonly ProtocolMetricRecord[]): AggregatedMetrics {
    let totalTokens = 0;
    let totalLatencyMs = 0;
    let errorCount = 0;

    for (const record of records) {
        totalTokens += (record.inputTokens ?? 0) + (record.outputTokens ?? 0);
        totalLatencyMs += record.latencyMs;
        if (record.error !== null) {
            errorCount++;
        }
    }

    return {
        totalRequests: records.length,
        totalTokens,
        totalLatencyMs,
        avgLatencyMs: records.length > 0 ? totalLatencyMs / records.length : 0,
        errorCount,
    };
}
