/**
 * Metrics export in the harness's results format (snake_case JSON, nulls omitted).
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { AggregatedMetrics, ProtocolMetricRecord } from './metrics.js';
import { aggregateMetrics } from './metrics.js';
import { A2AError } from '../errors.js';

export const A2A_AGENT_TYPE = 'a2a_agent';

export interface ProtocolMetricRecordJSON {
    request_id: string;
    endpoint: string;
    method: string;
    status_code?: number;
    latency_ms: number;
    input_tokens?: number;
    output_tokens?: number;
    context_id?: string;
    error?: string;
    timestamp: string;
}

export interface AggregatedMetricsJSON {
    total_requests: number;
    total_tokens: number;
    total_latency_ms: number;
    avg_latency_ms: number;
    error_count: number;
}

export interface MetricsExport {
    task_id: string | null;
    agent_type: typeof A2A_AGENT_TYPE;
    protocol_metrics: ProtocolMetricRecordJSON[];
    summary: AggregatedMetricsJSON;
}

export function metricRecordToJSON(record: ProtocolMetricRecord): ProtocolMetricRecordJSON {
    return {
        request_id: record.requestId,
        endpoint: record.endpoint,
        method: record.method,
        ...(record.statusCode !== null && { status_code: record.statusCode }),
        latency_ms: record.latencyMs,
        ...(record.inputTokens !== null && { input_tokens: record.inputTokens }),
        ...(record.outputTokens !== null && { output_tokens: record.outputTokens }),
        ...(record.contextId !== null && { context_id: record.contextId }),
        ...(record.error !== null && { error: record.error }),
        timestamp: record.timestamp,
    };
}

export function aggregatedMetricsToJSON(summary: AggregatedMetrics): AggregatedMetricsJSON {
    return {
        total_requests: summary.totalRequests,
        total_tokens: summary.totalTokens,
        total_latency_ms: summary.totalLatencyMs,
        avg_latency_ms: summary.avgLatencyMs,
        error_count: summary.errorCount,
    };
}

export function buildMetricsExport(
    records: readonly ProtocolMetricRecord[],
    taskId?: string | null
): MetricsExport {
    return {
        task_id: taskId ?? null,
        agent_type: A2A_AGENT_TYPE,
        protocol_metrics: records.map(metricRecordToJSON),
        summary: aggregatedMetricsToJSON(aggregateMetrics(records)),
    };
}

/**
 * Write an export as pretty-printed JSON, creating parent directories as needed
 */
export async function writeMetricsExport(filePath: string, data: MetricsExport): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(data, null, 2) + '\n', 'utf8');
}

/**
 * Attach A2A metrics to an existing results file under `a2a_protocol_metrics`.
 * The file must hold a JSON object; other keys are preserved.
 */
export async function appendMetricsToResults(
    filePath: string,
    records: readonly ProtocolMetricRecord[]
): Promise<Record<string, unknown>> {
    const raw = await fs.readFile(filePath, 'utf8');
    const existing: unknown = JSON.parse(raw);
    if (typeof existing !== 'object' || existing === null || Array.isArray(existing)) {
        throw A2AError.invalidResultsFile(filePath);
    }

    const updated: Record<string, unknown> = {
        ...existing,
        a2a_protocol_metrics: {
            requests: records.map(metricRecordToJSON),
            summary: aggregatedMetricsToJSON(aggregateMetrics(records)),
        },
    };
    await fs.writeFile(filePath, JSON.stringify(updated, null, 2) + '\n', 'utf8');
    return updated;
}
