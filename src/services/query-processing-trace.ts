// src/services/query-processing-trace.ts
// Request-scoped observability: a sub-logger plus timed spans for each pipeline stage.
import crypto from 'crypto';
import { createRequestLogger, type AppLogger } from '@/utils/logger';
import type { DegradationFlag } from '@/types/core';

export interface Span {
  name: string;
  startTime: number;
  endTime: number;
  durationMs: number;
  metadata?: Record<string, unknown>;
  error?: string;
}

export interface QueryProcessingTrace {
  traceId: string;
  startTime: number;
  endTime?: number;
  spans: Span[];
  originalQuery?: string;
}

/** Passed explicitly into every stage; nothing here is process-global. */
export interface ObservabilityContext {
  requestId: string;
  log: AppLogger;
  trace: QueryProcessingTrace;
  flags: Set<DegradationFlag>;
}

function generateTraceId(): string {
  return 'qp_' + crypto.randomBytes(8).toString('hex');
}

export function createTrace(options?: { originalQuery?: string }): QueryProcessingTrace {
  return {
    traceId: generateTraceId(),
    startTime: Date.now(),
    spans: [],
    originalQuery: options?.originalQuery,
  };
}

export function addSpan(
  trace: QueryProcessingTrace,
  name: string,
  startTime: number,
  options?: { metadata?: Record<string, unknown>; error?: string },
): void {
  const endTime = Date.now();
  trace.spans.push({
    name,
    startTime,
    endTime,
    durationMs: endTime - startTime,
    metadata: options?.metadata,
    error: options?.error,
  });
}

export function finishTrace(trace: QueryProcessingTrace): void {
  trace.endTime = Date.now();
}

export function createObservabilityContext(originalQuery?: string): ObservabilityContext {
  const trace = createTrace({ originalQuery });
  return {
    requestId: trace.traceId,
    log: createRequestLogger(trace.traceId),
    trace,
    flags: new Set<DegradationFlag>(),
  };
}

