/**
 * Trace Context Module
 *
 * AsyncLocalStorage-based trace context so every log line written while
 * handling one unit of work carries the same trace id:
 * - a cognitive cycle → `cycle_<n>`
 * - an inbound peer envelope → the sender's agent id
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

/**
 * Trace context for log correlation.
 */
export interface TraceContext {
  /** Root trace ID */
  traceId: string;
  /** Parent span ID */
  parentId?: string;
  /** Current span ID for this operation */
  spanId?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<TraceContext>();

/**
 * Run a function with trace context.
 * All descendant async operations inherit this context automatically.
 *
 * @example
 * ```ts
 * withTraceContext(createTraceContext('cycle_7'), () => {
 *   logger.info('Reflecting'); // carries traceId='cycle_7'
 * });
 * ```
 */
export function withTraceContext<T>(context: TraceContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Get the current trace context (if any).
 * Returns undefined if called outside of any withTraceContext.
 */
export function getTraceContext(): TraceContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Generate a child span ID, e.g. "root_abc123" or "root_abc123_def456".
 */
export function generateChildSpan(parent?: string): string {
  const shortId = randomUUID().slice(0, 8);
  return parent ? `${parent}_${shortId}` : `root_${shortId}`;
}

/**
 * Create a new trace context rooted at the given id.
 */
export function createTraceContext(
  id: string,
  options: { parentId?: string; spanId?: string } = {}
): TraceContext {
  const result: TraceContext = {
    traceId: id,
    spanId: options.spanId ?? generateChildSpan(options.parentId),
  };
  if (options.parentId !== undefined) {
    result.parentId = options.parentId;
  }
  return result;
}
