import { randomUUID } from 'node:crypto';

/**
 * Trace ids tie a queued job or an HTTP invocation to the run it starts;
 * the same id is used as the run id.
 */
export function ensureTraceId(traceId?: string): string {
  const trimmed = traceId?.trim();
  if (trimmed) {
    return trimmed;
  }

  return randomUUID();
}
