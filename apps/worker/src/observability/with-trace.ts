import type { Job } from 'bullmq';
import { ensureTraceId } from './trace.js';

interface TraceableData {
  traceId?: string;
}

/**
 * Pin a trace id onto the job so retries of the same job share it.
 */
export async function withTrace<TData extends TraceableData>(job: Job<TData>): Promise<string> {
  if (job.data.traceId?.trim()) {
    return job.data.traceId.trim();
  }

  const traceId = ensureTraceId();
  job.data.traceId = traceId;
  if (job.id !== undefined) {
    await job.updateData(job.data);
  }
  return traceId;
}
