import type { Job } from 'bullmq';
import { describe, expect, it, vi } from 'vitest';
import { ensureTraceId } from '../../src/observability/trace.js';
import { withTrace } from '../../src/observability/with-trace.js';
import { stub } from '../test-helpers.js';

describe('ensureTraceId', () => {
  it('returns an existing trace id trimmed', () => {
    expect(ensureTraceId(' trace-123 ')).toBe('trace-123');
  });

  it('creates a trace id when value is missing or blank', () => {
    expect(ensureTraceId()).toMatch(/^[0-9a-f-]{36}$/i);
    expect(ensureTraceId('   ')).toMatch(/^[0-9a-f-]{36}$/i);
  });
});

describe('withTrace', () => {
  it('reuses the trace id already on the job', async () => {
    const updateData = vi.fn().mockResolvedValue(undefined);
    const job = stub<Job<{ traceId?: string }>>({ id: 'job-1', data: { traceId: 'trace-abc' }, updateData });

    await expect(withTrace(job)).resolves.toBe('trace-abc');
    expect(updateData).not.toHaveBeenCalled();
  });

  it('stores a new trace id on the job so retries share it', async () => {
    const updateData = vi.fn().mockResolvedValue(undefined);
    const job = stub<Job<{ traceId?: string }>>({ id: 'job-2', data: {}, updateData });

    const traceId = await withTrace(job);

    expect(job.data.traceId).toBe(traceId);
    expect(updateData).toHaveBeenCalledWith({ traceId });
  });
});
