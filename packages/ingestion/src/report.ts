import type {
  EnumerationWarning,
  PageFailure,
  PageOutcome,
  RunCounts,
  RunReport,
  RunStatus,
} from './types.js';

export const DEFAULT_SUMMARY_FAILURE_LIMIT = 50;

function emptyCounts(): RunCounts {
  return {
    discovered: 0,
    fetchFailed: 0,
    extractedOk: 0,
    extractedFailed: 0,
    validatedOk: 0,
    validatedFailed: 0,
    persistedOk: 0,
    persistedFailed: 0,
  };
}

/**
 * Mutable run tally owned by the accumulator. Once `finish` is called the
 * builder rejects further writes; the returned report is a snapshot.
 */
export class RunReportBuilder {
  private readonly counts = emptyCounts();
  private readonly failures: PageFailure[] = [];
  private readonly warnings: EnumerationWarning[] = [];
  private readonly startedAt: Date;
  private finished = false;

  constructor(
    private readonly runId: string,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.startedAt = this.now();
  }

  recordDiscovered(): void {
    this.assertOpen();
    this.counts.discovered += 1;
  }

  recordWarning(warning: EnumerationWarning): void {
    this.assertOpen();
    this.warnings.push(warning);
  }

  /**
   * Tally one page driven through fetch → extract → validate.
   */
  recordOutcome(outcome: PageOutcome): void {
    this.assertOpen();

    if (outcome.status === 'validated') {
      this.counts.extractedOk += 1;
      this.counts.validatedOk += 1;
      return;
    }

    const { failure } = outcome;
    switch (failure.stage) {
      case 'fetch':
        this.counts.fetchFailed += 1;
        break;
      case 'extract':
        this.counts.extractedFailed += 1;
        break;
      case 'validate':
        this.counts.extractedOk += 1;
        this.counts.validatedFailed += 1;
        break;
      case 'persist':
        this.counts.persistedFailed += 1;
        break;
    }
    this.failures.push(failure);
  }

  recordPersisted(count: number): void {
    this.assertOpen();
    this.counts.persistedOk += count;
  }

  recordPersistFailure(failure: PageFailure): void {
    this.recordOutcome({ status: 'failed', url: failure.url, failure });
  }

  snapshotCounts(): RunCounts {
    return { ...this.counts };
  }

  finish(status: RunStatus, fatalError?: string): RunReport {
    this.assertOpen();
    this.finished = true;

    const finishedAt = this.now();
    const report: RunReport = {
      runId: this.runId,
      status,
      counts: { ...this.counts },
      failures: [...this.failures],
      warnings: [...this.warnings],
      startedAt: this.startedAt,
      finishedAt,
      durationMs: finishedAt.getTime() - this.startedAt.getTime(),
    };
    if (fatalError !== undefined) {
      report.fatalError = fatalError;
    }
    return report;
  }

  private assertOpen(): void {
    if (this.finished) {
      throw new Error(`Run report ${this.runId} is already finalized`);
    }
  }
}

export interface RunSummary {
  runId: string;
  status: RunStatus;
  fatal: boolean;
  fatalError?: string;
  counts: RunCounts;
  warnings: EnumerationWarning[];
  failures: PageFailure[];
  failuresTruncated: boolean;
  durationMs: number;
}

/**
 * JSON-safe view of a report for responses and job return values.
 */
export function summarizeRunReport(report: RunReport, maxFailures = DEFAULT_SUMMARY_FAILURE_LIMIT): RunSummary {
  const summary: RunSummary = {
    runId: report.runId,
    status: report.status,
    fatal: report.status === 'aborted',
    counts: { ...report.counts },
    warnings: [...report.warnings],
    failures: report.failures.slice(0, maxFailures),
    failuresTruncated: report.failures.length > maxFailures,
    durationMs: report.durationMs,
  };
  if (report.fatalError !== undefined) {
    summary.fatalError = report.fatalError;
  }
  return summary;
}
