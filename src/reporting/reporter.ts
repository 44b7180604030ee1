import { formatError } from '../errors';
import type { ErrorReporter, RedactedFailure, SyncEvent, WalletLogger } from '../types';

/**
 * Hand a failure to the reporter. A failing reporter is logged at debug level
 * and otherwise ignored.
 */
export const reportSafely = async (reporter: ErrorReporter | undefined, report: RedactedFailure, logger: WalletLogger) => {
  if (!reporter) return;
  try {
    await reporter.tryReport(report);
  } catch (error) {
    logger.debugSP(() => `Error reporter failed: ${formatError(error)}`);
  }
};

/**
 * Publishes reports as `error` events.
 */
export class EventErrorReporter implements ErrorReporter {
  constructor(private readonly emit: (event: SyncEvent) => void) {}

  tryReport(report: RedactedFailure) {
    this.emit({
      type: 'error',
      payload: {
        code: report.code ?? 'TRACKING',
        message: `Failed to sync wallet ${report.wallet} (${report.phase}): ${report.message}`,
        detail: report,
      },
    });
  }
}

export class MemoryErrorReporter implements ErrorReporter {
  readonly reports: RedactedFailure[] = [];

  tryReport(report: RedactedFailure) {
    this.reports.push(report);
  }
}
