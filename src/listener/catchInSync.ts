import { SyncError, formatError } from '../errors';
import { secretOnly } from '../log/logSafe';
import { reportSafely } from '../reporting/reporter';
import type { ErrorReporter, SecurityLevel, SyncPhase, WalletId, WalletLogger } from '../types';

export type Isolated<T> = { ok: true; value: T } | { ok: false; message: string };

/**
 * Run one wallet's sync step. Failures are reported, logged and returned as a
 * value; nothing thrown by `action` escapes.
 */
export const catchInSync = async <T>(
  deps: { logger: WalletLogger; reporter?: ErrorReporter },
  phase: SyncPhase,
  walletId: WalletId,
  action: () => Promise<T>,
): Promise<Isolated<T>> => {
  try {
    return { ok: true, value: await action() };
  } catch (error) {
    const prefix = (sl: SecurityLevel) => `Failed to sync wallet ${secretOnly(sl, walletId)} in BListener (${phase}): `;
    const message = formatError(error);
    await reportSafely(
      deps.reporter,
      {
        phase,
        wallet: secretOnly('public', walletId),
        message,
        ...(error instanceof SyncError ? { code: error.code } : {}),
      },
      deps.logger,
    );
    deps.logger.warnSP((sl) => prefix(sl) + message);
    return { ok: false, message };
  }
};
