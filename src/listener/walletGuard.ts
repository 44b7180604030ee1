import type { HeaderHash, SkipReason, WalletId, WalletLogger, WalletStore } from '../types';
import { secretOnly } from '../log/logSafe';
import { sameHeaderHash } from '../utils/hex';

export type GuardOutcome<T> = { ran: true; value: T } | { ran: false; reason: SkipReason };

/**
 * Run `action` only when the wallet's recorded tip equals the current chain tip.
 */
export const walletGuard = async <M, T>(
  store: Pick<WalletStore<M>, 'getWalletSyncTip'>,
  logger: WalletLogger,
  currentTip: HeaderHash,
  walletId: WalletId,
  action: () => Promise<T>,
): Promise<GuardOutcome<T>> => {
  const state = await store.getWalletSyncTip(walletId);
  if (state === undefined) {
    logger.warnSP((sl) => `There is no syncTip corresponding to wallet #${secretOnly(sl, walletId)}`);
    return { ran: false, reason: { kind: 'unknown' } };
  }
  switch (state.status) {
    case 'not-synced':
      logger.infoSP((sl) => `Wallet #${secretOnly(sl, walletId)} hasn't been synced yet`);
      return { ran: false, reason: { kind: 'not-synced' } };
    case 'synced': {
      const walletTip = state.tip;
      if (!sameHeaderHash(walletTip, currentTip)) {
        logger.warnSP(
          (sl) =>
            `Skip wallet #${secretOnly(sl, walletId)}, because of wallet's tip ${walletTip} mismatched with current tip ${currentTip}`,
        );
        return { ran: false, reason: { kind: 'tip-mismatch', walletTip, currentTip } };
      }
      return { ran: true, value: await action() };
    }
  }
};
