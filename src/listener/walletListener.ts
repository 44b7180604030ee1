import type {
  BlockListener,
  Blund,
  ErrorReporter,
  HeaderHash,
  KeyStore,
  NewestFirst,
  OldestFirst,
  SecurityLevel,
  Slotting,
  SomeBatchOp,
  SyncEvent,
  SyncPhase,
  TxTracker,
  WalletId,
  WalletListenerDeps,
  WalletListenerOptions,
  WalletLogger,
  WalletStore,
  WalletSyncResult,
  ChainTip,
} from '../types';
import { applyNewTip, applyStream, rollbackNewTip, rollbackStream } from '../chain/blockWindow';
import { assertChainLinked } from '../chain/chrono';
import { blockInfoOf, difficultyOf } from '../chain/headers';
import { headerTimestampGetter } from '../slotting/slotting';
import { buildSafe, isSafeBuildable, secretOnly } from '../log/logSafe';
import { formatError } from '../errors';
import { toBoundedNumber } from '../utils/options';
import { walletGuard } from './walletGuard';
import { catchInSync } from './catchInSync';
import { logWarningWaitInf } from './timeLimit';

const DEFAULT_LOGGER_NAME = 'wallet.blistener';
const DEFAULT_OVERRUN_RATIO = 0.5;
const DEFAULT_OVERRUN_GROWTH = 1.3;

type NormalizedListenerOptions<M> = {
  loggerName: string;
  overrunRatio: number;
  overrunGrowth: number;
  checkLinks: boolean;
  formatModifier?: (modifier: M, sl: SecurityLevel) => string;
};

export const normalizeListenerOptions = <M>(options?: WalletListenerOptions<M>): NormalizedListenerOptions<M> => {
  const loggerName = options?.loggerName?.trim();
  return {
    loggerName: loggerName ? loggerName : DEFAULT_LOGGER_NAME,
    overrunRatio: toBoundedNumber(options?.overrunRatio, DEFAULT_OVERRUN_RATIO, { min: 0.01, max: 1 }),
    overrunGrowth: toBoundedNumber(options?.overrunGrowth, DEFAULT_OVERRUN_GROWTH, { min: 1 }),
    checkLinks: options?.checkLinks ?? true,
    formatModifier: options?.formatModifier,
  };
};

type WalletStep = (walletId: WalletId) => Promise<void>;

/**
 * Keeps every tracked wallet's view in step with the chain as blocks are
 * applied or rolled back.
 *
 * Must be invoked under the caller's block lock: chain state is assumed frozen
 * for the duration of each call. Wallets are processed one after another; a
 * failing wallet is reported and skipped, and so is a failing event subscriber
 * or log sink. The call itself only rejects on a malformed window.
 *
 * Both entry points return an empty batch. Wallet state is written directly
 * through the wallet store, outside that batch, until wallet storage moves
 * into the node database.
 */
export class WalletBlockListener<Tx, U, K, M> implements BlockListener<Tx, U> {
  private readonly chainTip: ChainTip;
  private readonly slotting: Slotting;
  private readonly walletStore: WalletStore<M>;
  private readonly keyStore: KeyStore<K>;
  private readonly tracker: TxTracker<Tx, U, K, M>;
  private readonly logger: WalletLogger;
  private readonly reporter?: ErrorReporter;
  private readonly emit: (event: SyncEvent) => void;
  private readonly options: NormalizedListenerOptions<M>;

  constructor(deps: WalletListenerDeps<Tx, U, K, M>, options?: WalletListenerOptions<M>) {
    this.options = normalizeListenerOptions(options);
    this.chainTip = deps.chainTip;
    this.slotting = deps.slotting;
    this.walletStore = deps.walletStore;
    this.keyStore = deps.keyStore;
    this.tracker = deps.tracker;
    this.reporter = deps.reporter;
    this.emit = deps.emit ?? (() => undefined);
    this.logger = this.options.loggerName
      .split('.')
      .filter((part) => part.length > 0)
      .reduce((logger, part) => logger.named(part), deps.logger);
  }

  // Perform under block lock.
  async onApplyBlocks(window: OldestFirst<Blund<Tx, U>>): Promise<SomeBatchOp> {
    if (this.options.checkLinks) assertChainLinked(window);
    const txs = applyStream(window);
    const newTip = applyNewTip(window);
    const blocks = window.items.length;

    await this.reportTimeouts('apply', () =>
      this.syncAll('apply', blocks, newTip, async (walletId) => {
        const timestampOf = await headerTimestampGetter(this.slotting);
        const used = await this.walletStore.getCustomAddresses('used');
        const key = await this.keyStore.getSecretKeyById(walletId);
        const modifier = await this.tracker.trackingApplyTxs(key, used, difficultyOf, timestampOf, blockInfoOf, txs);
        await this.walletStore.applyModifierToWallet(walletId, newTip, modifier);
        this.logMsg('Applied', blocks, walletId, modifier);
      }),
    );

    return [];
  }

  // Perform under block lock.
  async onRollbackBlocks(window: NewestFirst<Blund<Tx, U>>): Promise<SomeBatchOp> {
    if (this.options.checkLinks) assertChainLinked(window);
    const txs = rollbackStream(window);
    const newTip = rollbackNewTip(window);
    const blocks = window.items.length;

    await this.reportTimeouts('rollback', () =>
      this.syncAll('rollback', blocks, newTip, async (walletId) => {
        const key = await this.keyStore.getSecretKeyById(walletId);
        const timestampOf = await headerTimestampGetter(this.slotting);
        const used = await this.walletStore.getCustomAddresses('used');
        const modifier = await this.tracker.trackingRollbackTxs(key, used, difficultyOf, timestampOf, txs);
        await this.walletStore.rollbackModifierFromWallet(walletId, newTip, modifier);
        this.logMsg('Rolled back', blocks, walletId, modifier);
      }),
    );

    return [];
  }

  /**
   * Run `step` for every tracked wallet whose tip matches the current chain tip.
   */
  private async syncAll(phase: SyncPhase, blocks: number, newTip: HeaderHash, step: WalletStep): Promise<WalletSyncResult[]> {
    const startedAt = Date.now();
    this.notify({ type: 'listener:start', payload: { phase, blocks } });
    const currentTip = await this.chainTip.getTip();
    const results: WalletSyncResult[] = [];
    for (const walletId of await this.walletStore.getWalletAddresses()) {
      const result = await this.syncWallet(phase, currentTip, walletId, blocks, newTip, step);
      results.push(result);
      this.notify({ type: 'listener:wallet', payload: { phase, result } });
    }
    this.notify({ type: 'listener:done', payload: { phase, blocks, results, durationMs: Date.now() - startedAt } });
    return results;
  }

  private async syncWallet(
    phase: SyncPhase,
    currentTip: HeaderHash,
    walletId: WalletId,
    blocks: number,
    newTip: HeaderHash,
    step: WalletStep,
  ): Promise<WalletSyncResult> {
    const isolated = await catchInSync({ logger: this.logger, reporter: this.reporter }, phase, walletId, () =>
      walletGuard(this.walletStore, this.logger, currentTip, walletId, () => step(walletId)),
    );
    if (!isolated.ok) return { walletId, status: 'failed', message: isolated.message };
    const outcome = isolated.value;
    if (!outcome.ran) return { walletId, status: 'skipped', reason: outcome.reason };
    return { walletId, status: 'synced', newTip, blocks };
  }

  private async reportTimeouts<T>(phase: SyncPhase, action: () => Promise<T>): Promise<T> {
    const slotDuration = await this.slotting.getCurrentEpochSlotDuration();
    const firstWarningMs = Math.floor(slotDuration * this.options.overrunRatio);
    return logWarningWaitInf(this.logger, firstWarningMs, `Wallet blistener ${phase}`, action, {
      growth: this.options.overrunGrowth,
      onOverrun: ({ elapsedMs, thresholdMs }) =>
        this.notify({ type: 'listener:overrun', payload: { phase, elapsedMs, thresholdMs } }),
    });
  }

  /**
   * Emit to subscribers. A throwing subscriber is logged at debug level and
   * never aborts the wallet loop.
   */
  private notify(event: SyncEvent) {
    try {
      this.emit(event);
    } catch (error) {
      this.logger.debugSP(() => `Event subscriber failed on ${event.type}: ${formatError(error)}`);
    }
  }

  private logMsg(action: string, blocks: number, walletId: WalletId, modifier: M) {
    const formatModifier = this.options.formatModifier;
    this.logger.infoSP((sl) => {
      const base = `${action} ${blocks} block(s) to wallet ${secretOnly(sl, walletId)}`;
      if (formatModifier) return `${base}, ${formatModifier(modifier, sl)}`;
      return isSafeBuildable(modifier) ? `${base}, ${buildSafe(sl, modifier)}` : base;
    });
  }
}
