export type {
  Address,
  BatchOp,
  BlockHeader,
  BlockInfoFn,
  BlockListener,
  Blund,
  ChainTip,
  CustomAddressKind,
  Difficulty,
  DifficultyFn,
  EpochSlottingData,
  ErrorReporter,
  GenesisBlock,
  GenesisBlockHeader,
  HeaderHash,
  Hex,
  KeyStore,
  LogEntry,
  LogLevel,
  LogSink,
  MainBlock,
  MainBlockHeader,
  NewestFirst,
  NonEmpty,
  OldestFirst,
  RedactedFailure,
  SafeFormatter,
  SecurityLevel,
  SkipReason,
  SlotId,
  Slotting,
  SlottingData,
  SomeBatchOp,
  SyncErrorCode,
  SyncEvent,
  SyncPhase,
  Timestamp,
  TimestampFn,
  TxTracker,
  TxWithUndo,
  Undo,
  WalletId,
  WalletListenerDeps,
  WalletListenerOptions,
  WalletLogger,
  WalletStore,
  WalletSyncResult,
  WalletSyncState,
} from './types';
export { SyncError, formatError } from './errors';
export { SyncEventBus } from './core/events';
export { oldestFirst, newestFirst, toNewestFirst, toOldestFirst, assertChainLinked } from './chain/chrono';
export { txsWithUndo, applyStream, rollbackStream, applyNewTip, rollbackNewTip } from './chain/blockWindow';
export { difficultyOf, blockInfoOf, isMainBlund } from './chain/headers';
export { MemoryChainTip } from './chain/chainTip';
export { getSlotStart, headerTimestampGetter, StaticSlotting } from './slotting/slotting';
export { Logger, ConsoleSink, MemorySink, EventSink, isLogLevel, type LoggerConfig } from './log/logger';
export { secretOnly, buildSafe, isSafeBuildable, HIDDEN, type SafeBuildable } from './log/logSafe';
export { reportSafely, EventErrorReporter, MemoryErrorReporter } from './reporting/reporter';
export { walletGuard, type GuardOutcome } from './listener/walletGuard';
export { catchInSync, type Isolated } from './listener/catchInSync';
export { logWarningWaitInf, type WaitOptions } from './listener/timeLimit';
export { WalletBlockListener, normalizeListenerOptions } from './listener/walletListener';
export { MemoryWalletStore, type ModifierReducer } from './store/memoryWalletStore';
export { MemoryKeyStore } from './keys/memoryKeyStore';
export { isHexStrict, assertHeaderHash, sameHeaderHash } from './utils/hex';

import type { ErrorReporter, LogLevel, SyncEvent, WalletListenerDeps, WalletListenerOptions, WalletLogger } from './types';
import { SyncEventBus } from './core/events';
import { ConsoleSink, EventSink, Logger } from './log/logger';
import { EventErrorReporter } from './reporting/reporter';
import { WalletBlockListener } from './listener/walletListener';

export type CreateWalletListenerConfig<Tx, U, K, M> = Omit<WalletListenerDeps<Tx, U, K, M>, 'logger' | 'emit' | 'reporter'> & {
  logger?: WalletLogger;
  /** Used when no logger is supplied. */
  logLevel?: LogLevel;
  reporter?: ErrorReporter;
  onEvent?: (event: SyncEvent) => void;
  options?: WalletListenerOptions<M>;
};

/**
 * Wire a listener with an event bus, a console logger and an event-backed
 * error reporter unless those are supplied.
 *
 * @example
 * const { listener, events } = createWalletListener({ chainTip, slotting, walletStore, keyStore, tracker });
 * events.on('listener:done', (e) => console.log(e.payload.results));
 * await listener.onApplyBlocks(oldestFirst(blunds));
 */
export const createWalletListener = <Tx, U, K, M>(config: CreateWalletListenerConfig<Tx, U, K, M>) => {
  const events = new SyncEventBus();
  const emit = (event: SyncEvent) => {
    try {
      config.onEvent?.(event);
    } finally {
      events.emit(event);
    }
  };
  const logger =
    config.logger ?? new Logger({ minLevel: config.logLevel ?? 'info', sinks: [new ConsoleSink(), new EventSink(emit)] }, 'node');
  const listener = new WalletBlockListener<Tx, U, K, M>(
    {
      chainTip: config.chainTip,
      slotting: config.slotting,
      walletStore: config.walletStore,
      keyStore: config.keyStore,
      tracker: config.tracker,
      logger,
      reporter: config.reporter ?? new EventErrorReporter(emit),
      emit,
    },
    config.options,
  );
  return { listener, events };
};
