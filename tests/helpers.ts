import { vi } from 'vitest';
import type { Address, Blund, HeaderHash, LogSink, SyncEvent, TxTracker, TxWithUndo, WalletListenerOptions } from '../src/types';
import { MemoryWalletStore, type ModifierReducer } from '../src/store/memoryWalletStore';
import { MemoryKeyStore } from '../src/keys/memoryKeyStore';
import { MemoryChainTip } from '../src/chain/chainTip';
import { StaticSlotting } from '../src/slotting/slotting';
import { Logger, MemorySink } from '../src/log/logger';
import { MemoryErrorReporter } from '../src/reporting/reporter';
import { WalletBlockListener } from '../src/listener/walletListener';

export type TestTx = { id: string; to: Address };
export type TestUndo = { spentBy: string };
export type TestModifier = { txIds: string[]; used: Address[] };
export type TestTracker = TxTracker<TestTx, TestUndo, string, TestModifier>;

export const SYSTEM_START = 1_600_000_000_000;
export const SLOT_MS = 20_000;

export const hash = (n: number): HeaderHash => `0x${n.toString(16).padStart(64, '0')}`;

/**
 * Main block at `height` with `txCount` transactions, linked to `height - 1`.
 */
export const mainBlund = (height: number, txCount = 2): Blund<TestTx, TestUndo> => {
  const txs: TestTx[] = [];
  const txUndo: TestUndo[] = [];
  for (let i = 0; i < txCount; i++) {
    txs.push({ id: `tx-${height}-${i}`, to: `addr-${height}-${i}` });
    txUndo.push({ spentBy: `tx-${height}-${i}` });
  }
  return {
    block: {
      header: {
        kind: 'main',
        hash: hash(height),
        prevHash: hash(height - 1),
        slot: { epoch: 0, slot: height },
        difficulty: BigInt(height),
      },
      txs,
    },
    undo: { txUndo },
  };
};

export const genesisBlund = (height: number): Blund<TestTx, TestUndo> => ({
  block: { header: { kind: 'genesis', hash: hash(height), prevHash: hash(height - 1), slot: { epoch: 0, slot: 0 } } },
});

/** Main blocks `from..to`, oldest first. */
export const mainChain = (from: number, to: number, txCount = 2): Blund<TestTx, TestUndo>[] => {
  const out: Blund<TestTx, TestUndo>[] = [];
  for (let h = from; h <= to; h++) out.push(mainBlund(h, txCount));
  return out;
};

export const ids = (txs: TxWithUndo<TestTx, TestUndo>[]) => txs.map((t) => t.tx.id);

export const historyReducer: ModifierReducer<string[], TestModifier> = {
  apply: (view, modifier) => [...view, ...modifier.txIds],
  rollback: (view, modifier) => {
    const removed = new Set(modifier.txIds);
    return view.filter((id) => !removed.has(id));
  },
  usedAddresses: (modifier) => modifier.used,
};

export const createTracker = () => ({
  trackingApplyTxs: vi.fn<TestTracker['trackingApplyTxs']>((_key, _used, _difficultyOf, _timestampOf, _blockInfoOf, txs) => ({
    txIds: ids(txs),
    used: txs.map((t) => t.tx.to),
  })),
  trackingRollbackTxs: vi.fn<TestTracker['trackingRollbackTxs']>((_key, _used, _difficultyOf, _timestampOf, txs) => ({
    txIds: ids(txs),
    used: txs.map((t) => t.tx.to),
  })),
});

export const createHarness = (options: {
  tip: HeaderHash;
  listenerOptions?: WalletListenerOptions<TestModifier>;
  extraSinks?: LogSink[];
  onEvent?: (evt: SyncEvent) => void;
}) => {
  const walletStore = new MemoryWalletStore<string[], TestModifier>(historyReducer, () => []);
  const keyStore = new MemoryKeyStore<string>();
  const chainTip = new MemoryChainTip(options.tip);
  const slotting = new StaticSlotting(SYSTEM_START, { epochs: [{ epoch: 0, slotDurationMs: SLOT_MS, startDiffMs: 0 }] });
  const publicSink = new MemorySink('public');
  const secureSink = new MemorySink('secure');
  const logger = new Logger({ minLevel: 'debug', sinks: [publicSink, secureSink, ...(options.extraSinks ?? [])] }, 'node');
  const reporter = new MemoryErrorReporter();
  const tracker = createTracker();
  const events: SyncEvent[] = [];
  const listener = new WalletBlockListener<TestTx, TestUndo, string, TestModifier>(
    {
      chainTip,
      slotting,
      walletStore,
      keyStore,
      tracker,
      logger,
      reporter,
      emit: (evt) => {
        events.push(evt);
        options.onEvent?.(evt);
      },
    },
    options.listenerOptions,
  );
  return { walletStore, keyStore, chainTip, slotting, publicSink, secureSink, logger, reporter, tracker, events, listener };
};
