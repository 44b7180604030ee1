import type { Hex } from 'viem';

export type { Hex };

/** Hash of a block header, `0x`-prefixed. */
export type HeaderHash = Hex;

/** Milliseconds since the Unix epoch. */
export type Timestamp = number;

/** Chain difficulty (number of main blocks since genesis). */
export type Difficulty = bigint;

/** Opaque wallet identifier. */
export type WalletId = string;

/** Opaque address as stored by the wallet DB. */
export type Address = string;

export type SyncErrorCode = 'WINDOW' | 'STORAGE' | 'KEY' | 'TRACKING' | 'SLOTTING';

export interface SlotId {
  epoch: number;
  slot: number;
}

export interface GenesisBlockHeader {
  kind: 'genesis';
  hash: HeaderHash;
  prevHash: HeaderHash;
  slot: SlotId;
}

export interface MainBlockHeader {
  kind: 'main';
  hash: HeaderHash;
  prevHash: HeaderHash;
  slot: SlotId;
  difficulty: Difficulty;
}

export type BlockHeader = GenesisBlockHeader | MainBlockHeader;

export interface GenesisBlock {
  header: GenesisBlockHeader;
}

export interface MainBlock<Tx> {
  header: MainBlockHeader;
  txs: Tx[];
}

/** Per-transaction rollback data, index-aligned with the block's transactions. */
export interface Undo<U> {
  txUndo: U[];
}

/** A block paired with its undo data. Genesis blocks carry none. */
export type Blund<Tx, U> = { block: GenesisBlock; undo?: undefined } | { block: MainBlock<Tx>; undo: Undo<U> };

/** Unit of work handed to the tracker. */
export interface TxWithUndo<Tx, U> {
  tx: Tx;
  undo: U;
  header: BlockHeader;
}

export type NonEmpty<T> = readonly [T, ...T[]];

export interface OldestFirst<T> {
  readonly order: 'oldest-first';
  readonly items: NonEmpty<T>;
}

export interface NewestFirst<T> {
  readonly order: 'newest-first';
  readonly items: NonEmpty<T>;
}

export type WalletSyncState = { status: 'not-synced' } | { status: 'synced'; tip: HeaderHash };

export type CustomAddressKind = 'used' | 'change';

export type BatchOp = { type: 'put'; key: string; value: unknown } | { type: 'del'; key: string };

export type SomeBatchOp = BatchOp[];

export interface EpochSlottingData {
  epoch: number;
  slotDurationMs: number;
  /** Offset of the epoch's first slot from system start. */
  startDiffMs: number;
}

export interface SlottingData {
  epochs: EpochSlottingData[];
}

export type SecurityLevel = 'secure' | 'public';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  name: string;
  security: SecurityLevel;
  message: string;
}

/** Builds a message for the given security level. */
export type SafeFormatter = (sl: SecurityLevel) => string;

export interface LogSink {
  readonly security: SecurityLevel;
  write(entry: LogEntry): void;
}

export interface WalletLogger {
  readonly name: string;
  named(component: string): WalletLogger;
  debugSP(format: SafeFormatter): void;
  infoSP(format: SafeFormatter): void;
  warnSP(format: SafeFormatter): void;
  errorSP(format: SafeFormatter): void;
}

export type SyncPhase = 'apply' | 'rollback';

export type SkipReason =
  | { kind: 'unknown' }
  | { kind: 'not-synced' }
  | { kind: 'tip-mismatch'; walletTip: HeaderHash; currentTip: HeaderHash };

/** Outcome of one wallet's turn in an apply/rollback call. */
export type WalletSyncResult =
  | { walletId: WalletId; status: 'synced'; newTip: HeaderHash; blocks: number }
  | { walletId: WalletId; status: 'skipped'; reason: SkipReason }
  | { walletId: WalletId; status: 'failed'; message: string };

/** Failure description handed to the reporting sink; carries no secrets. */
export interface RedactedFailure {
  phase: SyncPhase;
  wallet: string;
  message: string;
  code?: SyncErrorCode;
}

export interface SyncErrorPayload {
  code: SyncErrorCode;
  message: string;
  detail?: unknown;
  cause?: unknown;
}

export type SyncEvent =
  | { type: 'listener:start'; payload: { phase: SyncPhase; blocks: number } }
  | { type: 'listener:wallet'; payload: { phase: SyncPhase; result: WalletSyncResult } }
  | { type: 'listener:done'; payload: { phase: SyncPhase; blocks: number; results: WalletSyncResult[]; durationMs: number } }
  | { type: 'listener:overrun'; payload: { phase: SyncPhase; elapsedMs: number; thresholdMs: number } }
  | { type: 'log'; payload: LogEntry }
  | { type: 'error'; payload: SyncErrorPayload };

/** Source of the current canonical chain tip. */
export interface ChainTip {
  getTip(): Promise<HeaderHash>;
}

export interface Slotting {
  getSystemStart(): Promise<Timestamp>;
  getSlottingData(): Promise<SlottingData>;
  getCurrentEpochSlotDuration(): Promise<number>;
}

/** Wallet DB operations the listener relies on. */
export interface WalletStore<M> {
  /** Resolves `undefined` when the wallet has no sync record at all. */
  getWalletSyncTip(walletId: WalletId): Promise<WalletSyncState | undefined>;
  getWalletAddresses(): Promise<WalletId[]>;
  getCustomAddresses(kind: CustomAddressKind): Promise<Set<Address>>;
  applyModifierToWallet(walletId: WalletId, newTip: HeaderHash, modifier: M): Promise<void>;
  rollbackModifierFromWallet(walletId: WalletId, newTip: HeaderHash, modifier: M): Promise<void>;
}

export interface KeyStore<K> {
  /** Rejects when the wallet has no key. */
  getSecretKeyById(walletId: WalletId): Promise<K>;
}

export type DifficultyFn = (header: BlockHeader) => Difficulty | null;
export type TimestampFn = (header: BlockHeader) => Timestamp | null;
export type BlockInfoFn = (header: BlockHeader) => Difficulty | null;

/** Computes wallet deltas from a transaction stream. */
export interface TxTracker<Tx, U, K, M> {
  trackingApplyTxs(
    key: K,
    usedAddresses: Set<Address>,
    difficultyOf: DifficultyFn,
    timestampOf: TimestampFn,
    blockInfoOf: BlockInfoFn,
    txs: TxWithUndo<Tx, U>[],
  ): M | Promise<M>;
  trackingRollbackTxs(
    key: K,
    usedAddresses: Set<Address>,
    difficultyOf: DifficultyFn,
    timestampOf: TimestampFn,
    txs: TxWithUndo<Tx, U>[],
  ): M | Promise<M>;
}

export interface ErrorReporter {
  tryReport(report: RedactedFailure): void | Promise<void>;
}

/** Entry points invoked by the block-processing pipeline. */
export interface BlockListener<Tx, U> {
  onApplyBlocks(window: OldestFirst<Blund<Tx, U>>): Promise<SomeBatchOp>;
  onRollbackBlocks(window: NewestFirst<Blund<Tx, U>>): Promise<SomeBatchOp>;
}

export interface WalletListenerOptions<M> {
  /** Logger name the listener appends its components to. */
  loggerName?: string;
  /** Fraction of the current slot duration after which an overrun is logged. */
  overrunRatio?: number;
  /** Growth factor between repeated overrun warnings. */
  overrunGrowth?: number;
  /** Verify that consecutive blocks of a window are chain-linked. */
  checkLinks?: boolean;
  /** Renders the modifier in the per-wallet success log; defaults to the modifier's own `toSafeString`. */
  formatModifier?: (modifier: M, sl: SecurityLevel) => string;
}

export interface WalletListenerDeps<Tx, U, K, M> {
  chainTip: ChainTip;
  slotting: Slotting;
  walletStore: WalletStore<M>;
  keyStore: KeyStore<K>;
  tracker: TxTracker<Tx, U, K, M>;
  logger: WalletLogger;
  reporter?: ErrorReporter;
  emit?: (event: SyncEvent) => void;
}
