import { SyncError } from '../errors';
import type { Address, CustomAddressKind, HeaderHash, WalletId, WalletStore, WalletSyncState } from '../types';
import { assertHeaderHash } from '../utils/hex';

/**
 * How a modifier changes a wallet's stored view.
 */
export interface ModifierReducer<V, M> {
  apply(view: V, modifier: M): V;
  rollback(view: V, modifier: M): V;
  /** Addresses the modifier marks as used. */
  usedAddresses?(modifier: M): Iterable<Address>;
}

type WalletRecord<V> = {
  syncState: WalletSyncState;
  view: V;
};

/**
 * In-memory WalletStore implementation.
 * Useful for ephemeral sessions or tests (non-persistent).
 */
export class MemoryWalletStore<V, M> implements WalletStore<M> {
  private readonly wallets = new Map<WalletId, WalletRecord<V>>();
  private readonly customAddresses: Record<CustomAddressKind, Map<Address, number>> = {
    used: new Map(),
    change: new Map(),
  };

  constructor(
    private readonly reducer: ModifierReducer<V, M>,
    private readonly initialView: () => V,
  ) {}

  /**
   * Track a wallet. New wallets start unsynced unless a tip is given.
   */
  registerWallet(walletId: WalletId, tip?: HeaderHash) {
    const syncState: WalletSyncState = tip ? { status: 'synced', tip: assertHeaderHash(tip, walletId) } : { status: 'not-synced' };
    this.wallets.set(walletId, { syncState, view: this.initialView() });
  }

  removeWallet(walletId: WalletId) {
    this.wallets.delete(walletId);
  }

  setWalletSyncTip(walletId: WalletId, tip: HeaderHash) {
    const record = this.requireWallet(walletId);
    record.syncState = { status: 'synced', tip: assertHeaderHash(tip, walletId) };
  }

  getWalletView(walletId: WalletId): V | undefined {
    return this.wallets.get(walletId)?.view;
  }

  addCustomAddress(kind: CustomAddressKind, address: Address) {
    const refs = this.customAddresses[kind];
    refs.set(address, (refs.get(address) ?? 0) + 1);
  }

  async getWalletSyncTip(walletId: WalletId): Promise<WalletSyncState | undefined> {
    const state = this.wallets.get(walletId)?.syncState;
    return state ? { ...state } : undefined;
  }

  async getWalletAddresses(): Promise<WalletId[]> {
    return Array.from(this.wallets.keys());
  }

  async getCustomAddresses(kind: CustomAddressKind): Promise<Set<Address>> {
    return new Set(this.customAddresses[kind].keys());
  }

  async applyModifierToWallet(walletId: WalletId, newTip: HeaderHash, modifier: M): Promise<void> {
    const record = this.requireWallet(walletId);
    const view = this.reducer.apply(record.view, modifier);
    for (const address of this.reducer.usedAddresses?.(modifier) ?? []) {
      this.addCustomAddress('used', address);
    }
    record.view = view;
    record.syncState = { status: 'synced', tip: newTip };
  }

  async rollbackModifierFromWallet(walletId: WalletId, newTip: HeaderHash, modifier: M): Promise<void> {
    const record = this.requireWallet(walletId);
    const view = this.reducer.rollback(record.view, modifier);
    for (const address of this.reducer.usedAddresses?.(modifier) ?? []) {
      this.removeCustomAddress('used', address);
    }
    record.view = view;
    record.syncState = { status: 'synced', tip: newTip };
  }

  private removeCustomAddress(kind: CustomAddressKind, address: Address) {
    const refs = this.customAddresses[kind];
    const count = refs.get(address) ?? 0;
    if (count <= 1) refs.delete(address);
    else refs.set(address, count - 1);
  }

  private requireWallet(walletId: WalletId): WalletRecord<V> {
    const record = this.wallets.get(walletId);
    if (!record) throw new SyncError('STORAGE', 'Unknown wallet', { walletId });
    return record;
  }
}
