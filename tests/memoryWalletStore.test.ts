import { describe, expect, it } from 'vitest';
import { MemoryWalletStore } from '../src/store/memoryWalletStore';
import { MemoryKeyStore } from '../src/keys/memoryKeyStore';
import { SyncError } from '../src/errors';
import { hash, historyReducer, type TestModifier } from './helpers';

const createStore = () => new MemoryWalletStore<string[], TestModifier>(historyReducer, () => []);

describe('MemoryWalletStore', () => {
  it('distinguishes unknown, unsynced and synced wallets', async () => {
    const store = createStore();
    store.registerWallet('fresh');
    store.registerWallet('synced', hash(4));
    await expect(store.getWalletSyncTip('missing')).resolves.toBeUndefined();
    await expect(store.getWalletSyncTip('fresh')).resolves.toEqual({ status: 'not-synced' });
    await expect(store.getWalletSyncTip('synced')).resolves.toEqual({ status: 'synced', tip: hash(4) });
    await expect(store.getWalletAddresses()).resolves.toEqual(['fresh', 'synced']);
  });

  it('applies and rolls back modifiers, tracking used addresses by reference count', async () => {
    const store = createStore();
    store.registerWallet('w1', hash(0));
    store.addCustomAddress('used', 'shared');

    await store.applyModifierToWallet('w1', hash(1), { txIds: ['a', 'b'], used: ['shared', 'fresh'] });
    expect(store.getWalletView('w1')).toEqual(['a', 'b']);
    await expect(store.getCustomAddresses('used')).resolves.toEqual(new Set(['shared', 'fresh']));

    await store.rollbackModifierFromWallet('w1', hash(0), { txIds: ['b', 'a'], used: ['fresh', 'shared'] });
    expect(store.getWalletView('w1')).toEqual([]);
    await expect(store.getWalletSyncTip('w1')).resolves.toEqual({ status: 'synced', tip: hash(0) });
    await expect(store.getCustomAddresses('used')).resolves.toEqual(new Set(['shared']));
    await expect(store.getCustomAddresses('change')).resolves.toEqual(new Set());
  });

  it('rejects writes for unknown wallets and malformed tips', async () => {
    const store = createStore();
    await expect(store.applyModifierToWallet('nope', hash(1), { txIds: [], used: [] })).rejects.toBeInstanceOf(SyncError);
    store.registerWallet('w1');
    expect(() => store.setWalletSyncTip('w1', '0xzz')).toThrow('Invalid header hash for w1');
    store.setWalletSyncTip('w1', hash(2));
    await expect(store.getWalletSyncTip('w1')).resolves.toEqual({ status: 'synced', tip: hash(2) });
  });

  it('returns copies of the sync state', async () => {
    const store = createStore();
    store.registerWallet('w1', hash(1));
    const state = await store.getWalletSyncTip('w1');
    if (state?.status === 'synced') state.tip = hash(9);
    await expect(store.getWalletSyncTip('w1')).resolves.toEqual({ status: 'synced', tip: hash(1) });
  });

  it('forgets removed wallets', async () => {
    const store = createStore();
    store.registerWallet('w1', hash(1));
    store.removeWallet('w1');
    await expect(store.getWalletSyncTip('w1')).resolves.toBeUndefined();
    expect(store.getWalletView('w1')).toBeUndefined();
  });
});

describe('MemoryKeyStore', () => {
  it('returns stored keys and rejects unknown wallets', async () => {
    const keys = new MemoryKeyStore<string>();
    keys.addSecretKey('w1', 'sk-1');
    await expect(keys.getSecretKeyById('w1')).resolves.toBe('sk-1');
    await expect(keys.getSecretKeyById('w2')).rejects.toMatchObject({ code: 'KEY', message: 'No secret key for wallet' });
    keys.deleteSecretKey('w1');
    await expect(keys.getSecretKeyById('w1')).rejects.toBeInstanceOf(SyncError);
  });
});
