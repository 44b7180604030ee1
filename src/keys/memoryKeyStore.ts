import { SyncError } from '../errors';
import type { KeyStore, WalletId } from '../types';

export class MemoryKeyStore<K> implements KeyStore<K> {
  private readonly keys = new Map<WalletId, K>();

  addSecretKey(walletId: WalletId, key: K) {
    this.keys.set(walletId, key);
  }

  deleteSecretKey(walletId: WalletId) {
    this.keys.delete(walletId);
  }

  async getSecretKeyById(walletId: WalletId): Promise<K> {
    const key = this.keys.get(walletId);
    if (key === undefined) throw new SyncError('KEY', 'No secret key for wallet');
    return key;
  }
}
