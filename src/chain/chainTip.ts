import type { ChainTip, HeaderHash } from '../types';
import { assertHeaderHash } from '../utils/hex';

/**
 * Chain tip held in memory, advanced by whoever applies blocks.
 */
export class MemoryChainTip implements ChainTip {
  private tip: HeaderHash;

  constructor(tip: HeaderHash) {
    this.tip = assertHeaderHash(tip, 'chain tip');
  }

  setTip(tip: HeaderHash) {
    this.tip = assertHeaderHash(tip, 'chain tip');
  }

  async getTip() {
    return this.tip;
  }
}
