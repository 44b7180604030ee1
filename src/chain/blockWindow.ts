import type { BlockHeader, Blund, HeaderHash, NewestFirst, OldestFirst, TxWithUndo } from '../types';
import { headerOf, isMainBlund } from './headers';
import { lastOf } from './chrono';

/**
 * Pair a block's transactions with their undo entries and the block header.
 * Genesis blocks carry no transactions. Lists of unequal length are paired up
 * to the shorter one.
 */
export const txsWithUndo = <Tx, U>(blund: Blund<Tx, U>): TxWithUndo<Tx, U>[] => {
  if (!isMainBlund(blund)) return [];
  const { block, undo } = blund;
  const header: BlockHeader = block.header;
  const count = Math.min(block.txs.length, undo.txUndo.length);
  const out: TxWithUndo<Tx, U>[] = [];
  for (let i = 0; i < count; i++) {
    out.push({ tx: block.txs[i], undo: undo.txUndo[i], header });
  }
  return out;
};

/**
 * Transaction stream for an apply window: blocks oldest first, each in stored order.
 */
export const applyStream = <Tx, U>(window: OldestFirst<Blund<Tx, U>>): TxWithUndo<Tx, U>[] =>
  window.items.flatMap((blund) => txsWithUndo(blund));

/**
 * Transaction stream for a rollback window: blocks newest first, each reversed.
 */
export const rollbackStream = <Tx, U>(window: NewestFirst<Blund<Tx, U>>): TxWithUndo<Tx, U>[] =>
  window.items.flatMap((blund) => txsWithUndo(blund).reverse());

/** Tip after applying the window: its newest block. */
export const applyNewTip = <Tx, U>(window: OldestFirst<Blund<Tx, U>>): HeaderHash => headerOf(lastOf(window.items)).hash;

/** Tip after rolling back the window: the parent of its oldest block. */
export const rollbackNewTip = <Tx, U>(window: NewestFirst<Blund<Tx, U>>): HeaderHash =>
  headerOf(lastOf(window.items)).prevHash;
