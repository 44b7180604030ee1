import { SyncError } from '../errors';
import type { Blund, NewestFirst, NonEmpty, OldestFirst } from '../types';
import { sameHeaderHash } from '../utils/hex';

const toNonEmpty = <T>(items: readonly T[], label: string): NonEmpty<T> => {
  const [first, ...rest] = items;
  if (items.length === 0 || first === undefined) {
    throw new SyncError('WINDOW', `${label} window must not be empty`);
  }
  return [first, ...rest];
};

export const oldestFirst = <T>(items: readonly T[]): OldestFirst<T> => ({
  order: 'oldest-first',
  items: toNonEmpty(items, 'Oldest-first'),
});

export const newestFirst = <T>(items: readonly T[]): NewestFirst<T> => ({
  order: 'newest-first',
  items: toNonEmpty(items, 'Newest-first'),
});

export const toNewestFirst = <T>(window: OldestFirst<T>): NewestFirst<T> => newestFirst([...window.items].reverse());

export const toOldestFirst = <T>(window: NewestFirst<T>): OldestFirst<T> => oldestFirst([...window.items].reverse());

/** Last element of a non-empty list. */
export const lastOf = <T>(items: NonEmpty<T>): T => items[items.length - 1] ?? items[0];

/**
 * Check that every block links to its predecessor (oldest to newest).
 */
export const assertChainLinked = <Tx, U>(window: OldestFirst<Blund<Tx, U>> | NewestFirst<Blund<Tx, U>>): void => {
  const ordered = window.order === 'oldest-first' ? window.items : toOldestFirst(window).items;
  for (let i = 1; i < ordered.length; i++) {
    const prev = ordered[i - 1].block.header;
    const cur = ordered[i].block.header;
    if (!sameHeaderHash(cur.prevHash, prev.hash)) {
      throw new SyncError('WINDOW', 'Block window is not chain-linked', {
        index: i,
        expectedPrev: prev.hash,
        actualPrev: cur.prevHash,
      });
    }
  }
};
