import type { BlockHeader, Blund, Difficulty, MainBlock, Undo } from '../types';

export const headerOf = <Tx, U>(blund: Blund<Tx, U>): BlockHeader => blund.block.header;

export const isMainBlund = <Tx, U>(blund: Blund<Tx, U>): blund is { block: MainBlock<Tx>; undo: Undo<U> } => {
  const header = headerOf(blund);
  switch (header.kind) {
    case 'genesis':
      return false;
    case 'main':
      return true;
  }
};

export const difficultyOf = (header: BlockHeader): Difficulty | null => {
  switch (header.kind) {
    case 'genesis':
      return null;
    case 'main':
      return header.difficulty;
  }
};

/**
 * Block info attached to pending transactions: only main blocks confirm them.
 */
export const blockInfoOf = (header: BlockHeader): Difficulty | null => {
  switch (header.kind) {
    case 'genesis':
      return null;
    case 'main':
      return header.difficulty;
  }
};
