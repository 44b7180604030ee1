import type { WalletLogger } from '../types';

export interface WaitOptions {
  /** Factor by which each subsequent wait grows. */
  growth?: number;
  onOverrun?: (info: { tag: string; elapsedMs: number; thresholdMs: number }) => void;
}

/**
 * Await `action`, warning when it runs past `firstWarningMs` and again after
 * each geometrically growing interval. The action is never interrupted.
 */
export const logWarningWaitInf = async <T>(
  logger: WalletLogger,
  firstWarningMs: number,
  tag: string,
  action: () => Promise<T>,
  options: WaitOptions = {},
): Promise<T> => {
  const growth = Math.max(1, options.growth ?? 1.3);
  const startedAt = Date.now();
  let timer: ReturnType<typeof setTimeout> | null = null;
  let done = false;

  const schedule = (waitMs: number, thresholdMs: number) => {
    timer = setTimeout(() => {
      if (done) return;
      const elapsedMs = Date.now() - startedAt;
      logger.warnSP(() => `Action \`${tag}\` took more than ${thresholdMs} ms`);
      options.onOverrun?.({ tag, elapsedMs, thresholdMs });
      const nextWait = Math.max(1, Math.round(waitMs * growth));
      schedule(nextWait, thresholdMs + nextWait);
    }, waitMs);
  };

  const first = Math.max(1, Math.floor(firstWarningMs));
  schedule(first, first);
  try {
    return await action();
  } finally {
    done = true;
    if (timer) clearTimeout(timer);
  }
};
