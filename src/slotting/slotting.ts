import { SyncError } from '../errors';
import type { BlockHeader, SlotId, Slotting, SlottingData, Timestamp, TimestampFn } from '../types';

/**
 * Start time of a slot, or `null` when its epoch is not in the slotting data.
 */
export const getSlotStart = (systemStart: Timestamp, slotId: SlotId, data: SlottingData): Timestamp | null => {
  const epoch = data.epochs.find((e) => e.epoch === slotId.epoch);
  if (!epoch) return null;
  return systemStart + epoch.startDiffMs + slotId.slot * epoch.slotDurationMs;
};

/**
 * Snapshot system start and slotting data, and map headers to their slot start.
 */
export const headerTimestampGetter = async (slotting: Slotting): Promise<TimestampFn> => {
  const systemStart = await slotting.getSystemStart();
  const data = await slotting.getSlottingData();
  return (header: BlockHeader) => {
    switch (header.kind) {
      case 'genesis':
        return null;
      case 'main':
        return getSlotStart(systemStart, header.slot, data);
    }
  };
};

/**
 * Static slotting source: fixed system start and per-epoch data.
 * The current epoch is the latest one listed.
 */
export class StaticSlotting implements Slotting {
  constructor(
    private readonly systemStart: Timestamp,
    private readonly data: SlottingData,
  ) {}

  async getSystemStart() {
    return this.systemStart;
  }

  async getSlottingData() {
    return { epochs: this.data.epochs.map((e) => ({ ...e })) };
  }

  async getCurrentEpochSlotDuration() {
    const [first, ...rest] = this.data.epochs;
    if (!first) throw new SyncError('SLOTTING', 'No slotting data available');
    const current = rest.reduce((acc, e) => (e.epoch > acc.epoch ? e : acc), first);
    return current.slotDurationMs;
  }
}
