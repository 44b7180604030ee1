import EventEmitter from 'eventemitter3';
import type { SyncEvent } from '../types';

/**
 * Thin wrapper around EventEmitter3 to strongly type listener events.
 */
export class SyncEventBus {
  private readonly emitter = new EventEmitter<SyncEvent['type']>();

  emit(event: SyncEvent) {
    this.emitter.emit(event.type, event);
  }

  on<T extends SyncEvent['type']>(type: T, handler: (event: Extract<SyncEvent, { type: T }>) => void) {
    this.emitter.on(type, handler);
  }

  off<T extends SyncEvent['type']>(type: T, handler: (event: Extract<SyncEvent, { type: T }>) => void) {
    this.emitter.off(type, handler);
  }

  /**
   * Remove all registered listeners.
   */
  removeAllListeners() {
    this.emitter.removeAllListeners();
  }
}
