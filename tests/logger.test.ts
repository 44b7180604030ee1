import { describe, expect, it } from 'vitest';
import { EventSink, Logger, MemorySink, isLogLevel } from '../src/log/logger';
import { buildSafe, secretOnly } from '../src/log/logSafe';
import type { LogSink, SecurityLevel, SyncEvent } from '../src/types';

describe('secretOnly / buildSafe', () => {
  it('shows secrets only at the secure level', () => {
    expect(secretOnly('secure', 'wallet-1')).toBe('wallet-1');
    expect(secretOnly('public', 'wallet-1')).toBe('<hidden>');
  });

  it('delegates to toSafeString when the value provides it', () => {
    const value = { toSafeString: (sl: SecurityLevel) => (sl === 'secure' ? 'full' : 'summary') };
    expect(buildSafe('secure', value)).toBe('full');
    expect(buildSafe('public', value)).toBe('summary');
    expect(buildSafe('public', 42)).toBe('<hidden>');
  });
});

describe('Logger', () => {
  it('keeps writing to other sinks when one throws', () => {
    const before = new MemorySink('public');
    const after = new MemorySink('secure');
    const broken: LogSink = {
      security: 'public',
      write: () => {
        throw new Error('disk full');
      },
    };
    const logger = new Logger({ minLevel: 'info', sinks: [before, broken, after] }, 'node');

    expect(() => logger.warnSP(() => 'slow')).not.toThrow();

    expect(before.entries.map((e) => `${e.level} ${e.message}`)).toEqual(['warn slow', 'debug Log sink failed: Error: disk full']);
    expect(after.entries.map((e) => `${e.level} ${e.message}`)).toEqual(['warn slow', 'debug Log sink failed: Error: disk full']);
  });

  it('renders a message once per sink security level', () => {
    const publicSink = new MemorySink('public');
    const secureSink = new MemorySink('secure');
    const logger = new Logger({ minLevel: 'info', sinks: [publicSink, secureSink] }, 'node');
    logger.infoSP((sl) => `wallet ${secretOnly(sl, 'w1')}`);
    expect(publicSink.messages()).toEqual(['wallet <hidden>']);
    expect(secureSink.messages()).toEqual(['wallet w1']);
    expect(publicSink.entries[0]).toMatchObject({ level: 'info', name: 'node', security: 'public' });
  });

  it('drops messages below the minimum level', () => {
    const sink = new MemorySink();
    const logger = new Logger({ minLevel: 'warn', sinks: [sink] });
    logger.debugSP(() => 'debug');
    logger.infoSP(() => 'info');
    logger.warnSP(() => 'warn');
    logger.errorSP(() => 'error');
    expect(sink.messages()).toEqual(['warn', 'error']);
    expect(sink.messages('error')).toEqual(['error']);
  });

  it('appends named components to the logger name', () => {
    const sink = new MemorySink();
    const logger = new Logger({ sinks: [sink] }, 'node').named('wallet').named('blistener');
    logger.warnSP(() => 'x');
    expect(logger.name).toBe('node.wallet.blistener');
    expect(sink.entries[0]?.name).toBe('node.wallet.blistener');
  });

  it('caps memory sinks', () => {
    const sink = new MemorySink('public', 2);
    const logger = new Logger({ sinks: [sink] });
    logger.infoSP(() => 'a');
    logger.infoSP(() => 'b');
    logger.infoSP(() => 'c');
    expect(sink.messages()).toEqual(['b', 'c']);
  });

  it('forwards entries as log events', () => {
    const events: SyncEvent[] = [];
    const logger = new Logger({ sinks: [new EventSink((evt) => events.push(evt))] }, 'node');
    logger.infoSP((sl) => `id ${secretOnly(sl, 'w1')}`);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ type: 'log', payload: { message: 'id <hidden>', level: 'info' } });
  });

  it('recognises log levels', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
