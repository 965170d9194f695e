import { describe, it, expect } from 'vitest';
import { SessionHub } from '../../src/session/SessionHub.js';
import { Logger } from '../../src/utils/log.js';
import { captureLog, silentLog } from '../helpers.js';

function hub(): SessionHub {
  return new SessionHub(new Logger('hub', 'warn', silentLog));
}

describe('SessionHub', () => {
  it('delivers events to subscribers of the same session only', () => {
    const h = hub();
    const seen: string[] = [];
    h.subscribe('a', 'session:reset', (e) => seen.push(`a:${e.sessionId}`));
    h.subscribe('b', 'session:reset', (e) => seen.push(`b:${e.sessionId}`));

    h.publish('a', 'session:reset', { sessionId: 'a' });

    expect(seen).toEqual(['a:a']);
  });

  it('stops delivering after unsubscribe', () => {
    const h = hub();
    let calls = 0;
    const off = h.subscribe('a', 'stream:end', () => calls++);
    h.publish('a', 'stream:end', { sessionId: 'a', emitted: 0 });
    off();
    h.publish('a', 'stream:end', { sessionId: 'a', emitted: 0 });

    expect(calls).toBe(1);
    expect(h.subscriberCount('a', 'stream:end')).toBe(0);
  });

  it('queues events published from inside a handler', () => {
    const h = hub();
    const order: string[] = [];
    h.subscribe('a', 'stream:end', (e) => {
      order.push(`first:${e.emitted}`);
      if (e.emitted === 1) h.publish('a', 'stream:end', { sessionId: 'a', emitted: 2 });
    });
    h.subscribe('a', 'stream:end', (e) => order.push(`second:${e.emitted}`));

    h.publish('a', 'stream:end', { sessionId: 'a', emitted: 1 });

    expect(order).toEqual(['first:1', 'second:1', 'first:2', 'second:2']);
  });

  it('logs a throwing handler and keeps delivering', () => {
    const log = captureLog();
    const h = new SessionHub(new Logger('hub', 'warn', log.sink));
    const seen: number[] = [];
    h.subscribe('a', 'stream:end', () => {
      throw new Error('nope');
    });
    h.subscribe('a', 'stream:end', (e) => seen.push(e.emitted));

    h.publish('a', 'stream:end', { sessionId: 'a', emitted: 3 });
    h.publish('a', 'stream:end', { sessionId: 'a', emitted: 4 });

    expect(seen).toEqual([3, 4]);
    expect(log.entries).toEqual([
      'error [hub] stream:end subscriber on a threw: nope',
      'error [hub] stream:end subscriber on a threw: nope',
    ]);
  });

  it('drops a closed session', () => {
    const h = hub();
    h.subscribe('a', 'session:reset', () => {});
    h.subscribe('a', 'stream:end', () => {});
    h.close('a');
    expect(h.subscriberCount('a', 'session:reset')).toBe(0);
    expect(h.subscriberCount('a', 'stream:end')).toBe(0);
  });
});
