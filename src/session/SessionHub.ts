import { Logger } from '../utils/log.js';
import type { SessionEventHandler, SessionEventName, SessionEvents } from './types.js';

type Channel = { [K in SessionEventName]?: Set<SessionEventHandler<K>> };

/**
 * Publish/subscribe fan-out with one channel per session id.
 *
 * Deliveries go through a single queue. A handler that publishes again
 * (typically by appending to a session from inside a handler) gets its
 * events delivered after everything already queued, so all subscribers see
 * events in the order they were published. A throwing handler is logged and
 * skipped.
 */
export class SessionHub {
  private channels = new Map<string, Channel>();
  private queue: Array<() => void> = [];
  private draining = false;

  constructor(private logger: Logger = new Logger('hub')) {}

  subscribe<K extends SessionEventName>(
    sessionId: string,
    event: K,
    handler: SessionEventHandler<K>,
  ): () => void {
    let channel = this.channels.get(sessionId);
    if (!channel) {
      channel = {};
      this.channels.set(sessionId, channel);
    }
    const slots: { [P in K]?: Set<SessionEventHandler<P>> } = channel;
    const set: Set<SessionEventHandler<K>> = slots[event] ?? new Set();
    slots[event] = set;
    set.add(handler);
    return () => {
      set.delete(handler);
    };
  }

  publish<K extends SessionEventName>(sessionId: string, event: K, data: SessionEvents[K]): void {
    this.queue.push(() => this.deliver(sessionId, event, data));
    if (this.draining) return;

    this.draining = true;
    try {
      let next = this.queue.shift();
      while (next) {
        next();
        next = this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  subscriberCount(sessionId: string, event: SessionEventName): number {
    return this.channels.get(sessionId)?.[event]?.size ?? 0;
  }

  /** Drop every subscription of a session. */
  close(sessionId: string): void {
    this.channels.delete(sessionId);
  }

  private deliver<K extends SessionEventName>(sessionId: string, event: K, data: SessionEvents[K]): void {
    const set = this.channels.get(sessionId)?.[event];
    if (!set) return;

    for (const handler of [...set]) {
      try {
        handler(data);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.error(`${event} subscriber on ${sessionId} threw: ${message}`, { sessionId, event });
      }
    }
  }
}
