import { IncrementalParser } from '../parser/IncrementalParser.js';
import type { ParsingEngine } from '../parser/types.js';
import { Logger, type LogFn, type LogThreshold } from '../utils/log.js';
import type { SessionConfigInput } from './config.js';
import { ParseSession } from './ParseSession.js';
import { SessionHub } from './SessionHub.js';

export interface SessionRegistryOptions {
  /** Builds the engine for each new session. Engines are never shared. */
  engineFactory?: () => ParsingEngine;
  /** Log sink handed to the hub and to every session. */
  logger?: LogFn;
  /** Threshold for the registry's own hub logging. */
  logLevel?: LogThreshold;
  /** Options applied to every session before its own. */
  defaults?: SessionConfigInput;
}

/**
 * Tracks independent sessions by id. All sessions publish through one shared
 * hub; channels are keyed by session id, so no session sees another's events.
 */
export class SessionRegistry {
  readonly hub: SessionHub;
  private sessions = new Map<string, ParseSession>();
  private engineFactory: () => ParsingEngine;

  constructor(private options: SessionRegistryOptions = {}) {
    this.engineFactory = options.engineFactory ?? (() => new IncrementalParser());
    this.hub = new SessionHub(new Logger('hub', options.logLevel ?? 'warn', options.logger));
  }

  /**
   * Create and register a session. Throws when the id is already taken or
   * the options are invalid.
   */
  create(config: SessionConfigInput = {}): ParseSession {
    const session = new ParseSession({
      ...this.options.defaults,
      ...config,
      engine: this.engineFactory(),
      hub: this.hub,
      logger: this.options.logger,
    });

    if (this.sessions.has(session.id)) {
      throw new Error(`Session already exists: ${session.id}`);
    }
    this.sessions.set(session.id, session);
    return session;
  }

  get(id: string): ParseSession | undefined {
    return this.sessions.get(id);
  }

  has(id: string): boolean {
    return this.sessions.has(id);
  }

  list(): ParseSession[] {
    return Array.from(this.sessions.values());
  }

  /** Remove a session and drop its subscriptions. */
  destroy(id: string): boolean {
    const existed = this.sessions.delete(id);
    if (existed) {
      this.hub.close(id);
    }
    return existed;
  }

  count(): number {
    return this.sessions.size;
  }
}
