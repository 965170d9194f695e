import { randomUUID } from 'node:crypto';
import { classify, type Classification } from '../parser/classifier.js';
import { toSyntaxTree } from '../parser/convert.js';
import { IncrementalParser } from '../parser/IncrementalParser.js';
import type { NodeType, ParsingEngine, RawTree, SyntaxNode } from '../parser/types.js';
import { Logger, type LogFn } from '../utils/log.js';
import { parseConfig, type SessionConfig, type SessionConfigInput } from './config.js';
import { SessionHub } from './SessionHub.js';
import type {
  AppendOutcome,
  ExecutableStatement,
  FailureStage,
  SessionEventHandler,
  SessionEventName,
} from './types.js';

/** Top-level node types that are handed to the executor. */
export const EXECUTABLE_TYPES: ReadonlySet<NodeType> = new Set<NodeType>([
  'command',
  'pipeline',
  'list',
  'negated_command',
  'subshell',
  'compound_statement',
  'if_statement',
  'for_statement',
  'while_statement',
  'until_statement',
  'case_statement',
  'function_definition',
  'declaration_command',
  'unset_command',
  'test_command',
  'variable_assignment',
]);

export interface ParseSessionOptions extends SessionConfigInput {
  /** Parsing engine private to this session. Defaults to a new {@link IncrementalParser}. */
  engine?: ParsingEngine;
  /** Hub to publish on. Sessions of one registry share a hub. */
  hub?: SessionHub;
  /** Log sink. Defaults to the console. */
  logger?: LogFn;
  /** Conversion from the engine tree. Defaults to {@link toSyntaxTree}. */
  convert?: (raw: RawTree) => SyntaxNode;
}

/**
 * One stream of shell input. Fragments are appended in any chunking; after
 * each append the whole buffer is re-parsed, classified, and every top-level
 * statement that became runnable since the last call is published once, in
 * order, with a running sequence number.
 *
 * `append` never throws: every call ends in exactly one of an `updated`,
 * `rejected` or `failed` outcome.
 */
export class ParseSession {
  readonly id: string;
  readonly config: SessionConfig;
  readonly hub: SessionHub;

  private engine: ParsingEngine;
  private convert: (raw: RawTree) => SyntaxNode;
  private logger: Logger;

  private buffer = '';
  private rawTree: RawTree | null = null;
  private tree: SyntaxNode | null = null;
  private lastClassification: Classification | null = null;
  private errorFlag = false;
  private commandCount = 0;
  private lastEmittedRow = -1;
  /** Bumped whenever the stored tree is replaced or cleared. */
  private revision = 0;

  constructor(options: ParseSessionOptions = {}) {
    const { engine, hub, logger, convert, ...config } = options;
    this.config = parseConfig(config);
    this.id = this.config.sessionId ?? randomUUID();
    this.logger = new Logger(`session:${this.id}`, this.config.logLevel, logger);
    this.engine = engine ?? new IncrementalParser();
    this.convert = convert ?? toSyntaxTree;
    this.hub = hub ?? new SessionHub(this.logger.child('hub'));
  }

  append(fragment: string): AppendOutcome {
    const fragmentSize = Buffer.byteLength(fragment, 'utf8');
    const currentSize = this.bufferSize();
    const maxSize = this.config.maxBufferSize;

    if (currentSize + fragmentSize > maxSize) {
      const rejection = { reason: 'buffer_overflow' as const, currentSize, fragmentSize, maxSize };
      this.logger.warn(`fragment rejected: ${currentSize} + ${fragmentSize} bytes exceeds ${maxSize}`);
      this.hub.publish(this.id, 'append:rejected', { sessionId: this.id, rejection });
      return { status: 'rejected', ...rejection };
    }

    const previousBuffer = this.buffer;
    const previousIds = new Set(this.tree?.children.map((child) => child.id) ?? []);
    this.buffer += fragment;

    let stage: FailureStage = 'parse';
    let tree: SyntaxNode;
    let classification: Classification;
    let result: ReturnType<ParsingEngine['parse']>;
    try {
      const started = performance.now();
      result = this.engine.parse(this.buffer, this.rawTree);
      stage = 'convert';
      tree = this.convert(result.tree);
      stage = 'classify';
      classification = classify(tree, result.hasError);
      this.logger.debug(`parsed ${currentSize + fragmentSize} bytes in ${(performance.now() - started).toFixed(2)}ms`, {
        state: classification.state,
      });
    } catch (err) {
      this.buffer = previousBuffer;
      const failure = { stage, message: err instanceof Error ? err.message : String(err) };
      this.logger.error(`append failed during ${stage}: ${failure.message}`);
      this.hub.publish(this.id, 'append:failed', { sessionId: this.id, failure });
      return { status: 'failed', failure };
    }

    const revision = ++this.revision;
    this.rawTree = result.tree;
    this.tree = tree;
    this.errorFlag = result.hasError;
    this.lastClassification = classification;

    const changedNodeIds = tree.children.filter((child) => !previousIds.has(child.id)).map((child) => child.id);
    const changedRanges = result.changedRanges;

    this.hub.publish(this.id, 'tree:updated', {
      sessionId: this.id,
      tree,
      classification,
      changedNodeIds,
      changedRanges,
    });

    const emitted = classification.state === 'complete' && this.config.emitStatements
      ? this.emitNewStatements(tree, this.config.requireTrailingNewline, revision)
      : [];

    return { status: 'updated', tree, classification, changedNodeIds, changedRanges, emitted };
  }

  /** Clear the buffer and all derived state; numbering restarts at 1. */
  reset(): void {
    this.buffer = '';
    this.rawTree = null;
    this.tree = null;
    this.lastClassification = null;
    this.errorFlag = false;
    this.commandCount = 0;
    this.lastEmittedRow = -1;
    this.revision++;
    this.logger.debug('reset');
    this.hub.publish(this.id, 'session:reset', { sessionId: this.id });
  }

  /**
   * The input stream is over. A complete buffer whose last statements never
   * got their newline has them emitted now.
   */
  streamEnd(): ExecutableStatement[] {
    const emitted = this.tree && this.lastClassification?.state === 'complete' && this.config.emitStatements
      ? this.emitNewStatements(this.tree, false, this.revision)
      : [];
    this.hub.publish(this.id, 'stream:end', { sessionId: this.id, emitted: emitted.length });
    return emitted;
  }

  currentTree(): SyntaxNode | null {
    return this.tree;
  }

  accumulatedInput(): string {
    return this.buffer;
  }

  /** Buffered input in UTF-8 bytes. */
  bufferSize(): number {
    return Buffer.byteLength(this.buffer, 'utf8');
  }

  /** The engine's error flag from the last successful parse. */
  hasErrors(): boolean {
    return this.errorFlag;
  }

  classification(): Classification | null {
    return this.lastClassification;
  }

  /** Number of statements emitted since creation or the last reset. */
  emittedCount(): number {
    return this.commandCount;
  }

  on<K extends SessionEventName>(event: K, handler: SessionEventHandler<K>): () => void {
    return this.hub.subscribe(this.id, event, handler);
  }

  /**
   * Publish every executable top-level statement ending on a row past the
   * last emitted one. Rows are compared against the value from before this
   * pass, so a heredoc statement that ends late does not hide a statement
   * written after it on its first line.
   *
   * A subscriber may append or reset from inside a handler; once the stored
   * tree has moved on, the newer pass owns emission and this one stops.
   */
  private emitNewStatements(tree: SyntaxNode, requireNewline: boolean, revision: number): ExecutableStatement[] {
    const threshold = this.lastEmittedRow;
    const emitted: ExecutableStatement[] = [];

    for (const statement of tree.children) {
      if (this.revision !== revision) break;
      if (!EXECUTABLE_TYPES.has(statement.type)) continue;
      if (statement.range.end.row <= threshold) continue;
      if (requireNewline && this.buffer.indexOf('\n', statement.range.endIndex) === -1) continue;

      this.commandCount++;
      this.lastEmittedRow = Math.max(this.lastEmittedRow, statement.range.end.row);
      const entry = { statement, sequence: this.commandCount };
      emitted.push(entry);
      this.logger.debug(`statement ${entry.sequence}: ${statement.type}`, { row: statement.range.end.row });
      this.hub.publish(this.id, 'statement:executable', { sessionId: this.id, ...entry });
    }

    return emitted;
  }
}
