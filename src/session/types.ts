import type { Classification } from '../parser/classifier.js';
import type { SourceRange, SyntaxNode } from '../parser/types.js';

/** Which step of an append threw. */
export type FailureStage = 'parse' | 'convert' | 'classify';

export interface AppendFailure {
  stage: FailureStage;
  message: string;
}

export interface AppendRejection {
  reason: 'buffer_overflow';
  /** Bytes already buffered. */
  currentSize: number;
  fragmentSize: number;
  maxSize: number;
}

export interface ExecutableStatement {
  statement: SyntaxNode;
  /** 1-based, counted since the session was created or last reset. */
  sequence: number;
}

export type AppendOutcome =
  | {
    status: 'updated';
    tree: SyntaxNode;
    classification: Classification;
    /** Top-level statements that were not carried over from the previous tree. */
    changedNodeIds: number[];
    changedRanges: SourceRange[];
    emitted: ExecutableStatement[];
  }
  | ({ status: 'rejected' } & AppendRejection)
  | { status: 'failed'; failure: AppendFailure };

export interface SessionEvents {
  'tree:updated': {
    sessionId: string;
    tree: SyntaxNode;
    classification: Classification;
    changedNodeIds: number[];
    changedRanges: SourceRange[];
  };
  'statement:executable': { sessionId: string } & ExecutableStatement;
  'append:rejected': { sessionId: string; rejection: AppendRejection };
  'append:failed': { sessionId: string; failure: AppendFailure };
  'session:reset': { sessionId: string };
  'stream:end': { sessionId: string; emitted: number };
}

export type SessionEventName = keyof SessionEvents;

export type SessionEventHandler<K extends SessionEventName> = (data: SessionEvents[K]) => void;
