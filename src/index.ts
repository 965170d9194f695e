// Continuation detection
export { detectContinuation, readyToParse } from './input/continuation.js';
export type { ContinuationState } from './input/continuation.js';

// Parsing engine
export { lex } from './parser/lexer.js';
export { parse, ParseError } from './parser/parser.js';
export { IncrementalParser } from './parser/IncrementalParser.js';
export { toSyntaxTree, ConversionError } from './parser/convert.js';
export { TokenKind, NODE_TYPES, ERROR_TYPE, COMPOUND_CLOSERS } from './parser/types.js';
export type {
	Token,
	WordPart,
	Point,
	SourceRange,
	NodeType,
	FieldName,
	OpenerType,
	CloserType,
	RawNode,
	RawTree,
	EngineResult,
	ParsingEngine,
	SyntaxNode,
} from './parser/types.js';

// Classification
export {
	classify,
	hasErrorNodes,
	findErrorNode,
	extractErrorInfo,
	identifyIncompleteStructure,
} from './parser/classifier.js';
export type { Classification, ErrorInfo } from './parser/classifier.js';

// Sessions
export { ParseSession, EXECUTABLE_TYPES } from './session/ParseSession.js';
export type { ParseSessionOptions } from './session/ParseSession.js';
export { SessionHub } from './session/SessionHub.js';
export { SessionRegistry } from './session/SessionRegistry.js';
export type { SessionRegistryOptions } from './session/SessionRegistry.js';
export {
	ConfigError,
	DEFAULT_MAX_BUFFER_SIZE,
	sessionConfigSchema,
	parseConfig,
	configFromEnv,
} from './session/config.js';
export type { SessionConfig, SessionConfigInput } from './session/config.js';
export type {
	AppendOutcome,
	AppendRejection,
	AppendFailure,
	FailureStage,
	ExecutableStatement,
	SessionEvents,
	SessionEventName,
	SessionEventHandler,
} from './session/types.js';

// Logging
export { Logger, consoleLog } from './utils/log.js';
export type { LogFn, LogLevel, LogThreshold } from './utils/log.js';
