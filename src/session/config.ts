import { z } from 'zod';

export class ConfigError extends Error {
  constructor(message: string, public issues: string[]) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_MAX_BUFFER_SIZE = 10 * 1024 * 1024;

const LOG_THRESHOLDS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export const sessionConfigSchema = z.object({
  /** Session id; generated when omitted. */
  sessionId: z.string().min(1).optional(),
  /** Maximum buffered input in UTF-8 bytes. */
  maxBufferSize: z.number().int().positive().default(DEFAULT_MAX_BUFFER_SIZE),
  /** Publish `statement:executable` events. Off for tree-only inspection. */
  emitStatements: z.boolean().default(true),
  /** Hold a statement back until a newline follows it in the buffer. */
  requireTrailingNewline: z.boolean().default(true),
  logLevel: z.enum(LOG_THRESHOLDS).default('warn'),
});

export type SessionConfigInput = z.input<typeof sessionConfigSchema>;
export type SessionConfig = z.output<typeof sessionConfigSchema>;

const envSchema = z.object({
  SHELLSTREAM_MAX_BUFFER_SIZE: z.coerce.number().int().positive().optional(),
  SHELLSTREAM_LOG_LEVEL: z.enum(LOG_THRESHOLDS).optional(),
  SHELLSTREAM_EMIT_STATEMENTS: z
    .enum(['true', 'false', '1', '0'])
    .transform((v) => v === 'true' || v === '1')
    .optional(),
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/** Validate options and fill in defaults. Throws {@link ConfigError}. */
export function parseConfig(input: SessionConfigInput = {}): SessionConfig {
  const result = sessionConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(`Invalid session config: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

/**
 * Build a config from `SHELLSTREAM_*` environment variables. Explicit
 * `overrides` win over the environment; empty variables count as unset.
 */
export function configFromEnv(
  env: Record<string, string | undefined> = process.env,
  overrides: SessionConfigInput = {},
): SessionConfig {
  const present: Record<string, string> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') {
      present[key] = value.trim();
    }
  }

  const result = envSchema.safeParse(present);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(`Invalid environment: ${issues.join('; ')}`, issues);
  }

  const fromEnv: SessionConfigInput = {};
  if (result.data.SHELLSTREAM_MAX_BUFFER_SIZE !== undefined) {
    fromEnv.maxBufferSize = result.data.SHELLSTREAM_MAX_BUFFER_SIZE;
  }
  if (result.data.SHELLSTREAM_LOG_LEVEL !== undefined) {
    fromEnv.logLevel = result.data.SHELLSTREAM_LOG_LEVEL;
  }
  if (result.data.SHELLSTREAM_EMIT_STATEMENTS !== undefined) {
    fromEnv.emitStatements = result.data.SHELLSTREAM_EMIT_STATEMENTS;
  }

  return parseConfig({ ...fromEnv, ...overrides });
}
