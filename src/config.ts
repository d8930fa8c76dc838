/**
 * graphbuf — configuration
 *
 * Every tunable of the write and read paths lives in one of two option
 * objects. resolve*Options() fills in the defaults and rejects values that
 * would corrupt a buffer later, so the Builder and the readers only ever see
 * fully-resolved settings.
 */

import type { Logger } from 'pino';
import { DEFAULT_INITIAL_SIZE, MAX_BUFFER_SIZE, MODEL_FILE_IDENTIFIER, SCHEMA_VERSION, FILE_IDENTIFIER_LENGTH } from './constants';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const LOG_LEVEL_SET = new Set<string>(LOG_LEVELS);

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVEL_SET.has(value);
}

/**
 * Log level for the package root logger: GRAPHBUF_LOG_LEVEL when it names a
 * pino level, 'warn' otherwise.
 */
export function defaultLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env['GRAPHBUF_LOG_LEVEL']?.trim().toLowerCase();
  return raw !== undefined && isLogLevel(raw) ? raw : 'warn';
}

// ─── Builder ──────────────────────────────────────────────────────────────────

export interface BuilderOptions {
  /** Starting capacity in bytes. The buffer doubles when it runs out. Default 1024. */
  readonly initialSize?: number;
  /** Write scalar fields even when they equal their default. Default false. */
  readonly forceDefaults?: boolean;
  /** Share one vtable between tables with identical layouts. Default true. */
  readonly dedupeVtables?: boolean;
  readonly logger?: Logger;
}

export interface ResolvedBuilderOptions {
  readonly initialSize:   number;
  readonly forceDefaults: boolean;
  readonly dedupeVtables: boolean;
  readonly logger?:       Logger;
}

export function resolveBuilderOptions(options: BuilderOptions = {}): ResolvedBuilderOptions {
  const initialSize = options.initialSize ?? DEFAULT_INITIAL_SIZE;
  if (!Number.isInteger(initialSize) || initialSize < 1 || initialSize > MAX_BUFFER_SIZE) {
    throw new TypeError(
      `initialSize must be an integer in [1, ${MAX_BUFFER_SIZE}]; got ${initialSize}.`,
    );
  }
  return {
    initialSize,
    forceDefaults: options.forceDefaults ?? false,
    dedupeVtables: options.dedupeVtables ?? true,
    logger:        options.logger,
  };
}

// ─── Reader ───────────────────────────────────────────────────────────────────

export interface ReaderOptions {
  /**
   * Strict mode refuses buffers whose identifier differs from `identifier`
   * and models whose schemaVersion differs from `expectedSchemaVersion`.
   * Lenient mode (the default) reads whatever fields it understands.
   */
  readonly strict?: boolean;
  /** Expected 4-byte identifier. Default 'MODL'. Only checked in strict mode. */
  readonly identifier?: string;
  /** The buffer starts with a u32 size prefix. Default false. */
  readonly sizePrefixed?: boolean;
  /** Default SCHEMA_VERSION. */
  readonly expectedSchemaVersion?: number;
  readonly logger?: Logger;
}

export interface ResolvedReaderOptions {
  readonly strict:                boolean;
  readonly identifier:            string;
  readonly sizePrefixed:          boolean;
  readonly expectedSchemaVersion: number;
  readonly logger?:               Logger;
}

export function resolveReaderOptions(options: ReaderOptions = {}): ResolvedReaderOptions {
  const identifier = options.identifier ?? MODEL_FILE_IDENTIFIER;
  assertIdentifier(identifier);

  const expectedSchemaVersion = options.expectedSchemaVersion ?? SCHEMA_VERSION;
  if (!Number.isInteger(expectedSchemaVersion)) {
    throw new TypeError(`expectedSchemaVersion must be an integer; got ${expectedSchemaVersion}.`);
  }

  return {
    strict:       options.strict ?? false,
    identifier,
    sizePrefixed: options.sizePrefixed ?? false,
    expectedSchemaVersion,
    logger:       options.logger,
  };
}

/** An identifier is exactly four characters, each a single byte (code point < 0x80). */
export function assertIdentifier(identifier: string): void {
  if (identifier.length !== FILE_IDENTIFIER_LENGTH || !/^[\x00-\x7f]*$/.test(identifier)) {
    throw new TypeError(
      `File identifier must be ${FILE_IDENTIFIER_LENGTH} ASCII characters; got '${identifier}'.`,
    );
  }
}
