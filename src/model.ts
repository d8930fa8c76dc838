/**
 * graphbuf — Model and Graph tables, root access
 *
 *   Model  0 schemaVersion i32 · 1 graph Graph
 *   Graph  0 nodes [Node]   — in evaluation order; order is never re-derived
 *
 * readModel() is the entry point of the read path. It validates only what the
 * caller asked for (identifier and schema version in strict mode, the size
 * prefix when one is declared) and returns a lazy view. Every other check
 * happens on field access.
 */

import { ByteBuffer, MalformedBufferError } from './byte-buffer';
import type { Builder, Offset } from './builder';
import { resolveReaderOptions, type ReaderOptions } from './config';
import { MODEL_FILE_IDENTIFIER, SIZE_PREFIX_LENGTH, SIZEOF_INT } from './constants';
import { childLogger } from './logger';
import { Node, createNode } from './nodes';
import { Table } from './table';
import type { GraphValue, ModelValue, NodeValue, OperatorAttrsInput } from './schema';

// ─── Errors ───────────────────────────────────────────────────────────────────

/** Strict mode: the buffer's identifier is missing or differs from the expected one. */
export class FormatIdentifierError extends Error {
  constructor(message: string, readonly expected: string, readonly actual: string | null) {
    super(message);
    this.name = 'FormatIdentifierError';
  }
}

/** Strict mode: Model.schemaVersion differs from the version the reader expects. */
export class SchemaVersionError extends Error {
  constructor(message: string, readonly expected: number, readonly actual: number) {
    super(message);
    this.name = 'SchemaVersionError';
  }
}

// ─── Views ────────────────────────────────────────────────────────────────────

export class Graph extends Table {
  nodesLength(): number { return this.vectorLength(0, SIZEOF_INT); }

  /** @throws RangeError when `index` is outside [0, nodesLength()). */
  nodes(index: number): Node {
    return this.tableVectorElement(0, index, (bb, pos) => new Node(bb, pos));
  }

  /** Node views in evaluation order; null when the vector is absent. */
  nodesArray(): Node[] | null {
    return this.vectorArray(0, SIZEOF_INT, (pos) => new Node(this.bb, this.bb.indirect(pos)));
  }

  unpack(): GraphValue {
    const nodes = this.nodesArray();
    return { nodes: nodes === null ? null : nodes.map((n): NodeValue => n.unpack()) };
  }
}

export class Model extends Table {
  schemaVersion(): number { return this.int32Field(0, 0); }

  graph(): Graph | null {
    return this.tableField(1, (bb, pos) => new Graph(bb, pos));
  }

  unpack(): ModelValue {
    const graph = this.graph();
    return { schemaVersion: this.schemaVersion(), graph: graph === null ? null : graph.unpack() };
  }
}

// ─── Root access ──────────────────────────────────────────────────────────────

/** True when `bytes` carries the model identifier ('MODL') after its root offset. */
export function modelBufferHasIdentifier(bytes: Uint8Array, sizePrefixed = false): boolean {
  return new ByteBuffer(bytes).hasIdentifier(MODEL_FILE_IDENTIFIER, sizePrefixed);
}

/**
 * Resolve the root Model of a finished buffer.
 *
 * Lenient (default): the identifier is not inspected and a schemaVersion
 * other than the expected one is logged at warn level; fields the reader does
 * not know are simply never asked for.
 *
 * @throws FormatIdentifierError  strict mode, identifier mismatch.
 * @throws SchemaVersionError     strict mode, schemaVersion mismatch.
 * @throws MalformedBufferError   root offset or size prefix out of bounds.
 */
export function readModel(bytes: Uint8Array, options?: ReaderOptions): Model {
  const opts = resolveReaderOptions(options);
  const log  = childLogger('reader', opts.logger);
  let   bb   = new ByteBuffer(bytes);

  if (opts.sizePrefixed) {
    const declared  = bb.readUint32(0);
    const available = bytes.byteLength - SIZE_PREFIX_LENGTH;
    if (declared > available) {
      throw new MalformedBufferError(
        `Size prefix declares ${declared} bytes but only ${available} follow it.`,
        0,
      );
    }
    // Bytes past the declared size belong to the next frame; keep them out of reach.
    if (declared < available) {
      bb = new ByteBuffer(bytes.subarray(0, SIZE_PREFIX_LENGTH + declared));
    }
  }

  if (opts.strict) {
    const actual = bb.readIdentifier(opts.sizePrefixed);
    if (actual !== opts.identifier) {
      throw new FormatIdentifierError(
        `Expected file identifier '${opts.identifier}', found ${actual === null ? 'none' : `'${actual}'`}.`,
        opts.identifier,
        actual,
      );
    }
  }

  const model   = new Model(bb, bb.rootTable(opts.sizePrefixed));
  const version = model.schemaVersion();

  if (version !== opts.expectedSchemaVersion) {
    if (opts.strict) {
      throw new SchemaVersionError(
        `Model schemaVersion ${version} does not match expected version ${opts.expectedSchemaVersion}.`,
        opts.expectedSchemaVersion,
        version,
      );
    }
    log.warn(
      { schemaVersion: version, expected: opts.expectedSchemaVersion },
      'schema version mismatch; reading known fields only',
    );
  }

  log.debug({ bytes: bb.length, root: model.bbPos, schemaVersion: version }, 'model root resolved');
  return model;
}

// ─── Builders ─────────────────────────────────────────────────────────────────

export function createGraph(b: Builder, graph: GraphValue<OperatorAttrsInput>): Offset {
  let nodes = 0;
  if (graph.nodes !== null) {
    // Children first: every Node must be finished before the vector refers to it.
    const offsets = graph.nodes.map((n) => createNode(b, n));
    nodes = b.createOffsetVector(offsets);
  }
  b.startTable(1);
  b.addOffsetField(0, nodes);
  return b.endTable();
}

export function createModel(b: Builder, model: ModelValue<OperatorAttrsInput>): Offset {
  const graph = model.graph !== null ? createGraph(b, model.graph) : 0;
  b.startTable(2);
  b.addOffsetField(1, graph);
  b.addInt32Field(0, model.schemaVersion, 0);
  return b.endTable();
}
