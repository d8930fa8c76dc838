/**
 * graphbuf — Builder (write path)
 *
 * The single producer of graphbuf buffers.
 *
 * ── Back-to-front layout ─────────────────────────────────────────────────────
 *
 * Memory is claimed from the END of a scratch buffer towards the front. An
 * Offset returned by any create*() / end*() call is the object's distance
 * from the end of the buffer, which never changes when the buffer grows
 * (growth copies the old bytes to the tail of a buffer twice the size).
 *
 * Consequence: a child is always complete, with a final Offset, before the
 * parent that references it is started. References are written once and
 * never patched:
 *
 *   1. create strings / vectors / child tables   → Offsets
 *   2. startTable(n)
 *   3. add*Field(slot, …) in strictly descending slot order
 *   4. endTable()                                  → Offset of the parent
 *   5. finish(root)                                → root offset + identifier
 *
 * ── Tables and vtables ───────────────────────────────────────────────────────
 *
 * endTable() writes the table's soffset placeholder, then its vtable just
 * below it:
 *
 *   [vtable_len: u16][table_len: u16][slot 0: u16]…[slot k: u16]
 *
 * Trailing absent slots are trimmed. If an identical vtable was already
 * written (same length, table size and per-slot offsets), the new one is
 * discarded and the table's soffset points at the existing copy. The cache is
 * a Map keyed by the vtable bytes.
 *
 * ── Ownership ────────────────────────────────────────────────────────────────
 *
 * A Builder is single-writer and not shareable. After finish() the bytes
 * returned by asUint8Array() belong to the caller; the Builder refuses any
 * further writes until clear().
 */

import {
  SIZEOF_SHORT,
  SIZEOF_INT,
  SIZE_PREFIX_LENGTH,
  FILE_IDENTIFIER_LENGTH,
  VTABLE_METADATA_FIELDS,
  MAX_BUFFER_SIZE,
} from './constants';
import { assertIdentifier, resolveBuilderOptions, type BuilderOptions, type ResolvedBuilderOptions } from './config';
import { childLogger, type Logger } from './logger';

// ─── Errors ───────────────────────────────────────────────────────────────────

/**
 * Thrown on misuse of the write path: nesting objects, adding fields out of
 * slot order, referencing an Offset that has not been written, writing after
 * finish(), exceeding the maximum buffer size, or writing an integer its
 * field or vector type cannot hold.
 *
 * The builder's state is undefined after a BuilderError. Call clear() before
 * reusing it.
 */
export class BuilderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BuilderError';
  }
}

// ─── Public types ─────────────────────────────────────────────────────────────

/** Position of a finished object, measured from the end of the buffer. */
export type Offset = number;

export interface FinishOptions {
  /** 4-character identifier written after the root offset. */
  readonly identifier?: string;
  /** Prepend a u32 holding the byte length of the rest of the buffer. */
  readonly sizePrefix?: boolean;
}

const utf8Encoder = new TextEncoder();

const MAX_U16 = 0xffff;

/**
 * Reject a value the DataView setter would wrap or truncate: the buffer must
 * decode to exactly what was written.
 */
function checkInteger(value: number, min: number, max: number, type: string): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new BuilderError(`${value} is not a valid ${type} (integer in [${min}, ${max}]).`);
  }
}

// ─── Builder ──────────────────────────────────────────────────────────────────

export class Builder {
  private bytes: Uint8Array;
  private data:  DataView;
  /** Bytes still free at the front of `bytes`. offset() = capacity − space. */
  private space: number;
  private minalign = 1;

  /** Per-slot Offsets of the open table; null when no table is open. */
  private vtable:      number[] | null = null;
  private objectStart: number = -1;
  private lastSlot:    number = -1;

  private vectorOpen      = false;
  private vectorNumElems  = 0;
  private vectorByteLen   = 0;
  private vectorElemStart = 0;

  private readonly vtables = new Map<string, Offset>();
  private _vtableCount = 0;
  private finished     = false;

  private readonly opts: ResolvedBuilderOptions;
  private readonly log:  Logger;

  constructor(options?: BuilderOptions) {
    this.opts  = resolveBuilderOptions(options);
    this.log   = childLogger('builder', this.opts.logger);
    this.bytes = new Uint8Array(this.opts.initialSize);
    this.data  = new DataView(this.bytes.buffer);
    this.space = this.bytes.length;
  }

  /** Bytes written so far; also the Offset of the most recently written object. */
  offset(): Offset {
    return this.bytes.length - this.space;
  }

  /** Number of distinct vtables physically written to the buffer. */
  get vtableCount(): number {
    return this._vtableCount;
  }

  get capacity(): number {
    return this.bytes.length;
  }

  /** Discard everything written and start over, keeping the allocated capacity. */
  clear(): void {
    this.bytes.fill(0);
    this.space          = this.bytes.length;
    this.minalign       = 1;
    this.vtable         = null;
    this.objectStart    = -1;
    this.lastSlot       = -1;
    this.vectorOpen     = false;
    this.vectorNumElems = 0;
    this.vectorByteLen  = 0;
    this.vtables.clear();
    this._vtableCount   = 0;
    this.finished       = false;
  }

  // ── Space management ──────────────────────────────────────────────────────

  private grow(): void {
    const oldSize = this.bytes.length;
    if (oldSize >= MAX_BUFFER_SIZE) {
      throw new BuilderError(`Buffer cannot grow beyond ${MAX_BUFFER_SIZE} bytes.`);
    }
    const newSize = Math.min(oldSize * 2, MAX_BUFFER_SIZE);
    const next    = new Uint8Array(newSize);
    next.set(this.bytes, newSize - oldSize);
    this.bytes  = next;
    this.data   = new DataView(next.buffer);
    this.space += newSize - oldSize;
    this.log.debug({ from: oldSize, to: newSize }, 'builder buffer grown');
  }

  private pad(n: number): void {
    for (let i = 0; i < n; i++) {
      this.bytes[--this.space] = 0;
    }
  }

  /**
   * Make room for `size` bytes aligned to `size`, after `additionalBytes`
   * have been written. Alignment is relative to the END of the buffer, which
   * is the only fixed point while the buffer grows.
   */
  prep(size: number, additionalBytes: number): void {
    this.assertWritable();
    if (size > this.minalign) this.minalign = size;

    const alignSize = (~(this.bytes.length - this.space + additionalBytes) + 1) & (size - 1);
    while (this.space < alignSize + size + additionalBytes) {
      this.grow();
    }
    this.pad(alignSize);
  }

  private assertWritable(): void {
    if (this.finished) {
      throw new BuilderError('Buffer is already finished. Call clear() to start a new one.');
    }
  }

  private assertNotNested(what: string): void {
    if (this.vtable !== null) {
      throw new BuilderError(`${what} cannot start while a table is open; finish children before their parent.`);
    }
    if (this.vectorOpen) {
      throw new BuilderError(`${what} cannot start while a vector is open.`);
    }
  }

  // ── Raw prepends ──────────────────────────────────────────────────────────
  // Each aligns, claims space and writes one value. Used directly when
  // filling a vector between startVector() and endVector(). Integer writers
  // throw BuilderError for a value outside their type's range.

  addInt8(value: number): void {
    checkInteger(value, -0x80, 0x7f, 'int8');
    this.prep(1, 0);
    this.data.setInt8(--this.space, value);
  }

  addUint8(value: number): void {
    checkInteger(value, 0, 0xff, 'uint8');
    this.prep(1, 0);
    this.data.setUint8(--this.space, value);
  }

  addBool(value: boolean): void {
    this.addUint8(value ? 1 : 0);
  }

  addInt16(value: number): void {
    checkInteger(value, -0x8000, 0x7fff, 'int16');
    this.prep(2, 0);
    this.data.setInt16(this.space -= 2, value, true);
  }

  addUint16(value: number): void {
    checkInteger(value, 0, MAX_U16, 'uint16');
    this.prep(2, 0);
    this.data.setUint16(this.space -= 2, value, true);
  }

  addInt32(value: number): void {
    checkInteger(value, -0x80000000, 0x7fffffff, 'int32');
    this.prep(4, 0);
    this.data.setInt32(this.space -= 4, value, true);
  }

  addUint32(value: number): void {
    checkInteger(value, 0, 0xffffffff, 'uint32');
    this.prep(4, 0);
    this.data.setUint32(this.space -= 4, value, true);
  }

  addInt64(value: bigint): void {
    this.prep(8, 0);
    this.data.setBigInt64(this.space -= 8, value, true);
  }

  addFloat32(value: number): void {
    this.prep(4, 0);
    this.data.setFloat32(this.space -= 4, value, true);
  }

  addFloat64(value: number): void {
    this.prep(8, 0);
    this.data.setFloat64(this.space -= 8, value, true);
  }

  /** Prepend a uoffset pointing at an already-written object. */
  addOffset(target: Offset): void {
    this.prep(SIZEOF_INT, 0);
    if (!Number.isInteger(target) || target <= 0 || target > this.offset()) {
      throw new BuilderError(
        `Offset ${target} does not refer to a written object (buffer holds ${this.offset()} bytes).`,
      );
    }
    this.addUint32(this.offset() - target + SIZEOF_INT);
  }

  // ── Tables ────────────────────────────────────────────────────────────────

  startTable(numFields: number): void {
    this.assertWritable();
    this.assertNotNested('A table');
    if (!Number.isInteger(numFields) || numFields < 0) {
      throw new TypeError(`startTable: numFields must be a non-negative integer; got ${numFields}.`);
    }
    this.vtable      = new Array<number>(numFields).fill(0);
    this.objectStart = this.offset();
    this.lastSlot    = numFields;
  }

  /**
   * Validate `slot` for the open table and return its vtable scratch array.
   * Slots must arrive in strictly descending order, including slots whose
   * value is elided as a default.
   */
  private beginField(slot: number): number[] {
    const vt = this.vtable;
    if (vt === null) {
      throw new BuilderError(`Field for slot ${slot} added outside startTable()/endTable().`);
    }
    if (!Number.isInteger(slot) || slot < 0 || slot >= vt.length) {
      throw new BuilderError(`Slot ${slot} is outside the open table's ${vt.length} slot(s).`);
    }
    if (slot >= this.lastSlot) {
      throw new BuilderError(
        `Slot ${slot} added after slot ${this.lastSlot}; fields must be added in strictly descending slot order.`,
      );
    }
    this.lastSlot = slot;
    return vt;
  }

  private keep<T>(value: T, defaultValue: T): boolean {
    return this.opts.forceDefaults || value !== defaultValue;
  }

  addInt8Field(slot: number, value: number, defaultValue: number): void {
    const vt = this.beginField(slot);
    if (!this.keep(value, defaultValue)) return;
    this.addInt8(value);
    vt[slot] = this.offset();
  }

  addUint8Field(slot: number, value: number, defaultValue: number): void {
    const vt = this.beginField(slot);
    if (!this.keep(value, defaultValue)) return;
    this.addUint8(value);
    vt[slot] = this.offset();
  }

  addBoolField(slot: number, value: boolean, defaultValue: boolean): void {
    const vt = this.beginField(slot);
    if (!this.keep(value, defaultValue)) return;
    this.addBool(value);
    vt[slot] = this.offset();
  }

  addInt16Field(slot: number, value: number, defaultValue: number): void {
    const vt = this.beginField(slot);
    if (!this.keep(value, defaultValue)) return;
    this.addInt16(value);
    vt[slot] = this.offset();
  }

  addUint16Field(slot: number, value: number, defaultValue: number): void {
    const vt = this.beginField(slot);
    if (!this.keep(value, defaultValue)) return;
    this.addUint16(value);
    vt[slot] = this.offset();
  }

  addInt32Field(slot: number, value: number, defaultValue: number): void {
    const vt = this.beginField(slot);
    if (!this.keep(value, defaultValue)) return;
    this.addInt32(value);
    vt[slot] = this.offset();
  }

  addUint32Field(slot: number, value: number, defaultValue: number): void {
    const vt = this.beginField(slot);
    if (!this.keep(value, defaultValue)) return;
    this.addUint32(value);
    vt[slot] = this.offset();
  }

  addInt64Field(slot: number, value: bigint, defaultValue: bigint): void {
    const vt = this.beginField(slot);
    if (!this.keep(value, defaultValue)) return;
    this.addInt64(value);
    vt[slot] = this.offset();
  }

  addFloat32Field(slot: number, value: number, defaultValue: number): void {
    const vt = this.beginField(slot);
    if (!this.keep(value, defaultValue)) return;
    this.addFloat32(value);
    vt[slot] = this.offset();
  }

  addFloat64Field(slot: number, value: number, defaultValue: number): void {
    const vt = this.beginField(slot);
    if (!this.keep(value, defaultValue)) return;
    this.addFloat64(value);
    vt[slot] = this.offset();
  }

  /** Reference field. Offset 0 means "absent" and is never written, forceDefaults or not. */
  addOffsetField(slot: number, target: Offset): void {
    const vt = this.beginField(slot);
    if (target === 0) return;
    this.addOffset(target);
    vt[slot] = this.offset();
  }

  endTable(): Offset {
    const vt = this.vtable;
    if (vt === null) {
      throw new BuilderError('endTable() called without a matching startTable().');
    }

    // soffset placeholder; patched below once the vtable position is known.
    this.addInt32(0);
    const tableOffset = this.offset();
    const tableSize   = tableOffset - this.objectStart;
    if (tableSize > MAX_U16) {
      throw new BuilderError(`Table is ${tableSize} bytes; vtable entries are u16 and address at most ${MAX_U16}.`);
    }

    let i = vt.length - 1;
    while (i >= 0 && vt[i] === 0) i--;
    const trimmedSize = i + 1;

    for (; i >= 0; i--) {
      const fieldOffset = vt[i] ?? 0;
      this.addUint16(fieldOffset !== 0 ? tableOffset - fieldOffset : 0);
    }
    this.addUint16(tableSize);
    const vtableLen = (trimmedSize + VTABLE_METADATA_FIELDS) * SIZEOF_SHORT;
    this.addUint16(vtableLen);

    const key = this.opts.dedupeVtables
      ? this.bytes.subarray(this.space, this.space + vtableLen).join(',')
      : null;
    const existing = key === null ? undefined : this.vtables.get(key);

    if (existing !== undefined) {
      // Drop the vtable just written; point the table at the earlier copy,
      // which sits later in the buffer (negative soffset).
      this.space = this.bytes.length - tableOffset;
      this.data.setInt32(this.space, existing - tableOffset, true);
    } else {
      const vtableOffset = this.offset();
      if (key !== null) this.vtables.set(key, vtableOffset);
      this._vtableCount++;
      this.data.setInt32(this.bytes.length - tableOffset, vtableOffset - tableOffset, true);
    }

    this.vtable      = null;
    this.objectStart = -1;
    this.lastSlot    = -1;
    return tableOffset;
  }

  // ── Vectors ───────────────────────────────────────────────────────────────

  /**
   * Open a vector of `numElems` elements of `elemSize` bytes. Elements are
   * then prepended LAST FIRST with add*() and the vector closed by endVector().
   */
  startVector(elemSize: number, numElems: number, alignment: number): void {
    this.assertWritable();
    this.assertNotNested('A vector');
    if (!Number.isInteger(numElems) || numElems < 0) {
      throw new TypeError(`startVector: numElems must be a non-negative integer; got ${numElems}.`);
    }
    const byteLen = elemSize * numElems;
    this.prep(SIZEOF_INT, byteLen);
    this.prep(alignment, byteLen);
    this.vectorOpen      = true;
    this.vectorNumElems  = numElems;
    this.vectorByteLen   = byteLen;
    this.vectorElemStart = this.offset();
  }

  endVector(): Offset {
    if (!this.vectorOpen) {
      throw new BuilderError('endVector() called without a matching startVector().');
    }
    const written = this.offset() - this.vectorElemStart;
    if (written !== this.vectorByteLen) {
      throw new BuilderError(
        `Vector declared ${this.vectorNumElems} element(s) (${this.vectorByteLen} bytes) but ${written} bytes were written.`,
      );
    }
    this.vectorOpen = false;
    this.addUint32(this.vectorNumElems);
    return this.offset();
  }

  createUint32Vector(values: ArrayLike<number>): Offset {
    this.startVector(SIZEOF_INT, values.length, SIZEOF_INT);
    for (let i = values.length - 1; i >= 0; i--) this.addUint32(values[i] ?? 0);
    return this.endVector();
  }

  createInt32Vector(values: ArrayLike<number>): Offset {
    this.startVector(SIZEOF_INT, values.length, SIZEOF_INT);
    for (let i = values.length - 1; i >= 0; i--) this.addInt32(values[i] ?? 0);
    return this.endVector();
  }

  createFloat32Vector(values: ArrayLike<number>): Offset {
    this.startVector(SIZEOF_INT, values.length, SIZEOF_INT);
    for (let i = values.length - 1; i >= 0; i--) this.addFloat32(values[i] ?? 0);
    return this.endVector();
  }

  /** Vector of references to already-written tables or strings. */
  createOffsetVector(targets: readonly Offset[]): Offset {
    this.startVector(SIZEOF_INT, targets.length, SIZEOF_INT);
    for (let i = targets.length - 1; i >= 0; i--) this.addOffset(targets[i] ?? 0);
    return this.endVector();
  }

  // ── Strings ───────────────────────────────────────────────────────────────

  /**
   * Write a UTF-8 string as a byte vector followed by a null terminator.
   * The terminator is not counted in the stored length.
   */
  createString(value: string | Uint8Array): Offset {
    this.assertWritable();
    this.assertNotNested('A string');
    const utf8 = typeof value === 'string' ? utf8Encoder.encode(value) : value;

    this.addInt8(0);
    this.startVector(1, utf8.length, 1);
    this.space -= utf8.length;
    this.bytes.set(utf8, this.space);
    return this.endVector();
  }

  // ── Finish ────────────────────────────────────────────────────────────────

  /**
   * Designate `root` as the buffer's root table and seal the buffer.
   *
   * Layout written at the front:  [size?][root uoffset][identifier?]
   */
  finish(root: Offset, options: FinishOptions = {}): void {
    this.assertWritable();
    this.assertNotNested('finish()');
    const prefix = options.sizePrefix === true ? SIZE_PREFIX_LENGTH : 0;

    if (options.identifier !== undefined) {
      assertIdentifier(options.identifier);
      this.prep(this.minalign, SIZEOF_INT + FILE_IDENTIFIER_LENGTH + prefix);
      for (let i = FILE_IDENTIFIER_LENGTH - 1; i >= 0; i--) {
        this.data.setUint8(--this.space, options.identifier.charCodeAt(i));
      }
    } else {
      this.prep(this.minalign, SIZEOF_INT + prefix);
    }

    this.addOffset(root);
    if (prefix !== 0) this.addUint32(this.offset());
    this.finished = true;
    this.log.debug(
      { bytes: this.offset(), vtables: this._vtableCount, identifier: options.identifier ?? null },
      'buffer finished',
    );
  }

  /**
   * The finished buffer. Aliases the builder's storage: do not write to it,
   * and do not call clear() while it is still being read.
   */
  asUint8Array(): Uint8Array {
    if (!this.finished) {
      throw new BuilderError('asUint8Array() called before finish().');
    }
    return this.bytes.subarray(this.space);
  }
}
