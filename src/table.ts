/**
 * graphbuf — Table
 *
 * Base class of every lazy table view. A view is two numbers: the ByteBuffer
 * it reads from and the absolute position of its table. Constructing one
 * touches no bytes; each accessor performs exactly one vtable lookup and one
 * read, and nothing is cached between calls.
 *
 * Absent fields:
 *   scalar        → the schema default passed by the subclass
 *   string/table  → null
 *   vector        → null from *Array(), 0 from vectorLength()
 *
 * Present-but-empty vectors come back as [] — distinct from null.
 */

import { ByteBuffer, MalformedBufferError } from './byte-buffer';
import { SIZEOF_INT } from './constants';

// Typed arrays use host byte order; the wire is little-endian.
const HOST_LITTLE_ENDIAN = new Uint8Array(new Uint32Array([1]).buffer)[0] === 1;

/** Result of reading a union's (tag, offset) slot pair. */
export interface UnionSlot {
  readonly tag: number;
  /** Absolute position of the variant table. */
  readonly pos: number;
}

export abstract class Table {
  constructor(
    readonly bb:    ByteBuffer,
    readonly bbPos: number,
  ) {}

  /** True when the vtable records a value for `slot`. */
  hasField(slot: number): boolean {
    return this.bb.fieldOffset(this.bbPos, slot, 1) !== 0;
  }

  /** Absolute position of `slot`'s `width`-byte value, or 0 when absent. */
  protected fieldPos(slot: number, width: number): number {
    const o = this.bb.fieldOffset(this.bbPos, slot, width);
    return o === 0 ? 0 : this.bbPos + o;
  }

  // ── Scalars ────────────────────────────────────────────────────────────────

  protected int8Field(slot: number, defaultValue: number): number {
    const p = this.fieldPos(slot, 1);
    return p === 0 ? defaultValue : this.bb.readInt8(p);
  }

  protected uint8Field(slot: number, defaultValue: number): number {
    const p = this.fieldPos(slot, 1);
    return p === 0 ? defaultValue : this.bb.readUint8(p);
  }

  protected boolField(slot: number, defaultValue: boolean): boolean {
    const p = this.fieldPos(slot, 1);
    return p === 0 ? defaultValue : this.bb.readBool(p);
  }

  protected int32Field(slot: number, defaultValue: number): number {
    const p = this.fieldPos(slot, 4);
    return p === 0 ? defaultValue : this.bb.readInt32(p);
  }

  protected uint32Field(slot: number, defaultValue: number): number {
    const p = this.fieldPos(slot, 4);
    return p === 0 ? defaultValue : this.bb.readUint32(p);
  }

  protected float32Field(slot: number, defaultValue: number): number {
    const p = this.fieldPos(slot, 4);
    return p === 0 ? defaultValue : this.bb.readFloat32(p);
  }

  // ── References ─────────────────────────────────────────────────────────────

  protected stringField(slot: number): string | null {
    const p = this.fieldPos(slot, SIZEOF_INT);
    return p === 0 ? null : this.bb.string(p);
  }

  protected tableField<T>(slot: number, make: (bb: ByteBuffer, pos: number) => T): T | null {
    const p = this.fieldPos(slot, SIZEOF_INT);
    return p === 0 ? null : make(this.bb, this.bb.indirect(p));
  }

  // ── Vectors ────────────────────────────────────────────────────────────────

  /** Element count of the vector in `slot`; 0 when absent. */
  protected vectorLength(slot: number, stride: number): number {
    const p = this.fieldPos(slot, SIZEOF_INT);
    return p === 0 ? 0 : this.bb.vectorLength(p, stride);
  }

  /**
   * Absolute position of element `index` of the vector in `slot`.
   * @throws RangeError when `index` is outside [0, length).
   */
  protected vectorElementPos(slot: number, index: number, stride: number): number {
    const length = this.vectorLength(slot, stride);
    if (!Number.isInteger(index) || index < 0 || index >= length) {
      throw new RangeError(`Index ${index} is out of bounds for vector of length ${length} (slot ${slot}).`);
    }
    return this.bb.vector(this.fieldPos(slot, SIZEOF_INT)) + index * stride;
  }

  protected vectorArray<T>(slot: number, stride: number, read: (pos: number) => T): T[] | null {
    const p = this.fieldPos(slot, SIZEOF_INT);
    if (p === 0) return null;
    const length = this.bb.vectorLength(p, stride);
    const start  = this.bb.vector(p);
    const out: T[] = new Array<T>(length);
    for (let i = 0; i < length; i++) {
      out[i] = read(start + i * stride);
    }
    return out;
  }

  protected uint32VectorArray(slot: number): number[] | null {
    return this.vectorArray(slot, SIZEOF_INT, (pos) => this.bb.readUint32(pos));
  }

  protected int32VectorArray(slot: number): number[] | null {
    return this.vectorArray(slot, SIZEOF_INT, (pos) => this.bb.readInt32(pos));
  }

  protected float32VectorArray(slot: number): number[] | null {
    return this.vectorArray(slot, SIZEOF_INT, (pos) => this.bb.readFloat32(pos));
  }

  // ── Typed-array views ──────────────────────────────────────────────────────
  // Zero-copy when the elements sit 4-byte aligned in the underlying
  // ArrayBuffer on a little-endian host; otherwise a copy. A view aliases the
  // buffer: do not write to it.

  /** First element and count of a 4-byte vector, and whether a view may alias it. */
  private wordVector(slot: number): { start: number; length: number; aliasable: boolean } | null {
    const p = this.fieldPos(slot, SIZEOF_INT);
    if (p === 0) return null;
    const length = this.bb.vectorLength(p, SIZEOF_INT);
    const start  = this.bb.vector(p);
    const aliasable = HOST_LITTLE_ENDIAN && (this.bb.bytes.byteOffset + start) % SIZEOF_INT === 0;
    return { start, length, aliasable };
  }

  protected uint32VectorView(slot: number): Uint32Array | null {
    const v = this.wordVector(slot);
    if (v === null) return null;
    const { bytes } = this.bb;
    if (v.aliasable) return new Uint32Array(bytes.buffer, bytes.byteOffset + v.start, v.length);
    const out = new Uint32Array(v.length);
    for (let i = 0; i < v.length; i++) out[i] = this.bb.readUint32(v.start + i * SIZEOF_INT);
    return out;
  }

  protected int32VectorView(slot: number): Int32Array | null {
    const v = this.wordVector(slot);
    if (v === null) return null;
    const { bytes } = this.bb;
    if (v.aliasable) return new Int32Array(bytes.buffer, bytes.byteOffset + v.start, v.length);
    const out = new Int32Array(v.length);
    for (let i = 0; i < v.length; i++) out[i] = this.bb.readInt32(v.start + i * SIZEOF_INT);
    return out;
  }

  protected float32VectorView(slot: number): Float32Array | null {
    const v = this.wordVector(slot);
    if (v === null) return null;
    const { bytes } = this.bb;
    if (v.aliasable) return new Float32Array(bytes.buffer, bytes.byteOffset + v.start, v.length);
    const out = new Float32Array(v.length);
    for (let i = 0; i < v.length; i++) out[i] = this.bb.readFloat32(v.start + i * SIZEOF_INT);
    return out;
  }

  /** Element `index` of a vector of tables, each slot holding a uoffset. */
  protected tableVectorElement<T>(slot: number, index: number, make: (bb: ByteBuffer, pos: number) => T): T {
    return make(this.bb, this.bb.indirect(this.vectorElementPos(slot, index, SIZEOF_INT)));
  }

  // ── Unions ─────────────────────────────────────────────────────────────────

  /**
   * Read the union stored as tag in `tagSlot` and table offset in `tagSlot + 1`.
   *
   * Returns null for the NONE tag (0). The caller is responsible for
   * dispatching on `tag` and rejecting values outside its closed set.
   *
   * @throws MalformedBufferError when the tag and offset disagree: NONE with
   *         a payload, or a variant tag with no payload.
   */
  protected unionField(tagSlot: number): UnionSlot | null {
    const tag = this.uint8Field(tagSlot, 0);
    const p   = this.fieldPos(tagSlot + 1, SIZEOF_INT);
    if (tag === 0) {
      if (p !== 0) {
        throw new MalformedBufferError(
          `Union at slot ${tagSlot} of table ${this.bbPos} has tag NONE but carries a payload.`,
          this.bbPos,
        );
      }
      return null;
    }
    if (p === 0) {
      throw new MalformedBufferError(
        `Union at slot ${tagSlot} of table ${this.bbPos} has tag ${tag} but no payload.`,
        this.bbPos,
      );
    }
    return { tag, pos: this.bb.indirect(p) };
  }
}

/** Error for a tag outside a union's or enum's closed set. */
export function unknownTag(what: string, tag: number, table: Table): MalformedBufferError {
  return new MalformedBufferError(`Unknown ${what} tag ${tag} in table at ${table.bbPos}.`, table.bbPos);
}
