/**
 * graphbuf — ByteBuffer
 *
 * Read-only, bounds-checked lens over a finished buffer. This is the primitive
 * codec and the offset-resolution layer of the read path: every table, vector
 * and string view bottoms out in one of the methods below.
 *
 * Positions are absolute byte indices into `bytes` (size prefix included).
 * Nothing here caches or mutates; two ByteBuffers over the same bytes, or one
 * ByteBuffer shared by many views, observe exactly the same values.
 *
 * Offset kinds on the wire:
 *
 *   uoffset  u32  forward reference:  target = here + u32(here)
 *   soffset  i32  table → vtable:      vtable = table − i32(table)
 *   voffset  u16  vtable entry:        field  = table + u16(vtable + 4 + 2·slot)
 *
 * Any read that would fall outside the buffer throws MalformedBufferError.
 * A zero/default is never returned for a corrupt buffer — "absent" and
 * "corrupt" must stay distinguishable.
 */

import {
  SIZEOF_INT,
  SIZEOF_SHORT,
  SIZE_PREFIX_LENGTH,
  FILE_IDENTIFIER_LENGTH,
  VTABLE_METADATA_FIELDS,
  fieldVtableOffset,
} from './constants';

// ─── Errors ───────────────────────────────────────────────────────────────────

/**
 * Thrown when buffer contents contradict the format: an offset that points
 * outside the buffer, a vtable that overruns its table, a vector longer than
 * the bytes that remain, or a union/enum tag outside its closed set.
 *
 * Fatal to the field access that hit it, not to the buffer: other fields may
 * still read cleanly.
 */
export class MalformedBufferError extends Error {
  constructor(message: string, readonly offset: number) {
    super(message);
    this.name = 'MalformedBufferError';
  }
}

// ─── Module-level shared decoder ──────────────────────────────────────────────

// fatal: invalid UTF-8 is corruption, not something to paper over with U+FFFD.
const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

// ─── ByteBuffer ───────────────────────────────────────────────────────────────

export class ByteBuffer {
  private readonly view: DataView;

  constructor(readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get length(): number {
    return this.bytes.byteLength;
  }

  private check(pos: number, size: number): void {
    if (!Number.isInteger(pos) || pos < 0 || pos + size > this.bytes.byteLength) {
      throw new MalformedBufferError(
        `Read of ${size} byte(s) at ${pos} is outside the buffer (length ${this.bytes.byteLength}).`,
        pos,
      );
    }
  }

  // ── Scalars ────────────────────────────────────────────────────────────────

  readInt8(pos: number): number {
    this.check(pos, 1);
    return this.view.getInt8(pos);
  }

  readUint8(pos: number): number {
    this.check(pos, 1);
    return this.view.getUint8(pos);
  }

  readBool(pos: number): boolean {
    return this.readUint8(pos) !== 0;
  }

  readInt16(pos: number): number {
    this.check(pos, 2);
    return this.view.getInt16(pos, /* littleEndian */ true);
  }

  readUint16(pos: number): number {
    this.check(pos, 2);
    return this.view.getUint16(pos, true);
  }

  readInt32(pos: number): number {
    this.check(pos, 4);
    return this.view.getInt32(pos, true);
  }

  readUint32(pos: number): number {
    this.check(pos, 4);
    return this.view.getUint32(pos, true);
  }

  readInt64(pos: number): bigint {
    this.check(pos, 8);
    return this.view.getBigInt64(pos, true);
  }

  readUint64(pos: number): bigint {
    this.check(pos, 8);
    return this.view.getBigUint64(pos, true);
  }

  readFloat32(pos: number): number {
    this.check(pos, 4);
    return this.view.getFloat32(pos, true);
  }

  readFloat64(pos: number): number {
    this.check(pos, 8);
    return this.view.getFloat64(pos, true);
  }

  // ── Offset resolution ──────────────────────────────────────────────────────

  /** Follow the uoffset stored at `pos`. The target must lie inside the buffer. */
  indirect(pos: number): number {
    const target = pos + this.readUint32(pos);
    if (target >= this.bytes.byteLength) {
      throw new MalformedBufferError(
        `uoffset at ${pos} points to ${target}, past the end of the buffer (length ${this.bytes.byteLength}).`,
        pos,
      );
    }
    return target;
  }

  /**
   * Byte offset of `slot` relative to the table at `tablePos`, or 0 when the
   * table's vtable does not mention the slot (field absent). The `width`
   * bytes of the field must lie inside the table.
   *
   * Slots past the end of a shorter vtable report 0: that is how a reader
   * with a newer schema reads a buffer from an older writer.
   */
  fieldOffset(tablePos: number, slot: number, width: number): number {
    const vtable = tablePos - this.readInt32(tablePos);
    this.check(vtable, VTABLE_METADATA_FIELDS * SIZEOF_SHORT);

    const vtableSize = this.readUint16(vtable);
    if (vtableSize < VTABLE_METADATA_FIELDS * SIZEOF_SHORT || vtableSize % SIZEOF_SHORT !== 0) {
      throw new MalformedBufferError(`Vtable at ${vtable} declares invalid size ${vtableSize}.`, vtable);
    }
    this.check(vtable, vtableSize);

    const entry = fieldVtableOffset(slot);
    if (entry >= vtableSize) return 0;

    const offset = this.readUint16(vtable + entry);
    if (offset === 0) return 0;

    const tableSize = this.readUint16(vtable + SIZEOF_SHORT);
    if (offset + width > tableSize) {
      throw new MalformedBufferError(
        `Slot ${slot} of table at ${tablePos}: ${width} byte(s) at offset ${offset} overrun the table size ${tableSize}.`,
        tablePos,
      );
    }
    return offset;
  }

  /**
   * Element count of the vector whose uoffset is stored at `pos`.
   * Throws when `count × stride` bytes do not fit between the first element
   * and the end of the buffer.
   */
  vectorLength(pos: number, stride: number): number {
    const start = this.indirect(pos);
    const count = this.readUint32(start);
    const available = this.bytes.byteLength - (start + SIZEOF_INT);
    if (count * stride > available) {
      throw new MalformedBufferError(
        `Vector at ${start} claims ${count} element(s) of ${stride} byte(s); only ${available} byte(s) remain.`,
        start,
      );
    }
    return count;
  }

  /** Position of element 0 of the vector whose uoffset is stored at `pos`. */
  vector(pos: number): number {
    return this.indirect(pos) + SIZEOF_INT;
  }

  /** Decode the string whose uoffset is stored at `pos`. */
  string(pos: number): string {
    const length = this.vectorLength(pos, 1);
    const start  = this.vector(pos);
    try {
      return utf8Decoder.decode(this.bytes.subarray(start, start + length));
    } catch (err) {
      throw new MalformedBufferError(
        `String at ${start} is not valid UTF-8: ${err instanceof Error ? err.message : String(err)}`,
        start,
      );
    }
  }

  /**
   * Raw bytes of the string whose uoffset is stored at `pos`, without the
   * trailing null terminator. Zero-copy: the result aliases the buffer.
   */
  stringBytes(pos: number): Uint8Array {
    const length = this.vectorLength(pos, 1);
    const start  = this.vector(pos);
    return this.bytes.subarray(start, start + length);
  }

  // ── Root & identifier ──────────────────────────────────────────────────────

  /** Absolute position of the root table. */
  rootTable(sizePrefixed: boolean): number {
    return this.indirect(sizePrefixed ? SIZE_PREFIX_LENGTH : 0);
  }

  /** The 4 identifier bytes as a string, or null when the buffer is too short to hold them. */
  readIdentifier(sizePrefixed: boolean): string | null {
    const start = (sizePrefixed ? SIZE_PREFIX_LENGTH : 0) + SIZEOF_INT;
    if (start + FILE_IDENTIFIER_LENGTH > this.bytes.byteLength) return null;
    let out = '';
    for (let i = 0; i < FILE_IDENTIFIER_LENGTH; i++) {
      out += String.fromCharCode(this.bytes[start + i] ?? 0);
    }
    return out;
  }

  hasIdentifier(identifier: string, sizePrefixed: boolean): boolean {
    return this.readIdentifier(sizePrefixed) === identifier;
  }
}
