/**
 * graphbuf — layout constants
 *
 * These constants define the binary contract of a graphbuf buffer.
 * Any change to a width or to the identifier is a BREAKING CHANGE for every
 * buffer already written.
 *
 * A finished buffer is laid out front to back as:
 *
 *   [size_prefix: u32]        optional — byte length of everything after it
 *   [root_offset: u32]        uoffset from this word to the root table
 *   [identifier:  4 × u8]     optional — e.g. 'MODL'
 *   [body ...]                tables, vtables, vectors and strings, written
 *                             back to front by the Builder
 *
 * Every multi-byte value is little-endian.
 */

// ─── Widths ───────────────────────────────────────────────────────────────────

export const SIZEOF_SHORT = 2; // vtable entries
export const SIZEOF_INT   = 4; // uoffset / soffset / vector length

export const SIZE_PREFIX_LENGTH     = 4;
export const FILE_IDENTIFIER_LENGTH = 4;

/**
 * Number of u16 words at the head of every vtable before the per-slot
 * entries: [vtable_byte_len: u16][table_byte_len: u16].
 */
export const VTABLE_METADATA_FIELDS = 2;

/** Largest buffer the Builder will grow to. Offsets are 32-bit signed on the soffset side. */
export const MAX_BUFFER_SIZE = 0x7fffffff;

/** Builder starting capacity when the caller does not choose one. */
export const DEFAULT_INITIAL_SIZE = 1024;

// ─── Model Format ─────────────────────────────────────────────────────────────

/** 4-byte format identifier written after the root offset of every model buffer. */
export const MODEL_FILE_IDENTIFIER = 'MODL';

/**
 * Value written to Model.schemaVersion by this library.
 * Readers compare against it: lenient readers warn on mismatch, strict
 * readers refuse the buffer.
 */
export const SCHEMA_VERSION = 1;

// ─── Geometry Helpers ─────────────────────────────────────────────────────────

/** Byte offset of slot `slot` inside a vtable. */
export function fieldVtableOffset(slot: number): number {
  return (VTABLE_METADATA_FIELDS + slot) * SIZEOF_SHORT;
}
