/**
 * graphbuf — Builder layout
 *
 * Byte counts below follow from the back-to-front layout: a table of two u32
 * fields is 12 bytes (soffset + 2 × 4) and its vtable is 8 bytes (2 metadata
 * words + 2 entries).
 */

import { describe, it, expect } from 'vitest';
import { pino } from 'pino';
import {
  Builder,
  BuilderError,
  ByteBuffer,
  Table,
  UnsqueezeAttrs,
  createUnsqueezeAttrs,
} from '../src/index';

// ─── Shared helpers ────────────────────────────────────────────────────────────

class Pair extends Table {
  first():  number { return this.uint32Field(0, 0); }
  second(): number { return this.uint32Field(1, 0); }
}

class Named extends Table {
  name(): string | null { return this.stringField(0); }
  nameBytes(): Uint8Array { return this.bb.stringBytes(this.fieldPos(0, 4)); }
}

function writePair(b: Builder, first: number, second: number): number {
  b.startTable(2);
  b.addUint32Field(1, second, 0);
  b.addUint32Field(0, first, 0);
  return b.endTable();
}

function rootOf(bytes: Uint8Array): { bb: ByteBuffer; pos: number } {
  const bb = new ByteBuffer(bytes);
  return { bb, pos: bb.rootTable(false) };
}

// ─── Vtable deduplication ─────────────────────────────────────────────────────

describe('Builder — vtable deduplication', () => {
  it('shares one vtable between tables with identical layouts', () => {
    const b = new Builder();
    writePair(b, 20, 10);
    const second = writePair(b, 40, 30);

    expect(b.vtableCount).toBe(1);
    expect(b.offset()).toBe(32);

    b.finish(second);
    const bytes = b.asUint8Array();
    expect(bytes.length).toBe(36);

    const { bb, pos } = rootOf(bytes);
    const pair = new Pair(bb, pos);
    expect(pair.first()).toBe(40);
    expect(pair.second()).toBe(30);
  });

  it('writes every vtable when deduplication is off', () => {
    const b = new Builder({ dedupeVtables: false });
    writePair(b, 20, 10);
    const second = writePair(b, 40, 30);

    expect(b.vtableCount).toBe(2);
    expect(b.offset()).toBe(40);

    b.finish(second);
    expect(b.asUint8Array().length).toBe(44);
  });
});

// ─── Vtable trimming ──────────────────────────────────────────────────────────

describe('Builder — vtable trimming', () => {
  it('omits trailing absent slots from the vtable', () => {
    const b = new Builder();
    b.startTable(3);
    b.addUint32Field(2, 0, 0);
    b.addUint32Field(1, 0, 0);
    b.addUint32Field(0, 5, 0);
    b.finish(b.endTable());

    const { bb, pos } = rootOf(b.asUint8Array());
    const vtable = pos - bb.readInt32(pos);
    expect(bb.readUint16(vtable)).toBe(6);
    expect(bb.readUint16(vtable + 2)).toBe(8);

    const pair = new Pair(bb, pos);
    expect(pair.first()).toBe(5);
    expect(pair.hasField(1)).toBe(false);
    expect(pair.hasField(2)).toBe(false);
  });
});

// ─── Field ordering ───────────────────────────────────────────────────────────

describe('Builder — field ordering', () => {
  it('rejects a slot added after a lower one', () => {
    const b = new Builder();
    b.startTable(3);
    b.addUint32Field(0, 1, 0);
    expect(() => b.addUint32Field(1, 1, 0)).toThrow(BuilderError);
  });

  it('rejects the same slot twice', () => {
    const b = new Builder();
    b.startTable(2);
    b.addUint32Field(1, 1, 0);
    expect(() => b.addUint32Field(1, 2, 0)).toThrow(BuilderError);
  });

  it('counts an elided default towards the order', () => {
    const b = new Builder();
    b.startTable(2);
    b.addUint32Field(1, 0, 0);
    expect(() => b.addUint32Field(1, 3, 0)).toThrow(BuilderError);
  });

  it('rejects a slot outside the open table', () => {
    const b = new Builder();
    b.startTable(2);
    expect(() => b.addUint32Field(2, 1, 0)).toThrow(BuilderError);
  });

  it('rejects a field with no open table', () => {
    expect(() => new Builder().addUint32Field(0, 1, 0)).toThrow(BuilderError);
  });
});

// ─── Misuse ───────────────────────────────────────────────────────────────────

describe('Builder — misuse', () => {
  it('refuses to nest a table inside an open table', () => {
    const b = new Builder();
    b.startTable(1);
    expect(() => b.startTable(1)).toThrow(BuilderError);
  });

  it('refuses to create a string while a table is open', () => {
    const b = new Builder();
    b.startTable(1);
    expect(() => b.createString('x')).toThrow(BuilderError);
  });

  it('refuses a reference to an object that was never written', () => {
    const b = new Builder();
    b.startTable(1);
    expect(() => b.addOffsetField(0, 999)).toThrow(BuilderError);
  });

  it('refuses endTable() and endVector() without a start', () => {
    const b = new Builder();
    expect(() => b.endTable()).toThrow(BuilderError);
    expect(() => b.endVector()).toThrow(BuilderError);
  });

  it('refuses a vector whose element count does not match what was written', () => {
    const b = new Builder();
    b.startVector(4, 2, 4);
    b.addUint32(1);
    expect(() => b.endVector()).toThrow(BuilderError);
  });

  it('refuses asUint8Array() before finish()', () => {
    expect(() => new Builder().asUint8Array()).toThrow(BuilderError);
  });

  it('refuses writes after finish() until clear()', () => {
    const b = new Builder();
    b.finish(writePair(b, 1, 2));
    expect(() => b.startTable(1)).toThrow(BuilderError);

    b.clear();
    expect(b.offset()).toBe(0);
    expect(b.vtableCount).toBe(0);
    b.finish(writePair(b, 3, 4));
    const { bb, pos } = rootOf(b.asUint8Array());
    expect(new Pair(bb, pos).first()).toBe(3);
  });

  it('rejects an identifier that is not four ASCII characters', () => {
    const b = new Builder();
    const root = writePair(b, 1, 2);
    expect(() => b.finish(root, { identifier: 'AB' })).toThrow(TypeError);
  });
});

// ─── Strings and vectors ──────────────────────────────────────────────────────

describe('Builder — strings and vectors', () => {
  it('null-terminates strings without counting the terminator', () => {
    const b = new Builder();
    const s = b.createString('héllo');
    b.startTable(1);
    b.addOffsetField(0, s);
    b.finish(b.endTable());

    const bytes = b.asUint8Array();
    const { bb, pos } = rootOf(bytes);
    const named = new Named(bb, pos);
    expect(named.name()).toBe('héllo');

    const raw = named.nameBytes();
    expect(raw.length).toBe(6);
    expect(bytes[raw.byteOffset - bytes.byteOffset + raw.length]).toBe(0);
  });

  it('keeps an empty string distinct from an absent one', () => {
    const b = new Builder();
    const s = b.createString('');
    b.startTable(1);
    b.addOffsetField(0, s);
    b.finish(b.endTable());

    const { bb, pos } = rootOf(b.asUint8Array());
    expect(new Named(bb, pos).name()).toBe('');
  });

  it('keeps an empty vector distinct from an absent one', () => {
    const present = new Builder();
    present.finish(createUnsqueezeAttrs(present, { axes: [] }));
    const p = rootOf(present.asUint8Array());
    expect(new UnsqueezeAttrs(p.bb, p.pos).axesArray()).toEqual([]);

    const absent = new Builder();
    absent.finish(createUnsqueezeAttrs(absent, { axes: null }));
    const a = rootOf(absent.asUint8Array());
    const view = new UnsqueezeAttrs(a.bb, a.pos);
    expect(view.axesArray()).toBeNull();
    expect(view.axesLength()).toBe(0);
  });

  it('grows past its initial capacity without moving finished objects', () => {
    const lines: Record<string, unknown>[] = [];
    const logger = pino({ level: 'debug' }, {
      write(msg: string) {
        const record: Record<string, unknown> = JSON.parse(msg);
        lines.push(record);
      },
    });

    const b = new Builder({ initialSize: 16, logger });
    const s = b.createString('a'.repeat(40));
    b.startTable(1);
    b.addOffsetField(0, s);
    b.finish(b.endTable());

    expect(b.capacity).toBeGreaterThan(16);
    const bytes = b.asUint8Array();
    const { bb, pos } = rootOf(bytes);
    expect(new Named(bb, pos).name()).toBe('a'.repeat(40));

    const grown = lines.find((l) => l['msg'] === 'builder buffer grown');
    expect(grown?.['from']).toBe(16);
    expect(grown?.['to']).toBe(32);
    expect(grown?.['component']).toBe('builder');

    const finished = lines.find((l) => l['msg'] === 'buffer finished');
    expect(finished?.['bytes']).toBe(bytes.length);
    expect(finished?.['vtables']).toBe(1);
  });
});

// ─── Integer ranges ───────────────────────────────────────────────────────────

describe('Builder — integer ranges', () => {
  it.each([-1, 2.5, 2 ** 32, Number.NaN])('rejects %s in a u32 slot', (bad) => {
    const b = new Builder();
    b.startTable(1);
    expect(() => b.addUint32Field(0, bad, 0)).toThrow(BuilderError);
  });

  it('accepts both ends of the u32 range', () => {
    const b = new Builder();
    b.finish(writePair(b, 0xffffffff, 1));
    const { bb, pos } = rootOf(b.asUint8Array());
    expect(new Pair(bb, pos).first()).toBe(0xffffffff);
  });

  it('rejects values outside int32 and int8', () => {
    const b = new Builder();
    expect(() => b.addInt32(2 ** 31)).toThrow(BuilderError);
    expect(() => b.addInt32(-(2 ** 31) - 1)).toThrow(BuilderError);
    expect(() => b.addInt8(128)).toThrow(BuilderError);
    expect(() => b.addUint8(-1)).toThrow(BuilderError);
    expect(() => b.addInt16(0x8000)).toThrow(BuilderError);
  });

  it('rejects an out-of-range element while filling a vector', () => {
    expect(() => new Builder().createUint32Vector([1, -1])).toThrow(BuilderError);
    expect(() => new Builder().createInt32Vector([2 ** 31])).toThrow(BuilderError);
  });
});

// ─── Default elision ──────────────────────────────────────────────────────────

describe('Builder — default elision', () => {
  it('skips a scalar equal to its default unless forceDefaults is set', () => {
    const lean = new Builder();
    lean.finish(writePair(lean, 0, 7));
    const l = rootOf(lean.asUint8Array());
    const leanPair = new Pair(l.bb, l.pos);
    expect(leanPair.hasField(0)).toBe(false);
    expect(leanPair.first()).toBe(0);

    const full = new Builder({ forceDefaults: true });
    full.finish(writePair(full, 0, 7));
    const f = rootOf(full.asUint8Array());
    const fullPair = new Pair(f.bb, f.pos);
    expect(fullPair.hasField(0)).toBe(true);
    expect(fullPair.first()).toBe(0);
    expect(fullPair.second()).toBe(7);
  });

  it('treats -0 as the default 0', () => {
    const b = new Builder();
    b.startTable(1);
    b.addFloat32Field(0, -0, 0);
    b.finish(b.endTable());
    const { bb, pos } = rootOf(b.asUint8Array());
    expect(new Pair(bb, pos).hasField(0)).toBe(false);
  });
});
