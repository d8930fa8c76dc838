/**
 * graphbuf — operator attribute tables
 *
 * One view class and one create function per OperatorAttrs variant. Slots,
 * types and defaults:
 *
 *   BatchNormalizationAttrs  0 epsilon f32
 *   ClipAttrs                0 min f32 · 1 max f32
 *   ConcatAttrs              0 dim u32
 *   Conv2dAttrs              0 padMode i8 · 1 padHorizontal u32 · 2 padVertical u32 · 3 groups u32 · 4 stride u32
 *   ConvTranspose2dAttrs     0 stride u32
 *   GatherAttrs              0 axis u32
 *   GemmAttrs                0 alpha f32 · 1 beta f32 · 2 transposeA bool · 3 transposeB bool
 *   LeakyReluAttrs           0 alpha f32
 *   MaxPool2dAttrs           0 kernelSize u32 · 1 padMode i8 · 2 padHorizontal u32 · 3 padVertical u32 · 4 stride u32
 *   Pad2dAttrs               0 padLeft · 1 padRight · 2 padTop · 3 padBottom (u32)
 *   UnsqueezeAttrs           0 axes [u32]
 *
 * Every scalar defaults to 0 / false / PadMode.Same.
 */

import type { Builder, Offset } from './builder';
import type { ByteBuffer } from './byte-buffer';
import { SIZEOF_INT } from './constants';
import { Table, unknownTag, type UnionSlot } from './table';
import {
  OperatorAttrs,
  PadMode,
  isPadMode,
  type BatchNormalizationAttrsFields,
  type ClipAttrsFields,
  type ConcatAttrsFields,
  type Conv2dAttrsFields,
  type ConvTranspose2dAttrsFields,
  type GatherAttrsFields,
  type GemmAttrsFields,
  type LeakyReluAttrsFields,
  type MaxPool2dAttrsFields,
  type Pad2dAttrsFields,
  type UnsqueezeAttrsFields,
  type OperatorAttrsValue,
  type OperatorAttrsInput,
} from './schema';

function padModeField(table: Table, value: number): PadMode {
  if (!isPadMode(value)) throw unknownTag('PadMode', value, table);
  return value;
}

// ─── Views ────────────────────────────────────────────────────────────────────

export class BatchNormalizationAttrs extends Table {
  epsilon(): number { return this.float32Field(0, 0); }

  unpack(): BatchNormalizationAttrsFields {
    return { epsilon: this.epsilon() };
  }
}

export class ClipAttrs extends Table {
  min(): number { return this.float32Field(0, 0); }
  max(): number { return this.float32Field(1, 0); }

  unpack(): ClipAttrsFields {
    return { min: this.min(), max: this.max() };
  }
}

export class ConcatAttrs extends Table {
  dim(): number { return this.uint32Field(0, 0); }

  unpack(): ConcatAttrsFields {
    return { dim: this.dim() };
  }
}

export class Conv2dAttrs extends Table {
  padMode():       PadMode { return padModeField(this, this.int8Field(0, PadMode.Same)); }
  padHorizontal(): number  { return this.uint32Field(1, 0); }
  padVertical():   number  { return this.uint32Field(2, 0); }
  groups():        number  { return this.uint32Field(3, 0); }
  stride():        number  { return this.uint32Field(4, 0); }

  unpack(): Conv2dAttrsFields {
    return {
      padMode:       this.padMode(),
      padHorizontal: this.padHorizontal(),
      padVertical:   this.padVertical(),
      groups:        this.groups(),
      stride:        this.stride(),
    };
  }
}

export class ConvTranspose2dAttrs extends Table {
  stride(): number { return this.uint32Field(0, 0); }

  unpack(): ConvTranspose2dAttrsFields {
    return { stride: this.stride() };
  }
}

export class GatherAttrs extends Table {
  axis(): number { return this.uint32Field(0, 0); }

  unpack(): GatherAttrsFields {
    return { axis: this.axis() };
  }
}

export class GemmAttrs extends Table {
  alpha():      number  { return this.float32Field(0, 0); }
  beta():       number  { return this.float32Field(1, 0); }
  transposeA(): boolean { return this.boolField(2, false); }
  transposeB(): boolean { return this.boolField(3, false); }

  unpack(): GemmAttrsFields {
    return {
      alpha:      this.alpha(),
      beta:       this.beta(),
      transposeA: this.transposeA(),
      transposeB: this.transposeB(),
    };
  }
}

export class LeakyReluAttrs extends Table {
  alpha(): number { return this.float32Field(0, 0); }

  unpack(): LeakyReluAttrsFields {
    return { alpha: this.alpha() };
  }
}

export class MaxPool2dAttrs extends Table {
  kernelSize():    number  { return this.uint32Field(0, 0); }
  padMode():       PadMode { return padModeField(this, this.int8Field(1, PadMode.Same)); }
  padHorizontal(): number  { return this.uint32Field(2, 0); }
  padVertical():   number  { return this.uint32Field(3, 0); }
  stride():        number  { return this.uint32Field(4, 0); }

  unpack(): MaxPool2dAttrsFields {
    return {
      kernelSize:    this.kernelSize(),
      padMode:       this.padMode(),
      padHorizontal: this.padHorizontal(),
      padVertical:   this.padVertical(),
      stride:        this.stride(),
    };
  }
}

export class Pad2dAttrs extends Table {
  padLeft():   number { return this.uint32Field(0, 0); }
  padRight():  number { return this.uint32Field(1, 0); }
  padTop():    number { return this.uint32Field(2, 0); }
  padBottom(): number { return this.uint32Field(3, 0); }

  unpack(): Pad2dAttrsFields {
    return {
      padLeft:   this.padLeft(),
      padRight:  this.padRight(),
      padTop:    this.padTop(),
      padBottom: this.padBottom(),
    };
  }
}

export class UnsqueezeAttrs extends Table {
  axesLength(): number { return this.vectorLength(0, SIZEOF_INT); }

  axes(index: number): number {
    return this.bb.readUint32(this.vectorElementPos(0, index, SIZEOF_INT));
  }

  axesArray(): number[] | null { return this.uint32VectorArray(0); }

  axesAsUint32Array(): Uint32Array | null { return this.uint32VectorView(0); }

  unpack(): UnsqueezeAttrsFields {
    return { axes: this.axesArray() };
  }
}

// ─── Union dispatch ───────────────────────────────────────────────────────────

export type OperatorAttrsView =
  | { kind: typeof OperatorAttrs.BatchNormalizationAttrs; value: BatchNormalizationAttrs }
  | { kind: typeof OperatorAttrs.ClipAttrs;               value: ClipAttrs }
  | { kind: typeof OperatorAttrs.ConcatAttrs;             value: ConcatAttrs }
  | { kind: typeof OperatorAttrs.Conv2dAttrs;             value: Conv2dAttrs }
  | { kind: typeof OperatorAttrs.ConvTranspose2dAttrs;    value: ConvTranspose2dAttrs }
  | { kind: typeof OperatorAttrs.GatherAttrs;             value: GatherAttrs }
  | { kind: typeof OperatorAttrs.GemmAttrs;               value: GemmAttrs }
  | { kind: typeof OperatorAttrs.LeakyReluAttrs;          value: LeakyReluAttrs }
  | { kind: typeof OperatorAttrs.MaxPool2dAttrs;          value: MaxPool2dAttrs }
  | { kind: typeof OperatorAttrs.Pad2dAttrs;              value: Pad2dAttrs }
  | { kind: typeof OperatorAttrs.UnsqueezeAttrs;          value: UnsqueezeAttrs };

/**
 * Wrap the variant table selected by `union.tag`.
 * @throws MalformedBufferError for a tag outside OperatorAttrs.
 */
export function attrsView(owner: Table, union: UnionSlot): OperatorAttrsView {
  const bb: ByteBuffer = owner.bb;
  const { pos } = union;
  switch (union.tag) {
    case OperatorAttrs.BatchNormalizationAttrs:
      return { kind: OperatorAttrs.BatchNormalizationAttrs, value: new BatchNormalizationAttrs(bb, pos) };
    case OperatorAttrs.ClipAttrs:
      return { kind: OperatorAttrs.ClipAttrs, value: new ClipAttrs(bb, pos) };
    case OperatorAttrs.ConcatAttrs:
      return { kind: OperatorAttrs.ConcatAttrs, value: new ConcatAttrs(bb, pos) };
    case OperatorAttrs.Conv2dAttrs:
      return { kind: OperatorAttrs.Conv2dAttrs, value: new Conv2dAttrs(bb, pos) };
    case OperatorAttrs.ConvTranspose2dAttrs:
      return { kind: OperatorAttrs.ConvTranspose2dAttrs, value: new ConvTranspose2dAttrs(bb, pos) };
    case OperatorAttrs.GatherAttrs:
      return { kind: OperatorAttrs.GatherAttrs, value: new GatherAttrs(bb, pos) };
    case OperatorAttrs.GemmAttrs:
      return { kind: OperatorAttrs.GemmAttrs, value: new GemmAttrs(bb, pos) };
    case OperatorAttrs.LeakyReluAttrs:
      return { kind: OperatorAttrs.LeakyReluAttrs, value: new LeakyReluAttrs(bb, pos) };
    case OperatorAttrs.MaxPool2dAttrs:
      return { kind: OperatorAttrs.MaxPool2dAttrs, value: new MaxPool2dAttrs(bb, pos) };
    case OperatorAttrs.Pad2dAttrs:
      return { kind: OperatorAttrs.Pad2dAttrs, value: new Pad2dAttrs(bb, pos) };
    case OperatorAttrs.UnsqueezeAttrs:
      return { kind: OperatorAttrs.UnsqueezeAttrs, value: new UnsqueezeAttrs(bb, pos) };
    default:
      throw unknownTag('OperatorAttrs', union.tag, owner);
  }
}

export function unpackAttrs(view: OperatorAttrsView): OperatorAttrsValue {
  switch (view.kind) {
    case OperatorAttrs.BatchNormalizationAttrs: return { kind: view.kind, value: view.value.unpack() };
    case OperatorAttrs.ClipAttrs:               return { kind: view.kind, value: view.value.unpack() };
    case OperatorAttrs.ConcatAttrs:             return { kind: view.kind, value: view.value.unpack() };
    case OperatorAttrs.Conv2dAttrs:             return { kind: view.kind, value: view.value.unpack() };
    case OperatorAttrs.ConvTranspose2dAttrs:    return { kind: view.kind, value: view.value.unpack() };
    case OperatorAttrs.GatherAttrs:             return { kind: view.kind, value: view.value.unpack() };
    case OperatorAttrs.GemmAttrs:               return { kind: view.kind, value: view.value.unpack() };
    case OperatorAttrs.LeakyReluAttrs:          return { kind: view.kind, value: view.value.unpack() };
    case OperatorAttrs.MaxPool2dAttrs:          return { kind: view.kind, value: view.value.unpack() };
    case OperatorAttrs.Pad2dAttrs:              return { kind: view.kind, value: view.value.unpack() };
    case OperatorAttrs.UnsqueezeAttrs:          return { kind: view.kind, value: view.value.unpack() };
  }
}

// ─── Builders ─────────────────────────────────────────────────────────────────
// Fields are added highest slot first; see Builder.beginField().

export function createBatchNormalizationAttrs(b: Builder, f: Partial<BatchNormalizationAttrsFields>): Offset {
  b.startTable(1);
  b.addFloat32Field(0, f.epsilon ?? 0, 0);
  return b.endTable();
}

export function createClipAttrs(b: Builder, f: Partial<ClipAttrsFields>): Offset {
  b.startTable(2);
  b.addFloat32Field(1, f.max ?? 0, 0);
  b.addFloat32Field(0, f.min ?? 0, 0);
  return b.endTable();
}

export function createConcatAttrs(b: Builder, f: Partial<ConcatAttrsFields>): Offset {
  b.startTable(1);
  b.addUint32Field(0, f.dim ?? 0, 0);
  return b.endTable();
}

export function createConv2dAttrs(b: Builder, f: Partial<Conv2dAttrsFields>): Offset {
  b.startTable(5);
  b.addUint32Field(4, f.stride ?? 0, 0);
  b.addUint32Field(3, f.groups ?? 0, 0);
  b.addUint32Field(2, f.padVertical ?? 0, 0);
  b.addUint32Field(1, f.padHorizontal ?? 0, 0);
  b.addInt8Field(0, f.padMode ?? PadMode.Same, PadMode.Same);
  return b.endTable();
}

export function createConvTranspose2dAttrs(b: Builder, f: Partial<ConvTranspose2dAttrsFields>): Offset {
  b.startTable(1);
  b.addUint32Field(0, f.stride ?? 0, 0);
  return b.endTable();
}

export function createGatherAttrs(b: Builder, f: Partial<GatherAttrsFields>): Offset {
  b.startTable(1);
  b.addUint32Field(0, f.axis ?? 0, 0);
  return b.endTable();
}

export function createGemmAttrs(b: Builder, f: Partial<GemmAttrsFields>): Offset {
  b.startTable(4);
  b.addBoolField(3, f.transposeB ?? false, false);
  b.addBoolField(2, f.transposeA ?? false, false);
  b.addFloat32Field(1, f.beta ?? 0, 0);
  b.addFloat32Field(0, f.alpha ?? 0, 0);
  return b.endTable();
}

export function createLeakyReluAttrs(b: Builder, f: Partial<LeakyReluAttrsFields>): Offset {
  b.startTable(1);
  b.addFloat32Field(0, f.alpha ?? 0, 0);
  return b.endTable();
}

export function createMaxPool2dAttrs(b: Builder, f: Partial<MaxPool2dAttrsFields>): Offset {
  b.startTable(5);
  b.addUint32Field(4, f.stride ?? 0, 0);
  b.addUint32Field(3, f.padVertical ?? 0, 0);
  b.addUint32Field(2, f.padHorizontal ?? 0, 0);
  b.addInt8Field(1, f.padMode ?? PadMode.Same, PadMode.Same);
  b.addUint32Field(0, f.kernelSize ?? 0, 0);
  return b.endTable();
}

export function createPad2dAttrs(b: Builder, f: Partial<Pad2dAttrsFields>): Offset {
  b.startTable(4);
  b.addUint32Field(3, f.padBottom ?? 0, 0);
  b.addUint32Field(2, f.padTop ?? 0, 0);
  b.addUint32Field(1, f.padRight ?? 0, 0);
  b.addUint32Field(0, f.padLeft ?? 0, 0);
  return b.endTable();
}

export function createUnsqueezeAttrs(b: Builder, f: Partial<UnsqueezeAttrsFields>): Offset {
  const axes = f.axes != null ? b.createUint32Vector(f.axes) : 0;
  b.startTable(1);
  b.addOffsetField(0, axes);
  return b.endTable();
}

/** Write the attribute table for `attrs`; the caller stores `attrs.kind` as the union tag. */
export function createAttrs(b: Builder, attrs: OperatorAttrsInput): Offset {
  switch (attrs.kind) {
    case OperatorAttrs.BatchNormalizationAttrs: return createBatchNormalizationAttrs(b, attrs.value);
    case OperatorAttrs.ClipAttrs:               return createClipAttrs(b, attrs.value);
    case OperatorAttrs.ConcatAttrs:             return createConcatAttrs(b, attrs.value);
    case OperatorAttrs.Conv2dAttrs:             return createConv2dAttrs(b, attrs.value);
    case OperatorAttrs.ConvTranspose2dAttrs:    return createConvTranspose2dAttrs(b, attrs.value);
    case OperatorAttrs.GatherAttrs:             return createGatherAttrs(b, attrs.value);
    case OperatorAttrs.GemmAttrs:               return createGemmAttrs(b, attrs.value);
    case OperatorAttrs.LeakyReluAttrs:          return createLeakyReluAttrs(b, attrs.value);
    case OperatorAttrs.MaxPool2dAttrs:          return createMaxPool2dAttrs(b, attrs.value);
    case OperatorAttrs.Pad2dAttrs:              return createPad2dAttrs(b, attrs.value);
    case OperatorAttrs.UnsqueezeAttrs:          return createUnsqueezeAttrs(b, attrs.value);
  }
}
