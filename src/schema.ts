/**
 * graphbuf — graph schema vocabulary
 *
 * Enum and union tags of the model format, plus the plain-value types used by
 * encodeModel() / decodeModel(). The numeric values are part of the wire
 * format and must never be renumbered; new members are appended.
 *
 * Every union is modelled as `{ kind, value }`, where `kind` is the wire tag.
 * A NONE tag is represented by `null` at the field that holds the union.
 */

// ─── Enums ────────────────────────────────────────────────────────────────────

export const OperatorType = {
  Add:                0,
  BatchNormalization: 1,
  Clip:               2,
  Concat:             3,
  Conv2d:             4,
  ConvTranspose2d:    5,
  Gather:             6,
  Gemm:               7,
  GlobalAveragePool:  8,
  LeakyRelu:          9,
  MatMul:             10,
  MaxPool2d:          11,
  Mul:                12,
  Pad2d:              13,
  Relu:               14,
  Reshape:            15,
  Shape:              16,
  Sigmoid:            17,
  Slice:              18,
  Unsqueeze:          19,
} as const;
export type OperatorType = (typeof OperatorType)[keyof typeof OperatorType];

export const PadMode = {
  Same:  0,
  Fixed: 1,
} as const;
export type PadMode = (typeof PadMode)[keyof typeof PadMode];

// ─── Union tags ───────────────────────────────────────────────────────────────

export const OperatorAttrs = {
  NONE:                    0,
  BatchNormalizationAttrs: 1,
  ClipAttrs:               2,
  ConcatAttrs:             3,
  Conv2dAttrs:             4,
  ConvTranspose2dAttrs:    5,
  GatherAttrs:             6,
  GemmAttrs:               7,
  LeakyReluAttrs:          8,
  MaxPool2dAttrs:          9,
  Pad2dAttrs:              10,
  UnsqueezeAttrs:          11,
} as const;
export type OperatorAttrs = (typeof OperatorAttrs)[keyof typeof OperatorAttrs];

export const NodeKind = {
  NONE:         0,
  OperatorNode: 1,
  ConstantNode: 2,
  ValueNode:    3,
} as const;
export type NodeKind = (typeof NodeKind)[keyof typeof NodeKind];

export const ConstantData = {
  NONE:      0,
  FloatData: 1,
  IntData:   2,
} as const;
export type ConstantData = (typeof ConstantData)[keyof typeof ConstantData];

// ─── Guards ───────────────────────────────────────────────────────────────────

function memberOf<T extends number>(values: Readonly<Record<string, T>>): (tag: number) => tag is T {
  const set = new Set<number>(Object.values(values));
  return (tag: number): tag is T => set.has(tag);
}

export const isOperatorType  = memberOf<OperatorType>(OperatorType);
export const isPadMode       = memberOf<PadMode>(PadMode);
export const isOperatorAttrs = memberOf<OperatorAttrs>(OperatorAttrs);
export const isNodeKind      = memberOf<NodeKind>(NodeKind);
export const isConstantData  = memberOf<ConstantData>(ConstantData);

const OPERATOR_TYPE_NAMES: readonly (keyof typeof OperatorType)[] = [
  'Add', 'BatchNormalization', 'Clip', 'Concat', 'Conv2d', 'ConvTranspose2d',
  'Gather', 'Gemm', 'GlobalAveragePool', 'LeakyRelu', 'MatMul', 'MaxPool2d',
  'Mul', 'Pad2d', 'Relu', 'Reshape', 'Shape', 'Sigmoid', 'Slice', 'Unsqueeze',
];

/** Reverse lookup for log lines and error messages: 10 → 'MatMul'. */
export function operatorTypeName(type: OperatorType): keyof typeof OperatorType {
  const name = OPERATOR_TYPE_NAMES[type];
  if (name === undefined) throw new RangeError(`Unknown OperatorType ${type}.`);
  return name;
}

// ─── Attribute records ────────────────────────────────────────────────────────

export interface BatchNormalizationAttrsFields {
  epsilon: number;
}

export interface ClipAttrsFields {
  min: number;
  max: number;
}

export interface ConcatAttrsFields {
  dim: number;
}

export interface Conv2dAttrsFields {
  padMode:       PadMode;
  padHorizontal: number;
  padVertical:   number;
  groups:        number;
  stride:        number;
}

export interface ConvTranspose2dAttrsFields {
  stride: number;
}

export interface GatherAttrsFields {
  axis: number;
}

export interface GemmAttrsFields {
  alpha:      number;
  beta:       number;
  transposeA: boolean;
  transposeB: boolean;
}

export interface LeakyReluAttrsFields {
  alpha: number;
}

export interface MaxPool2dAttrsFields {
  kernelSize:    number;
  padMode:       PadMode;
  padHorizontal: number;
  padVertical:   number;
  stride:        number;
}

export interface Pad2dAttrsFields {
  padLeft:   number;
  padRight:  number;
  padTop:    number;
  padBottom: number;
}

export interface UnsqueezeAttrsFields {
  /** null when the vector is absent; [] when present but empty. */
  axes: number[] | null;
}

/** Attribute record type carried by each OperatorAttrs tag. */
export interface AttrsFieldMap {
  [OperatorAttrs.BatchNormalizationAttrs]: BatchNormalizationAttrsFields;
  [OperatorAttrs.ClipAttrs]:               ClipAttrsFields;
  [OperatorAttrs.ConcatAttrs]:             ConcatAttrsFields;
  [OperatorAttrs.Conv2dAttrs]:             Conv2dAttrsFields;
  [OperatorAttrs.ConvTranspose2dAttrs]:    ConvTranspose2dAttrsFields;
  [OperatorAttrs.GatherAttrs]:             GatherAttrsFields;
  [OperatorAttrs.GemmAttrs]:               GemmAttrsFields;
  [OperatorAttrs.LeakyReluAttrs]:          LeakyReluAttrsFields;
  [OperatorAttrs.MaxPool2dAttrs]:          MaxPool2dAttrsFields;
  [OperatorAttrs.Pad2dAttrs]:              Pad2dAttrsFields;
  [OperatorAttrs.UnsqueezeAttrs]:          UnsqueezeAttrsFields;
}

export type AttrsKind = keyof AttrsFieldMap;

/** Decoded attributes: every field present, absent ones at their defaults. */
export type OperatorAttrsValue = {
  [K in AttrsKind]: { kind: K; value: AttrsFieldMap[K] };
}[AttrsKind];

/** Attributes accepted by the encoder: omitted fields take their defaults. */
export type OperatorAttrsInput = {
  [K in AttrsKind]: { kind: K; value: Partial<AttrsFieldMap[K]> };
}[AttrsKind];

// ─── Constant payloads ────────────────────────────────────────────────────────

export interface TensorDataFields {
  /** Flat, row-major elements. null when the vector is absent. */
  data: number[] | null;
}

export type ConstantDataValue =
  | { kind: typeof ConstantData.FloatData; value: TensorDataFields }
  | { kind: typeof ConstantData.IntData;   value: TensorDataFields };

// ─── Nodes ────────────────────────────────────────────────────────────────────

export interface OperatorNodeValue<A = OperatorAttrsValue> {
  type:   OperatorType;
  attrs:  A | null;
  /** Indices into the graph's node list. Resolved by the consumer, not by the format. */
  inputs: number[] | null;
}

export interface ConstantNodeValue {
  /** Dimension sizes; [] is a scalar. */
  shape: number[] | null;
  data:  ConstantDataValue | null;
}

/** ValueNode has no fields of its own. */
export type ValueNodeValue = Record<string, never>;

export type NodeDataValue<A = OperatorAttrsValue> =
  | { kind: typeof NodeKind.OperatorNode; value: OperatorNodeValue<A> }
  | { kind: typeof NodeKind.ConstantNode; value: ConstantNodeValue }
  | { kind: typeof NodeKind.ValueNode;    value: ValueNodeValue };

export interface NodeValue<A = OperatorAttrsValue> {
  id:   string | null;
  data: NodeDataValue<A> | null;
}

export interface GraphValue<A = OperatorAttrsValue> {
  /** In evaluation order. null when the vector is absent. */
  nodes: NodeValue<A>[] | null;
}

export interface ModelValue<A = OperatorAttrsValue> {
  schemaVersion: number;
  graph:         GraphValue<A> | null;
}

/** Shape of a model as accepted by encodeModel(). */
export type ModelInput = ModelValue<OperatorAttrsInput>;
