/**
 * graphbuf — node tables
 *
 *   Node          0 id string · 1 dataType u8 (NodeKind) · 2 data union
 *   OperatorNode  0 type i8 (OperatorType) · 1 attrsType u8 · 2 attrs union · 3 inputs [u32]
 *   ConstantNode  0 shape [u32] · 1 dataType u8 (ConstantData) · 2 data union
 *   FloatData     0 data [f32]
 *   IntData       0 data [i32]
 *   ValueNode     (no fields)
 */

import type { Builder, Offset } from './builder';
import { SIZEOF_INT } from './constants';
import { Table, unknownTag } from './table';
import { attrsView, createAttrs, unpackAttrs, type OperatorAttrsView } from './attrs';
import {
  ConstantData,
  NodeKind,
  OperatorAttrs,
  OperatorType,
  isOperatorType,
  type ConstantDataValue,
  type ConstantNodeValue,
  type NodeDataValue,
  type NodeValue,
  type OperatorAttrsInput,
  type OperatorNodeValue,
  type TensorDataFields,
} from './schema';

// ─── Constant payloads ────────────────────────────────────────────────────────

export class FloatData extends Table {
  dataLength(): number { return this.vectorLength(0, SIZEOF_INT); }

  data(index: number): number {
    return this.bb.readFloat32(this.vectorElementPos(0, index, SIZEOF_INT));
  }

  dataArray(): number[] | null { return this.float32VectorArray(0); }

  /** Elements as a Float32Array over the buffer itself when aligned; a copy otherwise. */
  dataAsFloat32Array(): Float32Array | null { return this.float32VectorView(0); }

  unpack(): TensorDataFields {
    return { data: this.dataArray() };
  }
}

export class IntData extends Table {
  dataLength(): number { return this.vectorLength(0, SIZEOF_INT); }

  data(index: number): number {
    return this.bb.readInt32(this.vectorElementPos(0, index, SIZEOF_INT));
  }

  dataArray(): number[] | null { return this.int32VectorArray(0); }

  /** Elements as an Int32Array over the buffer itself when aligned; a copy otherwise. */
  dataAsInt32Array(): Int32Array | null { return this.int32VectorView(0); }

  unpack(): TensorDataFields {
    return { data: this.dataArray() };
  }
}

export type ConstantDataView =
  | { kind: typeof ConstantData.FloatData; value: FloatData }
  | { kind: typeof ConstantData.IntData;   value: IntData };

// ─── OperatorNode ─────────────────────────────────────────────────────────────

export class OperatorNode extends Table {
  /** @throws MalformedBufferError for a value outside OperatorType. */
  type(): OperatorType {
    const raw = this.int8Field(0, OperatorType.Add);
    if (!isOperatorType(raw)) throw unknownTag('OperatorType', raw, this);
    return raw;
  }

  /** Raw union tag; 0 (NONE) for operators without parameters. */
  attrsType(): number { return this.uint8Field(1, OperatorAttrs.NONE); }

  attrs(): OperatorAttrsView | null {
    const union = this.unionField(1);
    return union === null ? null : attrsView(this, union);
  }

  inputsLength(): number { return this.vectorLength(3, SIZEOF_INT); }

  inputs(index: number): number {
    return this.bb.readUint32(this.vectorElementPos(3, index, SIZEOF_INT));
  }

  inputsArray(): number[] | null { return this.uint32VectorArray(3); }

  inputsAsUint32Array(): Uint32Array | null { return this.uint32VectorView(3); }

  unpack(): OperatorNodeValue {
    const attrs = this.attrs();
    return {
      type:   this.type(),
      attrs:  attrs === null ? null : unpackAttrs(attrs),
      inputs: this.inputsArray(),
    };
  }
}

// ─── ConstantNode ─────────────────────────────────────────────────────────────

export class ConstantNode extends Table {
  shapeLength(): number { return this.vectorLength(0, SIZEOF_INT); }

  shape(index: number): number {
    return this.bb.readUint32(this.vectorElementPos(0, index, SIZEOF_INT));
  }

  shapeArray(): number[] | null { return this.uint32VectorArray(0); }

  shapeAsUint32Array(): Uint32Array | null { return this.uint32VectorView(0); }

  /** Raw union tag. */
  dataType(): number { return this.uint8Field(1, ConstantData.NONE); }

  /** @throws MalformedBufferError for a tag outside ConstantData. */
  data(): ConstantDataView | null {
    const union = this.unionField(1);
    if (union === null) return null;
    switch (union.tag) {
      case ConstantData.FloatData:
        return { kind: ConstantData.FloatData, value: new FloatData(this.bb, union.pos) };
      case ConstantData.IntData:
        return { kind: ConstantData.IntData, value: new IntData(this.bb, union.pos) };
      default:
        throw unknownTag('ConstantData', union.tag, this);
    }
  }

  unpack(): ConstantNodeValue {
    const data = this.data();
    let value: ConstantDataValue | null = null;
    if (data !== null) {
      value = data.kind === ConstantData.FloatData
        ? { kind: ConstantData.FloatData, value: data.value.unpack() }
        : { kind: ConstantData.IntData,   value: data.value.unpack() };
    }
    return { shape: this.shapeArray(), data: value };
  }
}

// ─── ValueNode ────────────────────────────────────────────────────────────────

export class ValueNode extends Table {}

// ─── Node ─────────────────────────────────────────────────────────────────────

export type NodeDataView =
  | { kind: typeof NodeKind.OperatorNode; value: OperatorNode }
  | { kind: typeof NodeKind.ConstantNode; value: ConstantNode }
  | { kind: typeof NodeKind.ValueNode;    value: ValueNode };

export class Node extends Table {
  id(): string | null { return this.stringField(0); }

  /** Raw union tag. */
  dataType(): number { return this.uint8Field(1, NodeKind.NONE); }

  /** @throws MalformedBufferError for a tag outside NodeKind. */
  data(): NodeDataView | null {
    const union = this.unionField(1);
    if (union === null) return null;
    switch (union.tag) {
      case NodeKind.OperatorNode:
        return { kind: NodeKind.OperatorNode, value: new OperatorNode(this.bb, union.pos) };
      case NodeKind.ConstantNode:
        return { kind: NodeKind.ConstantNode, value: new ConstantNode(this.bb, union.pos) };
      case NodeKind.ValueNode:
        return { kind: NodeKind.ValueNode, value: new ValueNode(this.bb, union.pos) };
      default:
        throw unknownTag('NodeKind', union.tag, this);
    }
  }

  unpack(): NodeValue {
    const data = this.data();
    let value: NodeDataValue | null = null;
    if (data !== null) {
      switch (data.kind) {
        case NodeKind.OperatorNode:
          value = { kind: NodeKind.OperatorNode, value: data.value.unpack() };
          break;
        case NodeKind.ConstantNode:
          value = { kind: NodeKind.ConstantNode, value: data.value.unpack() };
          break;
        case NodeKind.ValueNode:
          value = { kind: NodeKind.ValueNode, value: {} };
          break;
      }
    }
    return { id: this.id(), data: value };
  }
}

// ─── Builders ─────────────────────────────────────────────────────────────────

export function createFloatData(b: Builder, data: readonly number[] | null): Offset {
  const vec = data !== null ? b.createFloat32Vector(data) : 0;
  b.startTable(1);
  b.addOffsetField(0, vec);
  return b.endTable();
}

export function createIntData(b: Builder, data: readonly number[] | null): Offset {
  const vec = data !== null ? b.createInt32Vector(data) : 0;
  b.startTable(1);
  b.addOffsetField(0, vec);
  return b.endTable();
}

export function createOperatorNode(b: Builder, op: OperatorNodeValue<OperatorAttrsInput>): Offset {
  const inputs = op.inputs !== null ? b.createUint32Vector(op.inputs) : 0;
  const attrs  = op.attrs !== null ? createAttrs(b, op.attrs) : 0;

  b.startTable(4);
  b.addOffsetField(3, inputs);
  b.addOffsetField(2, attrs);
  b.addUint8Field(1, op.attrs !== null ? op.attrs.kind : OperatorAttrs.NONE, OperatorAttrs.NONE);
  b.addInt8Field(0, op.type, OperatorType.Add);
  return b.endTable();
}

export function createConstantNode(b: Builder, constant: ConstantNodeValue): Offset {
  const shape = constant.shape !== null ? b.createUint32Vector(constant.shape) : 0;
  let data = 0;
  if (constant.data !== null) {
    data = constant.data.kind === ConstantData.FloatData
      ? createFloatData(b, constant.data.value.data)
      : createIntData(b, constant.data.value.data);
  }

  b.startTable(3);
  b.addOffsetField(2, data);
  b.addUint8Field(1, constant.data !== null ? constant.data.kind : ConstantData.NONE, ConstantData.NONE);
  b.addOffsetField(0, shape);
  return b.endTable();
}

export function createValueNode(b: Builder): Offset {
  b.startTable(0);
  return b.endTable();
}

export function createNode(b: Builder, node: NodeValue<OperatorAttrsInput>): Offset {
  const id = node.id !== null ? b.createString(node.id) : 0;
  let data = 0;
  if (node.data !== null) {
    switch (node.data.kind) {
      case NodeKind.OperatorNode: data = createOperatorNode(b, node.data.value); break;
      case NodeKind.ConstantNode: data = createConstantNode(b, node.data.value); break;
      case NodeKind.ValueNode:    data = createValueNode(b); break;
    }
  }

  b.startTable(3);
  b.addOffsetField(2, data);
  b.addUint8Field(1, node.data !== null ? node.data.kind : NodeKind.NONE, NodeKind.NONE);
  b.addOffsetField(0, id);
  return b.endTable();
}
