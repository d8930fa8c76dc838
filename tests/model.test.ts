/**
 * graphbuf — Model root access and whole-model codec
 */

import { describe, it, expect } from 'vitest';
import { pino } from 'pino';
import {
  Builder,
  BuilderError,
  ConstantData,
  FormatIdentifierError,
  MalformedBufferError,
  NodeKind,
  OperatorAttrs,
  OperatorType,
  PadMode,
  SchemaVersionError,
  createModel,
  decodeModel,
  encodeModel,
  modelBufferHasIdentifier,
  readModel,
} from '../src/index';
import type { Graph, Logger, ModelInput, ModelValue, NodeValue, OperatorAttrsValue } from '../src/index';

// ─── Shared helpers ────────────────────────────────────────────────────────────

/** x → w → y = MatMul(x, w) */
function matMulModel(): ModelValue {
  return {
    schemaVersion: 1,
    graph: {
      nodes: [
        { id: 'x', data: { kind: NodeKind.ValueNode, value: {} } },
        {
          id: 'w',
          data: {
            kind:  NodeKind.ConstantNode,
            value: { shape: [2, 2], data: { kind: ConstantData.FloatData, value: { data: [1, 2, 3, 4] } } },
          },
        },
        {
          id: 'y',
          data: { kind: NodeKind.OperatorNode, value: { type: OperatorType.MatMul, attrs: null, inputs: [0, 1] } },
        },
      ],
    },
  };
}

function opNode(type: OperatorType, attrs: OperatorAttrsValue): NodeValue {
  return { id: null, data: { kind: NodeKind.OperatorNode, value: { type, attrs, inputs: [] } } };
}

function captureLogs(level: string): { logger: Logger; lines: Record<string, unknown>[] } {
  const lines: Record<string, unknown>[] = [];
  const logger = pino({ level }, {
    write(msg: string) {
      const record: Record<string, unknown> = JSON.parse(msg);
      lines.push(record);
    },
  });
  return { logger, lines };
}

function graphOf(bytes: Uint8Array): Graph {
  const graph = readModel(bytes).graph();
  if (graph === null) throw new Error('model has no graph');
  return graph;
}

// ─── Round trip ───────────────────────────────────────────────────────────────

describe('encodeModel / decodeModel', () => {
  it('round-trips a three-node graph', () => {
    const model = matMulModel();
    expect(decodeModel(encodeModel(model))).toEqual(model);
  });

  it('fills omitted attribute fields with their defaults', () => {
    const input: ModelInput = {
      schemaVersion: 1,
      graph: {
        nodes: [
          { id: 'in', data: { kind: NodeKind.ValueNode, value: {} } },
          {
            id:   'conv',
            data: {
              kind:  NodeKind.OperatorNode,
              value: {
                type:   OperatorType.Conv2d,
                attrs:  { kind: OperatorAttrs.Conv2dAttrs, value: { stride: 2 } },
                inputs: [0],
              },
            },
          },
        ],
      },
    };

    const decoded = decodeModel(encodeModel(input));
    expect(decoded.graph?.nodes?.[1]?.data).toEqual({
      kind:  NodeKind.OperatorNode,
      value: {
        type:   OperatorType.Conv2d,
        attrs:  {
          kind:  OperatorAttrs.Conv2dAttrs,
          value: { padMode: PadMode.Same, padHorizontal: 0, padVertical: 0, groups: 0, stride: 2 },
        },
        inputs: [0],
      },
    });
  });

  it('round-trips every attribute record', () => {
    const model: ModelValue = {
      schemaVersion: 1,
      graph: {
        nodes: [
          opNode(OperatorType.BatchNormalization, { kind: OperatorAttrs.BatchNormalizationAttrs, value: { epsilon: 0.25 } }),
          opNode(OperatorType.Clip,               { kind: OperatorAttrs.ClipAttrs, value: { min: -1, max: 6 } }),
          opNode(OperatorType.Concat,             { kind: OperatorAttrs.ConcatAttrs, value: { dim: 1 } }),
          opNode(OperatorType.ConvTranspose2d,    { kind: OperatorAttrs.ConvTranspose2dAttrs, value: { stride: 2 } }),
          opNode(OperatorType.Gather,             { kind: OperatorAttrs.GatherAttrs, value: { axis: 2 } }),
          opNode(OperatorType.Gemm,               { kind: OperatorAttrs.GemmAttrs, value: { alpha: 0.5, beta: 1, transposeA: false, transposeB: true } }),
          opNode(OperatorType.LeakyRelu,          { kind: OperatorAttrs.LeakyReluAttrs, value: { alpha: 0.125 } }),
          opNode(OperatorType.MaxPool2d,          {
            kind:  OperatorAttrs.MaxPool2dAttrs,
            value: { kernelSize: 3, padMode: PadMode.Fixed, padHorizontal: 1, padVertical: 0, stride: 2 },
          }),
          opNode(OperatorType.Pad2d,              { kind: OperatorAttrs.Pad2dAttrs, value: { padLeft: 1, padRight: 2, padTop: 3, padBottom: 4 } }),
          opNode(OperatorType.Unsqueeze,          { kind: OperatorAttrs.UnsqueezeAttrs, value: { axes: [0, 2] } }),
        ],
      },
    };
    expect(decodeModel(encodeModel(model))).toEqual(model);
  });

  it('encodes int constants and scalar shapes', () => {
    const model: ModelValue = {
      schemaVersion: 1,
      graph: {
        nodes: [
          {
            id:   'k',
            data: { kind: NodeKind.ConstantNode, value: { shape: [], data: { kind: ConstantData.IntData, value: { data: [-7] } } } },
          },
        ],
      },
    };
    expect(decodeModel(encodeModel(model))).toEqual(model);
  });

  it('decodes the same value with and without forced defaults', () => {
    const model  = matMulModel();
    const lean   = encodeModel(model);
    const forced = encodeModel(model, { forceDefaults: true });
    expect(forced.length).toBeGreaterThanOrEqual(lean.length);
    expect(decodeModel(forced)).toEqual(decodeModel(lean));
  });

  it('keeps an absent graph distinct from an empty one', () => {
    expect(decodeModel(encodeModel({ schemaVersion: 1, graph: null }))).toEqual({ schemaVersion: 1, graph: null });
    expect(decodeModel(encodeModel({ schemaVersion: 1, graph: { nodes: [] } }))).toEqual({
      schemaVersion: 1,
      graph:         { nodes: [] },
    });
  });
});

// ─── Lazy access ──────────────────────────────────────────────────────────────

describe('readModel — lazy access', () => {
  it('resolves nodes, unions and vectors on demand', () => {
    const bytes = encodeModel(matMulModel());
    const graph = graphOf(bytes);
    expect(graph.nodesLength()).toBe(3);

    const y = graph.nodes(2);
    expect(y.id()).toBe('y');
    const data = y.data();
    expect(data?.kind).toBe(NodeKind.OperatorNode);
    if (data?.kind === NodeKind.OperatorNode) {
      expect(data.value.type()).toBe(OperatorType.MatMul);
      expect(data.value.inputsLength()).toBe(2);
      expect(data.value.inputs(1)).toBe(1);
      expect(data.value.attrs()).toBeNull();
    }

    const w = graph.nodes(1).data();
    if (w?.kind === NodeKind.ConstantNode) {
      expect(w.value.shapeArray()).toEqual([2, 2]);
      const payload = w.value.data();
      expect(payload?.kind).toBe(ConstantData.FloatData);
      if (payload?.kind === ConstantData.FloatData) {
        expect(payload.value.data(3)).toBe(4);
      }
    } else {
      throw new Error('node 1 should be a constant');
    }
  });

  it('throws RangeError for a node index outside the vector', () => {
    const graph = graphOf(encodeModel(matMulModel()));
    expect(() => graph.nodes(3)).toThrow(RangeError);
    expect(() => graph.nodes(-1)).toThrow(RangeError);
  });

  it('writes the MODL identifier after the root offset', () => {
    const bytes = encodeModel(matMulModel());
    expect(modelBufferHasIdentifier(bytes)).toBe(true);
    expect(new TextDecoder().decode(bytes.subarray(4, 8))).toBe('MODL');
  });
});

describe('readModel — typed-array views', () => {
  it('aliases aligned vectors without copying', () => {
    const bytes = encodeModel(matMulModel());
    const graph = graphOf(bytes);

    const w = graph.nodes(1).data();
    if (w?.kind !== NodeKind.ConstantNode) throw new Error('node 1 should be a constant');
    const shape = w.value.shapeAsUint32Array();
    expect(shape).toEqual(new Uint32Array([2, 2]));
    expect(shape?.buffer).toBe(bytes.buffer);

    const payload = w.value.data();
    if (payload?.kind !== ConstantData.FloatData) throw new Error('node 1 should carry float data');
    const floats = payload.value.dataAsFloat32Array();
    expect(floats).toEqual(new Float32Array([1, 2, 3, 4]));
    expect(floats?.buffer).toBe(bytes.buffer);

    const y = graph.nodes(2).data();
    if (y?.kind !== NodeKind.OperatorNode) throw new Error('node 2 should be an operator');
    expect(y.value.inputsAsUint32Array()).toEqual(new Uint32Array([0, 1]));
  });

  it('copies vectors that sit at an unaligned address', () => {
    const bytes   = encodeModel(matMulModel());
    const backing = new Uint8Array(bytes.length + 1);
    backing.set(bytes, 1);
    const shifted = backing.subarray(1);

    const w = graphOf(shifted).nodes(1).data();
    if (w?.kind !== NodeKind.ConstantNode) throw new Error('node 1 should be a constant');
    const payload = w.value.data();
    if (payload?.kind !== ConstantData.FloatData) throw new Error('node 1 should carry float data');

    const floats = payload.value.dataAsFloat32Array();
    expect(floats).toEqual(new Float32Array([1, 2, 3, 4]));
    expect(floats?.buffer).not.toBe(backing.buffer);
  });

  it('returns null for an absent vector', () => {
    const graph = graphOf(encodeModel({
      schemaVersion: 1,
      graph: { nodes: [{ id: null, data: { kind: NodeKind.OperatorNode, value: { type: OperatorType.Relu, attrs: null, inputs: null } } }] },
    }));
    const op = graph.nodes(0).data();
    if (op?.kind !== NodeKind.OperatorNode) throw new Error('node 0 should be an operator');
    expect(op.value.inputsAsUint32Array()).toBeNull();
  });
});

describe('encodeModel — integer ranges', () => {
  it('rejects a negative input index', () => {
    const model = matMulModel();
    const nodes = model.graph?.nodes ?? [];
    nodes[2] = { id: 'y', data: { kind: NodeKind.OperatorNode, value: { type: OperatorType.MatMul, attrs: null, inputs: [-1, 1] } } };
    expect(() => encodeModel(model)).toThrow(BuilderError);
  });

  it('rejects a fractional shape and a schema version past int32', () => {
    const fractional: ModelValue = {
      schemaVersion: 1,
      graph: { nodes: [{ id: null, data: { kind: NodeKind.ConstantNode, value: { shape: [2.5], data: null } } }] },
    };
    expect(() => encodeModel(fractional)).toThrow(BuilderError);
    expect(() => encodeModel({ schemaVersion: 2 ** 31, graph: null })).toThrow(BuilderError);
  });
});

// ─── Strictness ───────────────────────────────────────────────────────────────

describe('readModel — strictness', () => {
  it('warns and carries on when a lenient reader meets another schema version', () => {
    const { logger, lines } = captureLogs('warn');
    const model = readModel(encodeModel({ schemaVersion: 2, graph: null }), { logger });

    expect(model.schemaVersion()).toBe(2);
    expect(model.graph()).toBeNull();
    expect(lines).toHaveLength(1);
    expect(lines[0]?.['msg']).toBe('schema version mismatch; reading known fields only');
    expect(lines[0]?.['schemaVersion']).toBe(2);
    expect(lines[0]?.['expected']).toBe(1);
    expect(lines[0]?.['component']).toBe('reader');
  });

  it('refuses another schema version in strict mode', () => {
    const bytes = encodeModel({ schemaVersion: 2, graph: null });
    expect(() => readModel(bytes, { strict: true })).toThrow(SchemaVersionError);
    try {
      readModel(bytes, { strict: true });
    } catch (err) {
      expect(err).toBeInstanceOf(SchemaVersionError);
      if (err instanceof SchemaVersionError) {
        expect(err.expected).toBe(1);
        expect(err.actual).toBe(2);
      }
    }
    expect(readModel(bytes, { strict: true, expectedSchemaVersion: 2 }).schemaVersion()).toBe(2);
  });

  it('ignores the identifier when lenient and requires it when strict', () => {
    const b = new Builder();
    b.finish(createModel(b, { schemaVersion: 1, graph: null }));
    const bytes = b.asUint8Array();

    expect(modelBufferHasIdentifier(bytes)).toBe(false);
    expect(readModel(bytes).schemaVersion()).toBe(1);
    expect(() => readModel(bytes, { strict: true })).toThrow(FormatIdentifierError);
  });

  it('reports the identifier it found when strict mode expects another', () => {
    const bytes = encodeModel(matMulModel());
    try {
      readModel(bytes, { strict: true, identifier: 'XXXX' });
      throw new Error('expected FormatIdentifierError');
    } catch (err) {
      expect(err).toBeInstanceOf(FormatIdentifierError);
      if (err instanceof FormatIdentifierError) {
        expect(err.expected).toBe('XXXX');
        expect(err.actual).toBe('MODL');
      }
    }
  });

  it('throws MalformedBufferError for a truncated or empty buffer', () => {
    const bytes = encodeModel(matMulModel());
    expect(() => readModel(bytes.subarray(0, 6))).toThrow(MalformedBufferError);
    expect(() => readModel(new Uint8Array(0))).toThrow(MalformedBufferError);
  });
});

// ─── Size prefix ──────────────────────────────────────────────────────────────

describe('Size-prefixed buffers', () => {
  it('records the length of everything after the prefix', () => {
    const bytes = encodeModel(matMulModel(), { sizePrefix: true });
    const view  = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    expect(view.getUint32(0, true)).toBe(bytes.length - 4);
    expect(modelBufferHasIdentifier(bytes, true)).toBe(true);
    expect(decodeModel(bytes, { sizePrefixed: true, strict: true })).toEqual(matMulModel());
  });

  it('ignores bytes past the declared size', () => {
    const bytes  = encodeModel(matMulModel(), { sizePrefix: true });
    const padded = new Uint8Array(bytes.length + 3);
    padded.set(bytes);
    padded.set([1, 2, 3], bytes.length);
    expect(decodeModel(padded, { sizePrefixed: true })).toEqual(matMulModel());
  });

  it('refuses a prefix larger than the bytes that follow it', () => {
    const bytes = encodeModel(matMulModel(), { sizePrefix: true });
    expect(() => readModel(bytes.subarray(0, bytes.length - 4), { sizePrefixed: true })).toThrow(MalformedBufferError);
  });
});
