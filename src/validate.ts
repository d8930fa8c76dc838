/**
 * graphbuf — producer-invariant checks
 *
 * The encoding cannot see these: each needs the whole graph in hand. The
 * reader never runs them implicitly. Call validateModel() (or decode with
 * `validate: true`) where a consumer depends on them.
 */

import {
  ConstantData,
  NodeKind,
  OperatorAttrs,
  OperatorType,
  operatorTypeName,
  type AttrsKind,
  type ModelValue,
  type NodeValue,
} from './schema';

export type ModelIssueCode =
  | 'duplicate-id'
  | 'dangling-input'
  | 'self-input'
  | 'forward-input'
  | 'input-kind'
  | 'shape-mismatch'
  | 'attrs-mismatch';

export interface ModelIssue {
  readonly code:      ModelIssueCode;
  /** Index of the offending node in the graph's node list. */
  readonly nodeIndex: number;
  readonly message:   string;
}

export class ModelValidationError extends Error {
  constructor(readonly issues: readonly ModelIssue[]) {
    super(
      `Model violates ${issues.length} producer invariant(s): ` +
      issues.map((i) => `[${i.code}] ${i.message}`).join('; '),
    );
    this.name = 'ModelValidationError';
  }
}

/** The only attribute record each parameterised operator accepts. */
const ATTRS_FOR_OPERATOR: ReadonlyMap<OperatorType, AttrsKind> = new Map<OperatorType, AttrsKind>([
  [OperatorType.BatchNormalization, OperatorAttrs.BatchNormalizationAttrs],
  [OperatorType.Clip,               OperatorAttrs.ClipAttrs],
  [OperatorType.Concat,             OperatorAttrs.ConcatAttrs],
  [OperatorType.Conv2d,             OperatorAttrs.Conv2dAttrs],
  [OperatorType.ConvTranspose2d,    OperatorAttrs.ConvTranspose2dAttrs],
  [OperatorType.Gather,             OperatorAttrs.GatherAttrs],
  [OperatorType.Gemm,               OperatorAttrs.GemmAttrs],
  [OperatorType.LeakyRelu,          OperatorAttrs.LeakyReluAttrs],
  [OperatorType.MaxPool2d,          OperatorAttrs.MaxPool2dAttrs],
  [OperatorType.Pad2d,              OperatorAttrs.Pad2dAttrs],
  [OperatorType.Unsqueeze,          OperatorAttrs.UnsqueezeAttrs],
]);

/** Product of the dimensions; 1 for a scalar (empty shape). */
export function elementCount(shape: readonly number[]): number {
  return shape.reduce((acc, d) => acc * d, 1);
}

function checkNode(node: NodeValue, index: number, nodes: readonly NodeValue[], issues: ModelIssue[]): void {
  const data = node.data;
  if (data === null) return;

  if (data.kind === NodeKind.ConstantNode) {
    const payload = data.value.data;
    if (payload === null) return;
    const expected = elementCount(data.value.shape ?? []);
    const actual   = payload.value.data?.length ?? 0;
    if (expected !== actual) {
      const kind = payload.kind === ConstantData.FloatData ? 'float' : 'int';
      issues.push({
        code:      'shape-mismatch',
        nodeIndex: index,
        message:   `node ${index}: ${kind} data has ${actual} element(s), shape [${(data.value.shape ?? []).join(', ')}] needs ${expected}`,
      });
    }
    return;
  }

  if (data.kind !== NodeKind.OperatorNode) return;
  const op = data.value;

  if (op.attrs !== null) {
    const allowed = ATTRS_FOR_OPERATOR.get(op.type);
    if (allowed !== op.attrs.kind) {
      issues.push({
        code:      'attrs-mismatch',
        nodeIndex: index,
        message:   `node ${index}: ${operatorTypeName(op.type)} does not take attribute record ${op.attrs.kind}`,
      });
    }
  }

  for (const input of op.inputs ?? []) {
    const source = nodes[input];
    if (input >= nodes.length || source === undefined) {
      issues.push({
        code:      'dangling-input',
        nodeIndex: index,
        message:   `node ${index}: input ${input} is outside the graph's ${nodes.length} node(s)`,
      });
    } else if (input === index) {
      issues.push({ code: 'self-input', nodeIndex: index, message: `node ${index}: consumes its own output` });
    } else if (input > index) {
      issues.push({
        code:      'forward-input',
        nodeIndex: index,
        message:   `node ${index}: input ${input} comes later in evaluation order`,
      });
    } else if (source.data === null) {
      issues.push({
        code:      'input-kind',
        nodeIndex: index,
        message:   `node ${index}: input ${input} has no payload to consume`,
      });
    }
  }
}

/** Every producer-invariant violation in `model`, in node order. Empty when valid. */
export function validateModel(model: ModelValue): ModelIssue[] {
  const issues: ModelIssue[] = [];
  const nodes = model.graph?.nodes ?? [];

  const seen = new Map<string, number>();
  nodes.forEach((node, index) => {
    if (node.id !== null) {
      const first = seen.get(node.id);
      if (first !== undefined) {
        issues.push({
          code:      'duplicate-id',
          nodeIndex: index,
          message:   `node ${index}: id '${node.id}' already used by node ${first}`,
        });
      } else {
        seen.set(node.id, index);
      }
    }
    checkNode(node, index, nodes, issues);
  });

  return issues;
}

/** @throws ModelValidationError listing every issue validateModel() finds. */
export function assertValidModel(model: ModelValue): void {
  const issues = validateModel(model);
  if (issues.length > 0) throw new ModelValidationError(issues);
}
