// ─── Constants ────────────────────────────────────────────────────────────────
export {
  SIZEOF_SHORT,
  SIZEOF_INT,
  SIZE_PREFIX_LENGTH,
  FILE_IDENTIFIER_LENGTH,
  VTABLE_METADATA_FIELDS,
  MAX_BUFFER_SIZE,
  DEFAULT_INITIAL_SIZE,
  MODEL_FILE_IDENTIFIER,
  SCHEMA_VERSION,
  fieldVtableOffset,
} from './constants';

// ─── Configuration & logging ──────────────────────────────────────────────────
export {
  defaultLogLevel,
  resolveBuilderOptions,
  resolveReaderOptions,
  assertIdentifier,
} from './config';
export type {
  LogLevel,
  BuilderOptions,
  ResolvedBuilderOptions,
  ReaderOptions,
  ResolvedReaderOptions,
} from './config';

export { getRootLogger, childLogger } from './logger';
export type { Logger } from './logger';

// ─── Encoding core ────────────────────────────────────────────────────────────
export { ByteBuffer, MalformedBufferError } from './byte-buffer';
export { Table, unknownTag } from './table';
export type { UnionSlot } from './table';
export { Builder, BuilderError } from './builder';
export type { Offset, FinishOptions } from './builder';

// ─── Schema vocabulary ────────────────────────────────────────────────────────
export {
  OperatorType,
  PadMode,
  OperatorAttrs,
  NodeKind,
  ConstantData,
  isOperatorType,
  isPadMode,
  isOperatorAttrs,
  isNodeKind,
  isConstantData,
  operatorTypeName,
} from './schema';
export type {
  BatchNormalizationAttrsFields,
  ClipAttrsFields,
  ConcatAttrsFields,
  Conv2dAttrsFields,
  ConvTranspose2dAttrsFields,
  GatherAttrsFields,
  GemmAttrsFields,
  LeakyReluAttrsFields,
  MaxPool2dAttrsFields,
  Pad2dAttrsFields,
  UnsqueezeAttrsFields,
  AttrsFieldMap,
  AttrsKind,
  OperatorAttrsValue,
  OperatorAttrsInput,
  TensorDataFields,
  ConstantDataValue,
  OperatorNodeValue,
  ConstantNodeValue,
  ValueNodeValue,
  NodeDataValue,
  NodeValue,
  GraphValue,
  ModelValue,
  ModelInput,
} from './schema';

// ─── Attribute tables ─────────────────────────────────────────────────────────
export {
  BatchNormalizationAttrs,
  ClipAttrs,
  ConcatAttrs,
  Conv2dAttrs,
  ConvTranspose2dAttrs,
  GatherAttrs,
  GemmAttrs,
  LeakyReluAttrs,
  MaxPool2dAttrs,
  Pad2dAttrs,
  UnsqueezeAttrs,
  attrsView,
  unpackAttrs,
  createBatchNormalizationAttrs,
  createClipAttrs,
  createConcatAttrs,
  createConv2dAttrs,
  createConvTranspose2dAttrs,
  createGatherAttrs,
  createGemmAttrs,
  createLeakyReluAttrs,
  createMaxPool2dAttrs,
  createPad2dAttrs,
  createUnsqueezeAttrs,
  createAttrs,
} from './attrs';
export type { OperatorAttrsView } from './attrs';

// ─── Nodes ────────────────────────────────────────────────────────────────────
export {
  FloatData,
  IntData,
  OperatorNode,
  ConstantNode,
  ValueNode,
  Node,
  createFloatData,
  createIntData,
  createOperatorNode,
  createConstantNode,
  createValueNode,
  createNode,
} from './nodes';
export type { ConstantDataView, NodeDataView } from './nodes';

// ─── Model ────────────────────────────────────────────────────────────────────
export {
  Graph,
  Model,
  FormatIdentifierError,
  SchemaVersionError,
  modelBufferHasIdentifier,
  readModel,
  createGraph,
  createModel,
} from './model';

// ─── Codec & validation ───────────────────────────────────────────────────────
export { encodeModel, decodeModel } from './codec';
export type { EncodeOptions, DecodeOptions } from './codec';

export { validateModel, assertValidModel, elementCount, ModelValidationError } from './validate';
export type { ModelIssue, ModelIssueCode } from './validate';
