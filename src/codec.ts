/**
 * graphbuf — whole-model encode / decode
 *
 * Convenience layer over Builder and the table views for callers that want a
 * plain object rather than lazy accessors. decodeModel(encodeModel(m)) gives
 * back `m` field for field, with omitted attribute fields filled in at their
 * defaults.
 */

import { Builder } from './builder';
import type { BuilderOptions, ReaderOptions } from './config';
import { MODEL_FILE_IDENTIFIER } from './constants';
import { createModel, readModel } from './model';
import type { ModelInput, ModelValue } from './schema';
import { assertValidModel } from './validate';

export interface EncodeOptions extends BuilderOptions {
  /** Prepend a u32 size prefix. Default false. */
  readonly sizePrefix?: boolean;
}

export interface DecodeOptions extends ReaderOptions {
  /** Run assertValidModel() on the decoded value. Default false. */
  readonly validate?: boolean;
}

export function encodeModel(model: ModelInput, options: EncodeOptions = {}): Uint8Array {
  const b    = new Builder(options);
  const root = createModel(b, model);
  b.finish(root, { identifier: MODEL_FILE_IDENTIFIER, sizePrefix: options.sizePrefix ?? false });
  return b.asUint8Array();
}

/**
 * @throws ModelValidationError when `validate` is set and the model breaks a
 *         producer invariant.
 */
export function decodeModel(bytes: Uint8Array, options: DecodeOptions = {}): ModelValue {
  const model = readModel(bytes, options).unpack();
  if (options.validate === true) assertValidModel(model);
  return model;
}
