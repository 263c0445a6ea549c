/**
 * Borsh decoder driven by a compiled schema.
 *
 * Walks a {@link SchemaNode} against a byte buffer with a cursor that only moves
 * forward. Every read is bounds-checked first; failures carry the absolute byte
 * offset and the schema path being decoded.
 *
 * Containers are decoded with an explicit frame stack rather than recursion, so
 * nesting depth is bounded by the buffer and not by the call stack.
 *
 * @packageDocumentation
 */

import { getAddressDecoder } from '@solana/addresses';
import {
  getF32Decoder,
  getF64Decoder,
  getI128Decoder,
  getI16Decoder,
  getI32Decoder,
  getI64Decoder,
  getI8Decoder,
  getU128Decoder,
  getU16Decoder,
  getU32Decoder,
  getU64Decoder,
  getU8Decoder,
  type FixedSizeDecoder,
} from '@solana/codecs';
import { DEFAULT_DISCRIMINATOR_LENGTH } from './config.js';
import {
  InvalidBooleanError,
  InvalidDiscriminantError,
  InvalidLengthError,
  InvalidOptionTagError,
  InvalidUtf8Error,
  TruncatedBufferError,
  UnknownTypeNameError,
} from './errors/index.js';
import type {
  BigIntPrimitiveName,
  EnumSchema,
  LengthPrefix,
  NumberPrimitiveName,
  SchemaNode,
  SchemaResolver,
  StructSchema,
  TagWidth,
  TupleSchema,
  VecSchema,
} from './schema.js';
import { isBigIntPrimitive, minWireSize } from './schema.js';
import type { ArrayValue, EnumValue, StructValue, TupleValue, ValueNode } from './value.js';

/**
 * Options for {@link decode}.
 */
export interface DecodeOptions {
  /**
   * Offset of the first byte to decode. Defaults to 0.
   */
  offset?: number;

  /**
   * Skip a leading discriminator before decoding.
   */
  skipDiscriminator?: boolean;

  /**
   * Length of the skipped discriminator. Defaults to 8.
   */
  discriminatorLength?: number;

  /**
   * Resolver for deferred `defined` nodes. Required when the schema is recursive.
   */
  resolver?: SchemaResolver;

  /**
   * Name of the root value in error paths. Defaults to `"value"`.
   */
  path?: string;
}

/**
 * Result of a decode call.
 */
export interface DecodeResult {
  value: ValueNode;
  /**
   * Offset just past the last byte consumed.
   */
  offset: number;
}

/**
 * Cursor state for a single decode call.
 */
interface DecodeState {
  readonly bytes: Uint8Array;
  offset: number;
  readonly resolver?: SchemaResolver;
}

const NUMBER_DECODERS = {
  u8: getU8Decoder(),
  u16: getU16Decoder(),
  u32: getU32Decoder(),
  i8: getI8Decoder(),
  i16: getI16Decoder(),
  i32: getI32Decoder(),
  f32: getF32Decoder(),
  f64: getF64Decoder(),
} satisfies Record<NumberPrimitiveName, FixedSizeDecoder<number>>;

const BIGINT_DECODERS = {
  u64: getU64Decoder(),
  u128: getU128Decoder(),
  i64: getI64Decoder(),
  i128: getI128Decoder(),
} satisfies Record<BigIntPrimitiveName, FixedSizeDecoder<bigint>>;

const TAG_DECODERS = {
  1: NUMBER_DECODERS.u8,
  2: NUMBER_DECODERS.u16,
  4: NUMBER_DECODERS.u32,
} satisfies Record<TagWidth, FixedSizeDecoder<number>>;

const LENGTH_DECODERS = {
  u8: NUMBER_DECODERS.u8,
  u16: NUMBER_DECODERS.u16,
  u32: NUMBER_DECODERS.u32,
} satisfies Record<LengthPrefix, FixedSizeDecoder<number>>;

const addressDecoder = getAddressDecoder();

const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Decode bytes against a schema.
 *
 * @param schema - Compiled schema of the value
 * @param bytes - Raw bytes
 * @param options - Start offset, discriminator handling and resolver
 * @returns The decoded value and the offset just past it
 * @throws TruncatedBufferError if the buffer ends before the value does
 * @throws InvalidUtf8Error, InvalidOptionTagError, InvalidDiscriminantError,
 * InvalidBooleanError or InvalidLengthError on malformed data
 *
 * @example
 * ```ts
 * const { value, offset } = decode(schema, accountData, { skipDiscriminator: true });
 * console.log(formatValue(value));
 * ```
 */
export function decode(
  schema: SchemaNode,
  bytes: Uint8Array,
  options: DecodeOptions = {}
): DecodeResult {
  const start = options.offset ?? 0;
  if (!Number.isSafeInteger(start) || start < 0) {
    throw new RangeError(`offset must be a non-negative integer, got ${start}`);
  }

  const state: DecodeState = { bytes, offset: start, resolver: options.resolver };
  const path = options.path ?? 'value';

  if (options.skipDiscriminator) {
    const length = options.discriminatorLength ?? DEFAULT_DISCRIMINATOR_LENGTH;
    if (!Number.isSafeInteger(length) || length < 0) {
      throw new RangeError(`discriminatorLength must be a non-negative integer, got ${length}`);
    }
    ensureAvailable(state, length, `${path}.discriminator`);
    state.offset += length;
  }

  const value = decodeValue(state, schema, path);
  return { value, offset: state.offset };
}

/**
 * A child value still to be decoded.
 */
interface ChildRead {
  readonly schema: SchemaNode;
  readonly path: string;
}

/**
 * A container whose children are being decoded.
 */
abstract class DecodeFrame {
  /**
   * The next child to decode, or `undefined` once every child has been read.
   */
  abstract next(): ChildRead | undefined;

  abstract accept(value: ValueNode): void;

  abstract finish(): ValueNode;
}

class StructFrame extends DecodeFrame {
  private readonly fields: { name: string; value: ValueNode }[] = [];

  constructor(
    private readonly schema: StructSchema,
    private readonly path: string
  ) {
    super();
  }

  next(): ChildRead | undefined {
    const index = this.fields.length;
    if (index >= this.schema.fields.length) {
      return undefined;
    }
    const field = this.schema.fields[index];
    return { schema: field.schema, path: `${this.path}.${field.name}` };
  }

  accept(value: ValueNode): void {
    this.fields.push({ name: this.schema.fields[this.fields.length].name, value });
  }

  finish(): StructValue {
    return { kind: 'struct', fields: this.fields };
  }
}

class TupleFrame extends DecodeFrame {
  private readonly elements: ValueNode[] = [];

  constructor(
    private readonly schema: TupleSchema,
    private readonly path: string
  ) {
    super();
  }

  next(): ChildRead | undefined {
    const index = this.elements.length;
    if (index >= this.schema.elements.length) {
      return undefined;
    }
    return { schema: this.schema.elements[index], path: `${this.path}[${index}]` };
  }

  accept(value: ValueNode): void {
    this.elements.push(value);
  }

  finish(): TupleValue {
    return { kind: 'tuple', elements: this.elements };
  }
}

/**
 * Elements of a fixed array or a vec.
 */
class SequenceFrame extends DecodeFrame {
  private readonly elements: ValueNode[] = [];

  constructor(
    private readonly element: SchemaNode,
    private readonly length: number,
    private readonly path: string
  ) {
    super();
  }

  next(): ChildRead | undefined {
    const index = this.elements.length;
    if (index >= this.length) {
      return undefined;
    }
    return { schema: this.element, path: `${this.path}[${index}]` };
  }

  accept(value: ValueNode): void {
    this.elements.push(value);
  }

  finish(): ArrayValue {
    return { kind: 'array', elements: this.elements };
  }
}

/**
 * A present option, after its tag has been read.
 */
class OptionFrame extends DecodeFrame {
  private value: ValueNode | undefined;

  constructor(
    private readonly inner: SchemaNode,
    private readonly path: string
  ) {
    super();
  }

  next(): ChildRead | undefined {
    return this.value === undefined ? { schema: this.inner, path: `${this.path}.inner` } : undefined;
  }

  accept(value: ValueNode): void {
    this.value = value;
  }

  finish(): ValueNode {
    return { kind: 'option', value: this.value ?? null };
  }
}

/**
 * An enum variant with a payload, after its tag has been read.
 */
class EnumFrame extends DecodeFrame {
  constructor(
    private readonly variant: string,
    private readonly index: number,
    private readonly payload: StructFrame | TupleFrame
  ) {
    super();
  }

  next(): ChildRead | undefined {
    return this.payload.next();
  }

  accept(value: ValueNode): void {
    this.payload.accept(value);
  }

  finish(): EnumValue {
    return {
      kind: 'enum',
      variant: this.variant,
      index: this.index,
      payload: this.payload.finish(),
    };
  }
}

function decodeValue(state: DecodeState, schema: SchemaNode, path: string): ValueNode {
  const frames: DecodeFrame[] = [];
  let current = begin(state, schema, path);

  for (;;) {
    let frame: DecodeFrame;
    if (current instanceof DecodeFrame) {
      frames.push(current);
      frame = current;
    } else {
      const parent = frames[frames.length - 1];
      if (parent === undefined) {
        return current;
      }
      parent.accept(current);
      frame = parent;
    }

    const child = frame.next();
    if (child) {
      current = begin(state, child.schema, child.path);
    } else {
      frames.pop();
      current = frame.finish();
    }
  }
}

/**
 * Decode a leaf, or read a container's header and return the frame that
 * decodes its children.
 */
function begin(state: DecodeState, schema: SchemaNode, path: string): ValueNode | DecodeFrame {
  let node = schema;
  while (node.kind === 'defined') {
    if (!state.resolver) {
      throw new UnknownTypeNameError(node.name, path);
    }
    node = state.resolver.resolve(node.name);
  }

  switch (node.kind) {
    case 'primitive': {
      const { type } = node;
      if (type === 'bool') {
        return { kind: 'bool', value: decodeBool(state, path) };
      }
      if (isBigIntPrimitive(type)) {
        return { kind: 'bigint', type, value: readFixed(state, BIGINT_DECODERS[type], path) };
      }
      return { kind: 'number', type, value: readFixed(state, NUMBER_DECODERS[type], path) };
    }

    case 'publicKey':
      return { kind: 'publicKey', value: readFixed(state, addressDecoder, path) };

    case 'string': {
      const length = readFixed(state, NUMBER_DECODERS.u32, path);
      const start = state.offset;
      const raw = readBytes(state, length, path);
      try {
        return { kind: 'string', value: utf8Decoder.decode(raw) };
      } catch (error) {
        throw new InvalidUtf8Error(start, path, error);
      }
    }

    case 'bytes': {
      const length = readFixed(state, NUMBER_DECODERS.u32, path);
      return { kind: 'bytes', value: readBytes(state, length, path) };
    }

    case 'remainingBytes':
      return {
        kind: 'bytes',
        value: readBytes(state, Math.max(state.bytes.length - state.offset, 0), path),
      };

    case 'array':
      return new SequenceFrame(node.element, node.length, path);

    case 'vec':
      return beginVec(state, node, path);

    case 'option': {
      const tagOffset = state.offset;
      const tag = readFixed(state, TAG_DECODERS[node.tagWidth], path);
      if (tag === 0) {
        return { kind: 'option', value: null };
      }
      if (tag !== 1) {
        throw new InvalidOptionTagError(tagOffset, tag, path);
      }
      return new OptionFrame(node.inner, path);
    }

    case 'tuple':
      return new TupleFrame(node, path);

    case 'struct':
      return new StructFrame(node, path);

    case 'enum':
      return beginEnum(state, node, path);

    default:
      return node satisfies never;
  }
}

function beginVec(state: DecodeState, schema: VecSchema, path: string): ValueNode | DecodeFrame {
  const lengthOffset = state.offset;
  const length = readFixed(state, LENGTH_DECODERS[schema.lengthPrefix], path);
  if (schema.element.kind === 'primitive' && schema.element.type === 'u8') {
    return { kind: 'bytes', value: readBytes(state, length, path) };
  }

  // Elements that can encode to nothing would let the length alone drive the
  // loop, so the count is held to the bytes that remain.
  const remaining = Math.max(state.bytes.length - state.offset, 0);
  if (length > remaining && minWireSize(schema.element, state.resolver) === 0) {
    throw new InvalidLengthError(lengthOffset, length, remaining, path);
  }

  return new SequenceFrame(schema.element, length, path);
}

function beginEnum(state: DecodeState, schema: EnumSchema, path: string): ValueNode | DecodeFrame {
  const tagOffset = state.offset;
  const index = readFixed(state, TAG_DECODERS[schema.tagWidth], path);
  const variant = schema.variants[index];
  if (!variant) {
    throw new InvalidDiscriminantError(tagOffset, index, schema.variants.length, path);
  }

  const { payload } = variant;
  const variantPath = `${path}.${variant.name}`;
  if (payload?.kind === 'tuple') {
    return new EnumFrame(variant.name, index, new TupleFrame(payload, variantPath));
  }
  if (payload?.kind === 'struct') {
    return new EnumFrame(variant.name, index, new StructFrame(payload, variantPath));
  }
  return { kind: 'enum', variant: variant.name, index, payload: null };
}

function decodeBool(state: DecodeState, path: string): boolean {
  const offset = state.offset;
  const byte = readFixed(state, NUMBER_DECODERS.u8, path);
  if (byte > 1) {
    throw new InvalidBooleanError(offset, byte, path);
  }
  return byte === 1;
}

/**
 * Read a fixed-size value with a codec decoder after checking bounds.
 */
function readFixed<T>(state: DecodeState, decoder: FixedSizeDecoder<T>, path: string): T {
  ensureAvailable(state, decoder.fixedSize, path);
  const [value, offset] = decoder.read(state.bytes, state.offset);
  state.offset = offset;
  return value;
}

/**
 * Copy `length` bytes out of the buffer.
 */
function readBytes(state: DecodeState, length: number, path: string): Uint8Array {
  ensureAvailable(state, length, path);
  const bytes = state.bytes.slice(state.offset, state.offset + length);
  state.offset += length;
  return bytes;
}

function ensureAvailable(state: DecodeState, size: number, path: string): void {
  const available = Math.max(state.bytes.length - state.offset, 0);
  if (size > available) {
    throw new TruncatedBufferError(state.offset, size, available, path);
  }
}
