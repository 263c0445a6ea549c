/**
 * Binary form of compiled schemas.
 *
 * A compiled IDL can be stored as bytes and loaded again without the IDL
 * document or a recompile. Every node starts with a u16 tag; counts and
 * string lengths are u32, array lengths u64, all little-endian.
 *
 * @packageDocumentation
 */

import {
  getU16Decoder,
  getU16Encoder,
  getU32Decoder,
  getU32Encoder,
  getU64Decoder,
  getU64Encoder,
  getU8Decoder,
  getU8Encoder,
  type FixedSizeDecoder,
} from '@solana/codecs';
import { resolveOptions, type IdlDecoderOptions } from './config.js';
import {
  InvalidUtf8Error,
  MalformedSchemaDataError,
  TruncatedBufferError,
  UnknownTypeNameError,
} from './errors/index.js';
import { CompiledIdl, type CompiledAccount, type CompiledInstruction } from './program.js';
import type {
  LengthPrefix,
  PrimitiveName,
  SchemaNode,
  SchemaResolver,
  SchemaVariant,
  StructSchema,
  TagWidth,
  TupleSchema,
} from './schema.js';
import { lengthPrefixWidth } from './schema.js';

/**
 * Version byte at the start of a serialized compiled IDL.
 */
export const COMPILED_IDL_FORMAT_VERSION = 1;

/**
 * Deepest node nesting accepted when reading a schema back.
 */
export const MAX_SCHEMA_DEPTH = 256;

const PRIMITIVE_TAGS: readonly PrimitiveName[] = [
  'bool',
  'u8',
  'u16',
  'u32',
  'u64',
  'u128',
  'i8',
  'i16',
  'i32',
  'i64',
  'i128',
  'f32',
  'f64',
];

const NODE_TAGS = {
  publicKey: 13,
  string: 14,
  bytes: 15,
  remainingBytes: 16,
  array: 17,
  vec: 18,
  option: 19,
  tuple: 20,
  struct: 21,
  enum: 22,
  defined: 23,
} as const satisfies Record<Exclude<SchemaNode['kind'], 'primitive'>, number>;

const u8Encoder = getU8Encoder();
const u16Encoder = getU16Encoder();
const u32Encoder = getU32Encoder();
const u64Encoder = getU64Encoder();
const u8Decoder = getU8Decoder();
const u16Decoder = getU16Decoder();
const u32Decoder = getU32Decoder();
const u64Decoder = getU64Decoder();

const textEncoder = new TextEncoder();
const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

class SchemaWriter {
  private readonly chunks: ArrayLike<number>[] = [];

  u8(value: number): void {
    this.chunks.push(u8Encoder.encode(value));
  }

  u16(value: number): void {
    this.chunks.push(u16Encoder.encode(value));
  }

  u32(value: number): void {
    this.chunks.push(u32Encoder.encode(value));
  }

  u64(value: number): void {
    this.chunks.push(u64Encoder.encode(value));
  }

  bytes(value: Uint8Array): void {
    this.u32(value.length);
    this.chunks.push(value);
  }

  string(value: string): void {
    this.bytes(textEncoder.encode(value));
  }

  node(schema: SchemaNode): void {
    switch (schema.kind) {
      case 'primitive':
        this.u16(PRIMITIVE_TAGS.indexOf(schema.type));
        return;
      case 'publicKey':
      case 'string':
      case 'bytes':
      case 'remainingBytes':
        this.u16(NODE_TAGS[schema.kind]);
        return;
      case 'array':
        this.u16(NODE_TAGS.array);
        this.u64(schema.length);
        this.node(schema.element);
        return;
      case 'vec':
        this.u16(NODE_TAGS.vec);
        this.u8(lengthPrefixWidth(schema.lengthPrefix));
        this.node(schema.element);
        return;
      case 'option':
        this.u16(NODE_TAGS.option);
        this.u8(schema.tagWidth);
        this.node(schema.inner);
        return;
      case 'tuple':
        this.u16(NODE_TAGS.tuple);
        this.u32(schema.elements.length);
        for (const element of schema.elements) {
          this.node(element);
        }
        return;
      case 'struct':
        this.u16(NODE_TAGS.struct);
        this.u32(schema.fields.length);
        for (const field of schema.fields) {
          this.string(field.name);
          this.node(field.schema);
        }
        return;
      case 'enum':
        this.u16(NODE_TAGS.enum);
        this.u8(schema.tagWidth);
        this.u32(schema.variants.length);
        for (const variant of schema.variants) {
          this.string(variant.name);
          if (variant.payload) {
            this.u8(1);
            this.node(variant.payload);
          } else {
            this.u8(0);
          }
        }
        return;
      case 'defined':
        this.u16(NODE_TAGS.defined);
        this.string(schema.name);
        return;
      default:
        schema satisfies never;
    }
  }

  toBytes(): Uint8Array {
    const length = this.chunks.reduce((total, chunk) => total + chunk.length, 0);
    const result = new Uint8Array(length);
    let offset = 0;
    for (const chunk of this.chunks) {
      result.set(chunk, offset);
      offset += chunk.length;
    }
    return result;
  }
}

/**
 * A `defined` node met while reading, checked once every type has been read.
 */
interface Reference {
  readonly name: string;
  readonly offset: number;
  readonly path: string;
}

class SchemaReader {
  offset = 0;
  readonly references: Reference[] = [];

  constructor(private readonly data: Uint8Array) {}

  get remaining(): number {
    return this.data.length - this.offset;
  }

  u8(path: string): number {
    return this.fixed(u8Decoder, path);
  }

  u32(path: string): number {
    return this.fixed(u32Decoder, path);
  }

  bytes(path: string): Uint8Array {
    const length = this.u32(path);
    this.ensure(length, path);
    const bytes = this.data.slice(this.offset, this.offset + length);
    this.offset += length;
    return bytes;
  }

  string(path: string): string {
    const raw = this.bytes(path);
    try {
      return utf8Decoder.decode(raw);
    } catch (error) {
      throw new InvalidUtf8Error(this.offset - raw.length, path, error);
    }
  }

  node(path: string, depth = 0): SchemaNode {
    if (depth > MAX_SCHEMA_DEPTH) {
      throw this.malformed(`nesting deeper than ${MAX_SCHEMA_DEPTH} levels`, path);
    }

    const tagOffset = this.offset;
    const tag = this.fixed(u16Decoder, path);
    const primitive = PRIMITIVE_TAGS[tag];
    if (primitive !== undefined) {
      return { kind: 'primitive', type: primitive };
    }

    switch (tag) {
      case NODE_TAGS.publicKey:
        return { kind: 'publicKey' };
      case NODE_TAGS.string:
        return { kind: 'string' };
      case NODE_TAGS.bytes:
        return { kind: 'bytes' };
      case NODE_TAGS.remainingBytes:
        return { kind: 'remainingBytes' };
      case NODE_TAGS.array: {
        const lengthOffset = this.offset;
        const length = this.fixed(u64Decoder, path);
        if (length > BigInt(Number.MAX_SAFE_INTEGER)) {
          throw this.malformed(`array length ${length} is too large`, path, lengthOffset);
        }
        return {
          kind: 'array',
          length: Number(length),
          element: this.node(`${path}.array`, depth + 1),
        };
      }
      case NODE_TAGS.vec:
        return {
          kind: 'vec',
          lengthPrefix: this.lengthPrefix(path),
          element: this.node(`${path}.vec`, depth + 1),
        };
      case NODE_TAGS.option: {
        const widthOffset = this.offset;
        const tagWidth = this.u8(path);
        if (tagWidth !== 1 && tagWidth !== 4) {
          throw this.malformed(`option tag width ${tagWidth} is not 1 or 4`, path, widthOffset);
        }
        return { kind: 'option', tagWidth, inner: this.node(`${path}.option`, depth + 1) };
      }
      case NODE_TAGS.tuple:
        return this.tupleSchema(path, depth);
      case NODE_TAGS.struct:
        return this.structSchema(path, depth);
      case NODE_TAGS.enum:
        return this.enumSchema(path, depth);
      case NODE_TAGS.defined: {
        const offset = this.offset;
        const name = this.string(path);
        this.references.push({ name, offset, path });
        return { kind: 'defined', name };
      }
      default:
        throw this.malformed(`unknown node tag ${tag}`, path, tagOffset);
    }
  }

  malformed(reason: string, path: string, offset = this.offset): MalformedSchemaDataError {
    return new MalformedSchemaDataError(offset, reason, path);
  }

  private tupleSchema(path: string, depth: number): TupleSchema {
    const count = this.u32(path);
    const elements: SchemaNode[] = [];
    for (let i = 0; i < count; i++) {
      elements.push(this.node(`${path}[${i}]`, depth + 1));
    }
    return { kind: 'tuple', elements };
  }

  private structSchema(path: string, depth: number): StructSchema {
    const count = this.u32(path);
    const fields: { name: string; schema: SchemaNode }[] = [];
    for (let i = 0; i < count; i++) {
      const name = this.string(`${path}.fields[${i}]`);
      fields.push({ name, schema: this.node(`${path}.${name}`, depth + 1) });
    }
    return { kind: 'struct', fields };
  }

  private enumSchema(path: string, depth: number): SchemaNode {
    const widthOffset = this.offset;
    const tagWidth = this.u8(path);
    if (!isTagWidth(tagWidth)) {
      throw this.malformed(`enum tag width ${tagWidth} is not 1, 2 or 4`, path, widthOffset);
    }

    const count = this.u32(path);
    const variants: SchemaVariant[] = [];
    for (let i = 0; i < count; i++) {
      const name = this.string(`${path}.variants[${i}]`);
      const variantPath = `${path}.${name}`;
      const flagOffset = this.offset;
      const flag = this.u8(variantPath);
      if (flag === 0) {
        variants.push({ name, payload: null });
        continue;
      }
      if (flag !== 1) {
        throw this.malformed(`variant payload flag ${flag} is not 0 or 1`, variantPath, flagOffset);
      }
      const payloadOffset = this.offset;
      const payload = this.node(variantPath, depth + 1);
      if (payload.kind !== 'tuple' && payload.kind !== 'struct') {
        throw this.malformed(
          `variant payload must be a tuple or struct, got ${payload.kind}`,
          variantPath,
          payloadOffset
        );
      }
      variants.push({ name, payload });
    }
    return { kind: 'enum', tagWidth, variants };
  }

  private lengthPrefix(path: string): LengthPrefix {
    const offset = this.offset;
    const width = this.u8(path);
    switch (width) {
      case 1:
        return 'u8';
      case 2:
        return 'u16';
      case 4:
        return 'u32';
      default:
        throw this.malformed(`vec length prefix width ${width} is not 1, 2 or 4`, path, offset);
    }
  }

  private fixed<T>(decoder: FixedSizeDecoder<T>, path: string): T {
    this.ensure(decoder.fixedSize, path);
    const [value, offset] = decoder.read(this.data, this.offset);
    this.offset = offset;
    return value;
  }

  private ensure(size: number, path: string): void {
    if (size > this.remaining) {
      throw new TruncatedBufferError(this.offset, size, this.remaining, path);
    }
  }
}

function isTagWidth(width: number): width is TagWidth {
  return width === 1 || width === 2 || width === 4;
}

/**
 * Encode a compiled schema as bytes.
 *
 * @example
 * ```ts
 * const bytes = serializeSchema(program.resolve('Vault'));
 * const schema = deserializeSchema(bytes);
 * ```
 */
export function serializeSchema(schema: SchemaNode): Uint8Array {
  const writer = new SchemaWriter();
  writer.node(schema);
  return writer.toBytes();
}

/**
 * Read back a schema written by {@link serializeSchema}. The bytes must hold
 * exactly one schema.
 *
 * @throws TruncatedBufferError if the bytes end inside a node
 * @throws MalformedSchemaDataError on an unknown tag, a bad width or trailing bytes
 */
export function deserializeSchema(bytes: Uint8Array): SchemaNode {
  const reader = new SchemaReader(bytes);
  const schema = reader.node('schema');
  if (reader.remaining > 0) {
    throw reader.malformed(`${reader.remaining} trailing bytes`, 'schema');
  }
  return schema;
}

/**
 * Encode a compiled IDL as bytes: its accounts, instructions and every named
 * type their schemas refer to through deferred `defined` nodes.
 */
export function serializeCompiledIdl(program: CompiledIdl): Uint8Array {
  const writer = new SchemaWriter();
  writer.u8(COMPILED_IDL_FORMAT_VERSION);
  writer.string(program.name);
  if (program.address === undefined) {
    writer.u8(0);
  } else {
    writer.u8(1);
    writer.string(program.address);
  }

  const { accounts, instructions } = program;
  writer.u32(accounts.length);
  for (const account of accounts) {
    writer.string(account.name);
    writer.bytes(account.discriminator);
    writer.node(account.schema);
  }

  writer.u32(instructions.length);
  for (const instruction of instructions) {
    writer.string(instruction.name);
    writer.bytes(instruction.discriminator);
    writer.u32(instruction.accounts.length);
    for (const name of instruction.accounts) {
      writer.string(name);
    }
    writer.node(instruction.schema);
  }

  const roots = [
    ...accounts.map((account) => account.schema),
    ...instructions.map((instruction) => instruction.schema),
  ];
  const types = collectReferencedTypes(roots, program);
  writer.u32(types.size);
  for (const [name, schema] of types) {
    writer.string(name);
    writer.node(schema);
  }

  return writer.toBytes();
}

/**
 * Load a compiled IDL written by {@link serializeCompiledIdl}.
 *
 * @param bytes - Serialized compiled IDL
 * @param options - Logging for the loaded program; discriminators come from the bytes
 * @throws TruncatedBufferError if the bytes end early
 * @throws MalformedSchemaDataError if the bytes are not a compiled IDL, refer to
 * a type they do not carry, or carry a type that contains itself directly
 */
export function deserializeCompiledIdl(
  bytes: Uint8Array,
  options: IdlDecoderOptions = {}
): CompiledIdl {
  const resolved = resolveOptions(options);
  const reader = new SchemaReader(bytes);

  const version = reader.u8('version');
  if (version !== COMPILED_IDL_FORMAT_VERSION) {
    throw reader.malformed(`unsupported format version ${version}`, 'version', 0);
  }
  const name = reader.string('name');
  const hasAddress = reader.u8('address');
  if (hasAddress > 1) {
    throw reader.malformed(`address flag ${hasAddress} is not 0 or 1`, 'address', reader.offset - 1);
  }
  const address = hasAddress === 1 ? reader.string('address') : undefined;

  const accounts: CompiledAccount[] = [];
  const accountCount = reader.u32('accounts');
  for (let i = 0; i < accountCount; i++) {
    const path = `accounts[${i}]`;
    accounts.push({
      name: reader.string(`${path}.name`),
      discriminator: reader.bytes(`${path}.discriminator`),
      schema: reader.node(`${path}.schema`),
    });
  }

  const instructions: CompiledInstruction[] = [];
  const instructionCount = reader.u32('instructions');
  for (let i = 0; i < instructionCount; i++) {
    const path = `instructions[${i}]`;
    const instructionName = reader.string(`${path}.name`);
    const discriminator = reader.bytes(`${path}.discriminator`);
    const accountNames: string[] = [];
    const accountNameCount = reader.u32(`${path}.accounts`);
    for (let j = 0; j < accountNameCount; j++) {
      accountNames.push(reader.string(`${path}.accounts[${j}]`));
    }
    const schemaOffset = reader.offset;
    const schema = reader.node(`${path}.schema`);
    if (schema.kind !== 'struct') {
      throw reader.malformed(
        `instruction schema must be a struct, got ${schema.kind}`,
        `${path}.schema`,
        schemaOffset
      );
    }
    instructions.push({ name: instructionName, discriminator, accounts: accountNames, schema });
  }

  const types = new Map<string, SchemaNode>();
  const typeCount = reader.u32('types');
  for (let i = 0; i < typeCount; i++) {
    const typeName = reader.string(`types[${i}].name`);
    types.set(typeName, reader.node(`types[${i}].schema`));
  }

  if (reader.remaining > 0) {
    throw reader.malformed(`${reader.remaining} trailing bytes`, '(root)');
  }

  for (const reference of reader.references) {
    if (!types.has(reference.name)) {
      throw new MalformedSchemaDataError(
        reference.offset,
        `refers to type ${reference.name}, which is not included`,
        reference.path
      );
    }
  }
  const cycle = findDirectCycle(types);
  if (cycle) {
    throw reader.malformed(
      `type ${cycle.join(' -> ')} contains itself directly`,
      `types.${cycle[0]}`
    );
  }

  resolved.logger.debug('Loaded compiled IDL', {
    program: name,
    accounts: accounts.length,
    instructions: instructions.length,
    types: types.size,
  });

  const resolver: SchemaResolver = {
    resolve(typeName: string): SchemaNode {
      const schema = types.get(typeName);
      if (!schema) {
        throw new UnknownTypeNameError(typeName, `defined(${typeName})`);
      }
      return schema;
    },
  };
  return new CompiledIdl(name, address, resolver, accounts, instructions, resolved);
}

/**
 * Named types reachable from `roots` through `defined` nodes, in discovery order.
 */
function collectReferencedTypes(
  roots: readonly SchemaNode[],
  resolver: SchemaResolver
): Map<string, SchemaNode> {
  const types = new Map<string, SchemaNode>();
  const pending = roots.flatMap((root) => definedNames(root, false));
  for (let name = pending.shift(); name !== undefined; name = pending.shift()) {
    if (types.has(name)) {
      continue;
    }
    const schema = resolver.resolve(name);
    types.set(name, schema);
    pending.push(...definedNames(schema, false));
  }
  return types;
}

/**
 * Names of the `defined` nodes inside `schema`. With `directOnly`, stops at
 * containers that may hold no bytes of their element: vecs, options and empty arrays.
 */
function definedNames(schema: SchemaNode, directOnly: boolean): string[] {
  const names: string[] = [];
  const pending: SchemaNode[] = [schema];
  for (let node = pending.pop(); node !== undefined; node = pending.pop()) {
    switch (node.kind) {
      case 'defined':
        names.push(node.name);
        break;
      case 'array':
        if (!directOnly || node.length > 0) {
          pending.push(node.element);
        }
        break;
      case 'vec':
        if (!directOnly) {
          pending.push(node.element);
        }
        break;
      case 'option':
        if (!directOnly) {
          pending.push(node.inner);
        }
        break;
      case 'tuple':
        pending.push(...node.elements);
        break;
      case 'struct':
        pending.push(...node.fields.map((field) => field.schema));
        break;
      case 'enum':
        for (const variant of node.variants) {
          if (variant.payload) {
            pending.push(variant.payload);
          }
        }
        break;
      default:
        break;
    }
  }
  return names;
}

/**
 * A chain of types that reach themselves without passing through a container
 * that may be empty, or `undefined` when there is none.
 */
function findDirectCycle(types: ReadonlyMap<string, SchemaNode>): string[] | undefined {
  const edges = new Map<string, string[]>();
  for (const [name, schema] of types) {
    edges.set(name, definedNames(schema, true));
  }

  const done = new Set<string>();
  for (const start of types.keys()) {
    if (done.has(start)) {
      continue;
    }

    // Depth-first walk with an explicit stack of names and edge cursors.
    const path: string[] = [start];
    const cursors: number[] = [0];
    const onPath = new Set<string>([start]);
    while (path.length > 0) {
      const top = path.length - 1;
      const name = path[top];
      const targets = edges.get(name) ?? [];
      if (cursors[top] >= targets.length) {
        path.pop();
        cursors.pop();
        onPath.delete(name);
        done.add(name);
        continue;
      }

      const next = targets[cursors[top]];
      cursors[top] += 1;
      if (onPath.has(next)) {
        return [...path.slice(path.indexOf(next)), next];
      }
      if (!done.has(next) && edges.has(next)) {
        path.push(next);
        cursors.push(0);
        onPath.add(next);
      }
    }
  }
  return undefined;
}
