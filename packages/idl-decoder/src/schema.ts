/**
 * Compiled binary-layout schema.
 *
 * A {@link SchemaNode} tree is the closed, resolved form of an IDL type
 * expression. It is built once per IDL by the compiler and shared by every
 * decode call.
 *
 * @packageDocumentation
 */

/**
 * Fixed-width numeric and boolean primitives.
 */
export type PrimitiveName =
  | 'bool'
  | 'u8'
  | 'u16'
  | 'u32'
  | 'u64'
  | 'u128'
  | 'i8'
  | 'i16'
  | 'i32'
  | 'i64'
  | 'i128'
  | 'f32'
  | 'f64';

/**
 * Primitives whose values fit in a JavaScript number.
 */
export type NumberPrimitiveName = 'u8' | 'u16' | 'u32' | 'i8' | 'i16' | 'i32' | 'f32' | 'f64';

/**
 * Integer primitives of 64 bits or wider, decoded as bigint.
 */
export type BigIntPrimitiveName = 'u64' | 'u128' | 'i64' | 'i128';

/**
 * Width of a length prefix on a variable-length sequence.
 */
export type LengthPrefix = 'u8' | 'u16' | 'u32';

/**
 * Width in bytes of an enum discriminant or option presence tag.
 */
export type TagWidth = 1 | 2 | 4;

export interface PrimitiveSchema {
  readonly kind: 'primitive';
  readonly type: PrimitiveName;
}

/**
 * 32 raw bytes, rendered as base58.
 */
export interface PublicKeySchema {
  readonly kind: 'publicKey';
}

/**
 * u32 length followed by that many bytes of UTF-8.
 */
export interface StringSchema {
  readonly kind: 'string';
}

/**
 * u32 length followed by that many raw bytes.
 */
export interface BytesSchema {
  readonly kind: 'bytes';
}

/**
 * Every byte left in the buffer.
 */
export interface RemainingBytesSchema {
  readonly kind: 'remainingBytes';
}

/**
 * Fixed-length array. The length is part of the schema, not the wire.
 */
export interface ArraySchema {
  readonly kind: 'array';
  readonly element: SchemaNode;
  readonly length: number;
}

/**
 * Length-prefixed sequence.
 */
export interface VecSchema {
  readonly kind: 'vec';
  readonly element: SchemaNode;
  readonly lengthPrefix: LengthPrefix;
}

/**
 * Presence tag followed by the inner value when the tag is 1.
 * `tagWidth` is 1 for Borsh `Option` and 4 for `COption`.
 */
export interface OptionSchema {
  readonly kind: 'option';
  readonly inner: SchemaNode;
  readonly tagWidth: 1 | 4;
}

export interface TupleSchema {
  readonly kind: 'tuple';
  readonly elements: readonly SchemaNode[];
}

export interface SchemaField {
  readonly name: string;
  readonly schema: SchemaNode;
}

/**
 * Named fields in declaration order. Order is semantic: it is both the wire
 * order and the output order.
 */
export interface StructSchema {
  readonly kind: 'struct';
  readonly fields: readonly SchemaField[];
}

export interface SchemaVariant {
  readonly name: string;
  /**
   * `null` for a unit variant.
   */
  readonly payload: TupleSchema | StructSchema | null;
}

/**
 * Tagged union. The discriminant is the zero-based variant index.
 */
export interface EnumSchema {
  readonly kind: 'enum';
  readonly variants: readonly SchemaVariant[];
  readonly tagWidth: TagWidth;
}

/**
 * Deferred reference to a named type, emitted where a recursive type refers
 * back to itself through a variable-size container. Resolved at decode time.
 */
export interface DefinedSchema {
  readonly kind: 'defined';
  readonly name: string;
}

export type SchemaNode =
  | PrimitiveSchema
  | PublicKeySchema
  | StringSchema
  | BytesSchema
  | RemainingBytesSchema
  | ArraySchema
  | VecSchema
  | OptionSchema
  | TupleSchema
  | StructSchema
  | EnumSchema
  | DefinedSchema;

/**
 * Looks up the schema of a named type. Used to follow {@link DefinedSchema} nodes.
 */
export interface SchemaResolver {
  resolve(name: string): SchemaNode;
}

const PRIMITIVE_NAMES: ReadonlySet<string> = new Set<PrimitiveName>([
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
]);

export function isPrimitiveName(name: string): name is PrimitiveName {
  return PRIMITIVE_NAMES.has(name);
}

export function isBigIntPrimitive(name: PrimitiveName): name is BigIntPrimitiveName {
  return name === 'u64' || name === 'u128' || name === 'i64' || name === 'i128';
}

const PRIMITIVE_WIDTHS = {
  bool: 1,
  u8: 1,
  u16: 2,
  u32: 4,
  u64: 8,
  u128: 16,
  i8: 1,
  i16: 2,
  i32: 4,
  i64: 8,
  i128: 16,
  f32: 4,
  f64: 8,
} satisfies Record<PrimitiveName, number>;

const LENGTH_PREFIX_WIDTHS = {
  u8: 1,
  u16: 2,
  u32: 4,
} satisfies Record<LengthPrefix, number>;

export function lengthPrefixWidth(prefix: LengthPrefix): number {
  return LENGTH_PREFIX_WIDTHS[prefix];
}

const minWireSizes = new WeakMap<SchemaNode, number>();

/**
 * Fewest bytes any value of `schema` can occupy on the wire.
 *
 * Vecs and options count only their prefix, so deferred references never
 * need expanding more than once per call.
 */
export function minWireSize(schema: SchemaNode, resolver?: SchemaResolver): number {
  const cached = minWireSizes.get(schema);
  if (cached !== undefined) {
    return cached;
  }

  let size: number;
  switch (schema.kind) {
    case 'primitive':
      size = PRIMITIVE_WIDTHS[schema.type];
      break;
    case 'publicKey':
      size = 32;
      break;
    case 'string':
    case 'bytes':
      size = 4;
      break;
    case 'remainingBytes':
      size = 0;
      break;
    case 'array':
      size = schema.length === 0 ? 0 : schema.length * minWireSize(schema.element, resolver);
      break;
    case 'vec':
      size = LENGTH_PREFIX_WIDTHS[schema.lengthPrefix];
      break;
    case 'option':
      size = schema.tagWidth;
      break;
    case 'tuple':
      size = sumMinWireSizes(schema.elements, resolver);
      break;
    case 'struct':
      size = sumMinWireSizes(
        schema.fields.map((field) => field.schema),
        resolver
      );
      break;
    case 'enum': {
      let smallest = Infinity;
      for (const variant of schema.variants) {
        smallest = Math.min(smallest, variant.payload ? minWireSize(variant.payload, resolver) : 0);
      }
      size = schema.tagWidth + (Number.isFinite(smallest) ? smallest : 0);
      break;
    }
    case 'defined':
      // Depends on the resolver, so never cached.
      return resolver ? minWireSize(resolver.resolve(schema.name), resolver) : 0;
    default:
      return schema satisfies never;
  }

  minWireSizes.set(schema, size);
  return size;
}

function sumMinWireSizes(schemas: readonly SchemaNode[], resolver?: SchemaResolver): number {
  let total = 0;
  for (const schema of schemas) {
    total += minWireSize(schema, resolver);
  }
  return total;
}
