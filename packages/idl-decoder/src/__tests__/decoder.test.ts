/**
 * Tests for schema-driven decoding.
 */

import { describe, it, expect } from 'vitest';
import { decode } from '../decoder.js';
import {
  InvalidBooleanError,
  InvalidDiscriminantError,
  InvalidLengthError,
  InvalidOptionTagError,
  InvalidUtf8Error,
  TruncatedBufferError,
  UnknownTypeNameError,
} from '../errors/index.js';
import { formatValue } from '../formatter.js';
import type {
  BigIntPrimitiveName,
  EnumSchema,
  SchemaNode,
  SchemaResolver,
  StructSchema,
} from '../schema.js';
import type { ValueNode } from '../value.js';
import {
  SYSTEM_PROGRAM,
  captureError,
  concatBytes,
  f32,
  f64,
  i128,
  i16,
  i64,
  pubkey,
  str,
  u128,
  u16,
  u32,
  u64,
  u8,
} from './helpers.js';

const U8: SchemaNode = { kind: 'primitive', type: 'u8' };
const U16: SchemaNode = { kind: 'primitive', type: 'u16' };
const U32: SchemaNode = { kind: 'primitive', type: 'u32' };
const U64: SchemaNode = { kind: 'primitive', type: 'u64' };

function decodeJson(schema: SchemaNode, bytes: Uint8Array) {
  return formatValue(decode(schema, bytes).value);
}

describe('decode', () => {
  describe('primitives', () => {
    it('should decode a public key and u64 struct', () => {
      const schema: StructSchema = {
        kind: 'struct',
        fields: [
          { name: 'admin', schema: { kind: 'publicKey' } },
          { name: 'count', schema: U64 },
        ],
      };
      const bytes = concatBytes(new Uint8Array(32), [42, 0, 0, 0, 0, 0, 0, 0]);

      const result = decode(schema, bytes);

      expect(formatValue(result.value)).toEqual({ admin: SYSTEM_PROGRAM, count: '42' });
      expect(result.offset).toBe(40);
    });

    it('should keep 64- and 128-bit integers exact', () => {
      const cases: Array<[BigIntPrimitiveName, Uint8Array, bigint]> = [
        ['u64', concatBytes(u64(2n ** 64n - 1n)), 2n ** 64n - 1n],
        ['u64', concatBytes(u64(2n ** 53n + 1n)), 2n ** 53n + 1n],
        ['i64', concatBytes(i64(-(2n ** 63n))), -(2n ** 63n)],
        ['u128', concatBytes(u128(2n ** 128n - 1n)), 2n ** 128n - 1n],
        ['i128', concatBytes(i128(-(2n ** 127n))), -(2n ** 127n)],
      ];

      for (const [type, bytes, expected] of cases) {
        const { value, offset } = decode({ kind: 'primitive', type }, bytes);
        expect(value).toEqual({ kind: 'bigint', type, value: expected });
        expect(formatValue(value)).toBe(expected.toString());
        expect(offset).toBe(bytes.length);
      }
    });

    it('should decode narrow integers as numbers', () => {
      expect(decodeJson({ kind: 'primitive', type: 'i16' }, concatBytes(i16(-2)))).toBe(-2);
      expect(decodeJson(U32, concatBytes(u32(4_000_000_000)))).toBe(4_000_000_000);
      expect(decodeJson({ kind: 'primitive', type: 'i8' }, new Uint8Array([0xff]))).toBe(-1);
    });

    it('should decode floats', () => {
      expect(decodeJson({ kind: 'primitive', type: 'f32' }, concatBytes(f32(1.5)))).toBe('1.5');
      expect(decodeJson({ kind: 'primitive', type: 'f64' }, concatBytes(f64(-0.25)))).toBe('-0.25');
    });

    it('should decode booleans and reject other bytes', () => {
      const schema: SchemaNode = { kind: 'primitive', type: 'bool' };
      expect(decodeJson(schema, new Uint8Array([0]))).toBe(false);
      expect(decodeJson(schema, new Uint8Array([1]))).toBe(true);

      const error = captureError(() => decode(schema, new Uint8Array([2])));
      expect(error).toBeInstanceOf(InvalidBooleanError);
      expect(error).toMatchObject({ offset: 0, byte: 2, path: 'value' });
    });

    it('should decode a non-default public key', () => {
      const key = 'TokenkegQfeZyiNwAJbNbGKPFXCWuBvf9Ss623VQ5DA';
      expect(decodeJson({ kind: 'publicKey' }, pubkey(key))).toBe(key);
    });
  });

  describe('strings and bytes', () => {
    it('should decode UTF-8 strings', () => {
      const result = decode({ kind: 'string' }, str('héllo ✓'));
      expect(formatValue(result.value)).toBe('héllo ✓');
      expect(result.offset).toBe(4 + 10);
    });

    it('should reject invalid UTF-8 at the offset of the string bytes', () => {
      const bytes = concatBytes(u32(2), [0xc3, 0x28]);
      const error = captureError(() => decode({ kind: 'string' }, bytes));
      expect(error).toBeInstanceOf(InvalidUtf8Error);
      expect(error).toMatchObject({ offset: 4, path: 'value' });
    });

    it('should decode bytes into a copy of the input', () => {
      const bytes = concatBytes(u32(3), [9, 8, 7], [0xaa]);
      const result = decode({ kind: 'bytes' }, bytes);
      bytes[4] = 0;

      expect(formatValue(result.value)).toEqual([9, 8, 7]);
      expect(result.offset).toBe(7);
    });

    it('should decode vec<u8> as bytes', () => {
      const schema: SchemaNode = { kind: 'vec', element: U8, lengthPrefix: 'u8' };
      const { value } = decode(schema, new Uint8Array([3, 1, 2, 3]));
      expect(value.kind).toBe('bytes');
      expect(formatValue(value)).toEqual([1, 2, 3]);
    });

    it('should take every remaining byte', () => {
      const schema: StructSchema = {
        kind: 'struct',
        fields: [
          { name: 'version', schema: U8 },
          { name: 'rest', schema: { kind: 'remainingBytes' } },
        ],
      };
      const result = decode(schema, new Uint8Array([1, 5, 6, 7]));
      expect(formatValue(result.value)).toEqual({ version: 1, rest: [5, 6, 7] });
      expect(result.offset).toBe(4);
    });
  });

  describe('containers', () => {
    it('should decode fixed arrays without a length prefix', () => {
      const schema: SchemaNode = { kind: 'array', element: U16, length: 2 };
      const result = decode(schema, concatBytes(u16(1), u16(513)));
      expect(formatValue(result.value)).toEqual([1, 513]);
      expect(result.offset).toBe(4);
    });

    it('should decode length-prefixed vecs', () => {
      const schema: SchemaNode = { kind: 'vec', element: U16, lengthPrefix: 'u32' };
      const result = decode(schema, concatBytes(u32(2), u16(1), u16(2)));
      expect(formatValue(result.value)).toEqual([1, 2]);
      expect(result.offset).toBe(8);
    });

    it('should decode vecs with a u16 length prefix', () => {
      const schema: SchemaNode = { kind: 'vec', element: { kind: 'publicKey' }, lengthPrefix: 'u16' };
      const result = decode(schema, concatBytes(u16(1), new Uint8Array(32)));
      expect(formatValue(result.value)).toEqual([SYSTEM_PROGRAM]);
      expect(result.offset).toBe(34);
    });

    it('should decode options', () => {
      const schema: SchemaNode = { kind: 'option', inner: U32, tagWidth: 1 };

      const none = decode(schema, new Uint8Array([0]));
      expect(formatValue(none.value)).toBeNull();
      expect(none.offset).toBe(1);

      const some = decode(schema, new Uint8Array([1, 5, 0, 0, 0]));
      expect(formatValue(some.value)).toBe(5);
      expect(some.offset).toBe(5);
    });

    it('should reject option tags other than 0 and 1', () => {
      const schema: SchemaNode = { kind: 'option', inner: U32, tagWidth: 1 };
      const error = captureError(() => decode(schema, new Uint8Array([2, 5, 0, 0, 0])));
      expect(error).toBeInstanceOf(InvalidOptionTagError);
      expect(error).toMatchObject({ offset: 0, tag: 2 });
    });

    it('should decode options with a 4-byte tag', () => {
      const schema: SchemaNode = { kind: 'option', inner: U8, tagWidth: 4 };
      const result = decode(schema, new Uint8Array([1, 0, 0, 0, 7]));
      expect(formatValue(result.value)).toBe(7);
      expect(result.offset).toBe(5);
    });

    it('should decode tuples in order', () => {
      const schema: SchemaNode = { kind: 'tuple', elements: [U8, U16, U32, U64] };
      const bytes = concatBytes(u8(1), u16(2), u32(3), u64(4n));
      const result = decode(schema, bytes);
      expect(formatValue(result.value)).toEqual([1, 2, 3, '4']);
      expect(result.offset).toBe(15);
    });

    it('should preserve struct field order', () => {
      const schema: StructSchema = {
        kind: 'struct',
        fields: [
          { name: 'zeta', schema: U8 },
          { name: 'alpha', schema: U8 },
          { name: 'mid', schema: U8 },
        ],
      };
      const json = decodeJson(schema, new Uint8Array([3, 1, 2]));
      expect(json).toEqual({ zeta: 3, alpha: 1, mid: 2 });
      expect(Object.keys(json ?? {})).toEqual(['zeta', 'alpha', 'mid']);
    });
  });

  describe('enums', () => {
    const schema: EnumSchema = {
      kind: 'enum',
      tagWidth: 1,
      variants: [
        { name: 'Idle', payload: null },
        { name: 'Moving', payload: { kind: 'tuple', elements: [U8, U8] } },
        {
          name: 'Named',
          payload: { kind: 'struct', fields: [{ name: 'label', schema: { kind: 'string' } }] },
        },
      ],
    };

    it('should decode unit, tuple and struct variants', () => {
      expect(decodeJson(schema, new Uint8Array([0]))).toEqual({ name: 'Idle' });
      expect(decodeJson(schema, new Uint8Array([1, 4, 5]))).toEqual({ name: 'Moving', value: [4, 5] });
      expect(decodeJson(schema, concatBytes(u8(2), str('ok')))).toEqual({
        name: 'Named',
        value: { label: 'ok' },
      });
    });

    it('should keep the variant index', () => {
      const { value } = decode(schema, new Uint8Array([1, 4, 5]));
      expect(value).toMatchObject({ kind: 'enum', variant: 'Moving', index: 1 });
    });

    it('should reject discriminants past the last variant', () => {
      const error = captureError(() => decode(schema, new Uint8Array([3])));
      expect(error).toBeInstanceOf(InvalidDiscriminantError);
      expect(error).toMatchObject({ offset: 0, discriminant: 3, variantCount: 3 });
    });

    it('should read wider discriminants', () => {
      const wide: EnumSchema = { ...schema, tagWidth: 2 };
      const result = decode(wide, new Uint8Array([1, 0, 4, 5]));
      expect(formatValue(result.value)).toEqual({ name: 'Moving', value: [4, 5] });
      expect(result.offset).toBe(4);
    });
  });

  describe('truncation', () => {
    it('should fail when a primitive is cut short', () => {
      const error = captureError(() => decode(U64, new Uint8Array(7)));
      expect(error).toBeInstanceOf(TruncatedBufferError);
      expect(error).toMatchObject({ offset: 0, bytesNeeded: 8, available: 7, path: 'value' });
    });

    it('should report the offset and path of the failed field', () => {
      const schema: StructSchema = {
        kind: 'struct',
        fields: [
          { name: 'a', schema: U32 },
          { name: 'b', schema: U64 },
        ],
      };
      const error = captureError(() =>
        decode(schema, new Uint8Array(7), { path: 'Account' })
      );
      expect(error).toMatchObject({ offset: 4, bytesNeeded: 8, available: 3, path: 'Account.b' });
    });

    it('should fail when a vec claims more elements than remain', () => {
      const schema: SchemaNode = { kind: 'vec', element: U16, lengthPrefix: 'u32' };
      const error = captureError(() => decode(schema, concatBytes(u32(3), u16(1), u16(2))));
      expect(error).toBeInstanceOf(TruncatedBufferError);
      expect(error).toMatchObject({ offset: 8, bytesNeeded: 2, available: 0, path: 'value[2]' });
    });

    it('should reject a vec of empty elements longer than the remaining bytes', () => {
      const schema: SchemaNode = {
        kind: 'vec',
        element: { kind: 'struct', fields: [] },
        lengthPrefix: 'u32',
      };
      const error = captureError(() => decode(schema, concatBytes(u32(30_000_000))));
      expect(error).toBeInstanceOf(InvalidLengthError);
      expect(error).toMatchObject({ offset: 0, length: 30_000_000, available: 0, path: 'value' });
    });

    it('should decode a vec of empty elements that fits the remaining bytes', () => {
      const schema: SchemaNode = {
        kind: 'vec',
        element: { kind: 'tuple', elements: [] },
        lengthPrefix: 'u32',
      };
      const result = decode(schema, concatBytes(u32(2), [9, 9]));
      expect(formatValue(result.value)).toEqual([[], []]);
      expect(result.offset).toBe(4);
    });

    it('should let non-empty elements fail on truncation instead', () => {
      const schema: SchemaNode = {
        kind: 'vec',
        element: { kind: 'option', inner: U8, tagWidth: 1 },
        lengthPrefix: 'u32',
      };
      const error = captureError(() => decode(schema, concatBytes(u32(30_000_000), [0])));
      expect(error).toBeInstanceOf(TruncatedBufferError);
      expect(error).toMatchObject({ offset: 5, bytesNeeded: 1, available: 0, path: 'value[1]' });
    });

    it('should fail when string bytes are missing', () => {
      const error = captureError(() => decode({ kind: 'string' }, concatBytes(u32(10), [97, 98])));
      expect(error).toMatchObject({ offset: 4, bytesNeeded: 10, available: 2 });
    });

    it('should fail on every prefix of a valid buffer', () => {
      const schema: StructSchema = {
        kind: 'struct',
        fields: [
          { name: 'flag', schema: { kind: 'option', inner: U64, tagWidth: 1 } },
          { name: 'name', schema: { kind: 'string' } },
        ],
      };
      const bytes = concatBytes(u8(1), u64(9n), str('abc'));
      expect(decode(schema, bytes).offset).toBe(bytes.length);

      for (let length = 0; length < bytes.length; length++) {
        expect(() => decode(schema, bytes.slice(0, length))).toThrow(TruncatedBufferError);
      }
    });
  });

  describe('options', () => {
    it('should start at the given offset', () => {
      const result = decode(U16, new Uint8Array([0xff, 0xff, 1, 2]), { offset: 2 });
      expect(formatValue(result.value)).toBe(513);
      expect(result.offset).toBe(4);
    });

    it('should skip the discriminator', () => {
      const bytes = concatBytes(new Uint8Array(8).fill(0xee), u8(6));
      const result = decode(U8, bytes, { skipDiscriminator: true });
      expect(formatValue(result.value)).toBe(6);
      expect(result.offset).toBe(9);
    });

    it('should skip a discriminator of custom length', () => {
      const result = decode(U8, new Uint8Array([0xee, 6]), {
        skipDiscriminator: true,
        discriminatorLength: 1,
      });
      expect(formatValue(result.value)).toBe(6);
    });

    it('should fail when the discriminator itself is truncated', () => {
      const error = captureError(() => decode(U8, new Uint8Array(5), { skipDiscriminator: true }));
      expect(error).toBeInstanceOf(TruncatedBufferError);
      expect(error).toMatchObject({ offset: 0, bytesNeeded: 8, path: 'value.discriminator' });
    });

    it('should reject a negative offset', () => {
      expect(() => decode(U8, new Uint8Array([1]), { offset: -1 })).toThrow(RangeError);
    });

    it('should reject a discriminator length that is not a non-negative integer', () => {
      const bytes = new Uint8Array([0xee, 6]);
      expect(() =>
        decode(U8, bytes, { skipDiscriminator: true, discriminatorLength: -1 })
      ).toThrow('discriminatorLength must be a non-negative integer, got -1');
      expect(() =>
        decode(U8, bytes, { skipDiscriminator: true, discriminatorLength: 0.5 })
      ).toThrow(RangeError);
    });
  });

  describe('deferred references', () => {
    const node: StructSchema = {
      kind: 'struct',
      fields: [
        { name: 'value', schema: U8 },
        { name: 'next', schema: { kind: 'option', inner: { kind: 'defined', name: 'Node' }, tagWidth: 1 } },
      ],
    };
    const resolver: SchemaResolver = {
      resolve: (name) => {
        if (name !== 'Node') {
          throw new Error(`unexpected ${name}`);
        }
        return node;
      },
    };

    it('should follow defined nodes through the resolver', () => {
      const bytes = new Uint8Array([1, 1, 2, 1, 3, 0]);
      const result = decode(node, bytes, { resolver });
      expect(formatValue(result.value)).toEqual({
        value: 1,
        next: { value: 2, next: { value: 3, next: null } },
      });
      expect(result.offset).toBe(6);
    });

    it('should decode a chain deeper than the call stack', () => {
      const count = 50_000;
      const bytes = new Uint8Array(count * 2);
      for (let i = 0; i < count; i++) {
        bytes[i * 2] = i % 256;
        bytes[i * 2 + 1] = i === count - 1 ? 0 : 1;
      }

      const result = decode(node, bytes, { resolver });
      expect(result.offset).toBe(bytes.length);

      let current: ValueNode | null = result.value;
      let seen = 0;
      while (current !== null && current.kind === 'struct') {
        seen++;
        const next: ValueNode = current.fields[1].value;
        current = next.kind === 'option' ? next.value : null;
      }
      expect(seen).toBe(count);
    });

    it('should fail without a resolver', () => {
      const error = captureError(() => decode(node, new Uint8Array([1, 1, 2, 0])));
      expect(error).toBeInstanceOf(UnknownTypeNameError);
      expect(error).toMatchObject({ typeName: 'Node', path: 'value.next.inner' });
    });
  });
});
