/**
 * Decoded value tree.
 *
 * @packageDocumentation
 */

import type { Address } from '@solana/addresses';
import type { BigIntPrimitiveName, NumberPrimitiveName } from './schema.js';

export interface NumberValue {
  readonly kind: 'number';
  readonly type: NumberPrimitiveName;
  readonly value: number;
}

/**
 * 64- and 128-bit integers. Kept as bigint so no precision is lost.
 */
export interface BigIntValue {
  readonly kind: 'bigint';
  readonly type: BigIntPrimitiveName;
  readonly value: bigint;
}

export interface BooleanValue {
  readonly kind: 'bool';
  readonly value: boolean;
}

export interface PublicKeyValue {
  readonly kind: 'publicKey';
  readonly value: Address;
}

export interface StringValue {
  readonly kind: 'string';
  readonly value: string;
}

/**
 * Raw bytes, copied out of the input buffer.
 */
export interface BytesValue {
  readonly kind: 'bytes';
  readonly value: Uint8Array;
}

/**
 * Elements of a fixed array or a length-prefixed vec.
 */
export interface ArrayValue {
  readonly kind: 'array';
  readonly elements: readonly ValueNode[];
}

export interface TupleValue {
  readonly kind: 'tuple';
  readonly elements: readonly ValueNode[];
}

export interface OptionValue {
  readonly kind: 'option';
  readonly value: ValueNode | null;
}

export interface StructValue {
  readonly kind: 'struct';
  readonly fields: ReadonlyArray<{ readonly name: string; readonly value: ValueNode }>;
}

export interface EnumValue {
  readonly kind: 'enum';
  readonly variant: string;
  readonly index: number;
  readonly payload: TupleValue | StructValue | null;
}

export type ValueNode =
  | NumberValue
  | BigIntValue
  | BooleanValue
  | PublicKeyValue
  | StringValue
  | BytesValue
  | ArrayValue
  | TupleValue
  | OptionValue
  | StructValue
  | EnumValue;

/**
 * Look up a struct field by name.
 *
 * @example
 * ```ts
 * const count = getField(value, 'count');
 * if (count?.kind === 'bigint') console.log(count.value);
 * ```
 */
export function getField(value: StructValue, name: string): ValueNode | undefined {
  return value.fields.find((field) => field.name === name)?.value;
}
