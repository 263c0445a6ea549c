/**
 * Byte builders for tests. Encoding goes through @solana/codecs so test
 * buffers are produced independently of the decoder under test.
 */

import { address, getAddressEncoder } from '@solana/addresses';
import {
  getF32Encoder,
  getF64Encoder,
  getI128Encoder,
  getI16Encoder,
  getI64Encoder,
  getU128Encoder,
  getU16Encoder,
  getU32Encoder,
  getU64Encoder,
  getU8Encoder,
} from '@solana/codecs';

export const SYSTEM_PROGRAM = '11111111111111111111111111111111';

export function concatBytes(...parts: ArrayLike<number>[]): Uint8Array {
  const length = parts.reduce((total, part) => total + part.length, 0);
  const result = new Uint8Array(length);
  let offset = 0;
  for (const part of parts) {
    result.set(Array.from(part), offset);
    offset += part.length;
  }
  return result;
}

export const u8 = (value: number) => getU8Encoder().encode(value);
export const u16 = (value: number) => getU16Encoder().encode(value);
export const u32 = (value: number) => getU32Encoder().encode(value);
export const u64 = (value: bigint) => getU64Encoder().encode(value);
export const u128 = (value: bigint) => getU128Encoder().encode(value);
export const i16 = (value: number) => getI16Encoder().encode(value);
export const i64 = (value: bigint) => getI64Encoder().encode(value);
export const i128 = (value: bigint) => getI128Encoder().encode(value);
export const f32 = (value: number) => getF32Encoder().encode(value);
export const f64 = (value: number) => getF64Encoder().encode(value);

/**
 * Borsh string: u32 byte length followed by UTF-8.
 */
export function str(value: string): Uint8Array {
  const utf8 = new TextEncoder().encode(value);
  return concatBytes(u32(utf8.length), utf8);
}

export function pubkey(value: string): Uint8Array {
  return Uint8Array.from(getAddressEncoder().encode(address(value)));
}

/**
 * Run a function that is expected to throw and return what it threw.
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}
