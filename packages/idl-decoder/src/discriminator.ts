/**
 * Anchor account and instruction discriminators.
 *
 * @packageDocumentation
 */

import { sha256 } from '@noble/hashes/sha2';
import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils';
import { DEFAULT_DISCRIMINATOR_LENGTH } from './config.js';

/**
 * Convert a camelCase or PascalCase name to snake_case.
 *
 * An underscore goes before an uppercase letter that follows other characters
 * and is itself followed by a lowercase letter or digit, so acronyms stay together.
 *
 * @example
 * ```ts
 * camelToSnakeCase('mintV1'); // 'mint_v1'
 * camelToSnakeCase('NFTMetadataUpdate'); // 'nft_metadata_update'
 * ```
 */
export function camelToSnakeCase(name: string): string {
  const chars = [...name];
  let result = '';

  chars.forEach((char, index) => {
    if (!isUpperCase(char)) {
      result += char;
      return;
    }
    const next = chars[index + 1];
    if (result.length > 0 && next !== undefined && (isLowerCase(next) || isDigit(next))) {
      result += '_';
    }
    result += char.toLowerCase();
  });

  return result;
}

/**
 * Implicit discriminator of an account type: `sha256("account:<Name>")`.
 */
export function accountDiscriminator(
  name: string,
  length: number = DEFAULT_DISCRIMINATOR_LENGTH
): Uint8Array {
  return sha256(utf8ToBytes(`account:${name}`)).slice(0, length);
}

/**
 * Implicit discriminator of an instruction: `sha256("global:<snake_name>")`.
 */
export function instructionDiscriminator(
  name: string,
  length: number = DEFAULT_DISCRIMINATOR_LENGTH
): Uint8Array {
  return sha256(utf8ToBytes(`global:${camelToSnakeCase(name)}`)).slice(0, length);
}

/**
 * Check whether data starts with the given discriminator.
 */
export function startsWithDiscriminator(data: Uint8Array, discriminator: Uint8Array): boolean {
  if (data.length < discriminator.length) {
    return false;
  }
  return discriminator.every((byte, index) => data[index] === byte);
}

/**
 * Hex rendering used in logs and errors.
 */
export function discriminatorToHex(discriminator: Uint8Array): string {
  return bytesToHex(discriminator);
}

function isUpperCase(char: string): boolean {
  return char !== char.toLowerCase() && char === char.toUpperCase();
}

function isLowerCase(char: string): boolean {
  return char !== char.toUpperCase() && char === char.toLowerCase();
}

function isDigit(char: string): boolean {
  return char >= '0' && char <= '9';
}
