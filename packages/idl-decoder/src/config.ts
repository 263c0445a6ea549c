/**
 * Decoder configuration and defaults.
 *
 * @packageDocumentation
 */

import { createLogger, type Logger, type LoggingOptions } from './logging.js';
import type { TagWidth } from './schema.js';

/**
 * Length of Anchor account and instruction discriminators (first 8 bytes of a SHA-256 hash).
 */
export const DEFAULT_DISCRIMINATOR_LENGTH = 8;

/**
 * Maximum length of an implicit discriminator (the full SHA-256 digest).
 */
export const MAX_DISCRIMINATOR_LENGTH = 32;

/**
 * Default width in bytes of a Borsh enum discriminant.
 */
export const DEFAULT_ENUM_DISCRIMINANT_WIDTH: TagWidth = 1;

/**
 * Options accepted by {@link compileIdl} and the registry.
 */
export interface IdlDecoderOptions {
  /**
   * Length of implicit account discriminators (`sha256("account:<Name>")`).
   * Defaults to 8.
   */
  accountDiscriminatorLength?: number;

  /**
   * Length of implicit instruction discriminators (`sha256("global:<name>")`).
   * Defaults to 8.
   */
  instructionDiscriminatorLength?: number;

  /**
   * Discriminant width for enums that do not declare one. Defaults to 1.
   */
  enumDiscriminantWidth?: TagWidth;

  /**
   * Logging options.
   */
  logging?: LoggingOptions;
}

/**
 * Options with every default applied.
 */
export interface ResolvedDecoderOptions {
  accountDiscriminatorLength: number;
  instructionDiscriminatorLength: number;
  enumDiscriminantWidth: TagWidth;
  logger: Logger;
}

/**
 * Defaults merged under user options by {@link resolveOptions}.
 */
export const DEFAULT_DECODER_OPTIONS = {
  accountDiscriminatorLength: DEFAULT_DISCRIMINATOR_LENGTH,
  instructionDiscriminatorLength: DEFAULT_DISCRIMINATOR_LENGTH,
  enumDiscriminantWidth: DEFAULT_ENUM_DISCRIMINANT_WIDTH,
} as const satisfies Omit<ResolvedDecoderOptions, 'logger'>;

/**
 * Apply defaults and validate decoder options.
 *
 * @throws RangeError if a discriminator length or enum width is out of range
 */
export function resolveOptions(options: IdlDecoderOptions = {}): ResolvedDecoderOptions {
  const accountDiscriminatorLength =
    options.accountDiscriminatorLength ?? DEFAULT_DECODER_OPTIONS.accountDiscriminatorLength;
  const instructionDiscriminatorLength =
    options.instructionDiscriminatorLength ??
    DEFAULT_DECODER_OPTIONS.instructionDiscriminatorLength;
  const enumDiscriminantWidth =
    options.enumDiscriminantWidth ?? DEFAULT_DECODER_OPTIONS.enumDiscriminantWidth;

  assertDiscriminatorLength('accountDiscriminatorLength', accountDiscriminatorLength);
  assertDiscriminatorLength('instructionDiscriminatorLength', instructionDiscriminatorLength);
  if (![1, 2, 4].includes(enumDiscriminantWidth)) {
    throw new RangeError(`enumDiscriminantWidth must be 1, 2 or 4, got ${enumDiscriminantWidth}`);
  }

  return {
    accountDiscriminatorLength,
    instructionDiscriminatorLength,
    enumDiscriminantWidth,
    logger: createLogger(options.logging),
  };
}

function assertDiscriminatorLength(option: string, value: number): void {
  if (!Number.isInteger(value) || value < 1 || value > MAX_DISCRIMINATOR_LENGTH) {
    throw new RangeError(
      `${option} must be an integer between 1 and ${MAX_DISCRIMINATOR_LENGTH}, got ${value}`
    );
  }
}
