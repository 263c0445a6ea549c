/**
 * Human-readable error messages for IDL errors.
 *
 * @packageDocumentation
 */

import type { IdlErrorType } from './errors.js';

/**
 * Get a human-readable error message for an IDL error.
 */
export function getErrorMessage(error: IdlErrorType): string {
  switch (error.code) {
    case 'DUPLICATE_TYPE_NAME':
      return `The IDL declares "${error.typeName}" more than once (${error.path}).`;
    case 'MALFORMED_DECLARATION':
      return `The IDL is malformed at ${error.path}: ${error.reason}.`;
    case 'UNKNOWN_TYPE_NAME':
      return `The IDL references "${error.typeName}" but never declares it (${error.path}).`;
    case 'UNRESOLVABLE_RECURSION':
      return `Type ${error.cycle.join(' -> ')} contains itself directly and has no finite layout. Wrap the reference in an Option or Vec.`;
    case 'MALFORMED_TYPE_EXPRESSION':
      return `Unsupported type at ${error.path}: ${error.reason}.`;
    case 'TRUNCATED_BUFFER':
      return `Data ended early while reading ${error.path}: ${error.bytesNeeded} more bytes were needed at offset ${error.offset}, only ${error.available} remain.`;
    case 'INVALID_UTF8':
      return `The string at ${error.path} (offset ${error.offset}) is not valid UTF-8.`;
    case 'INVALID_OPTION_TAG':
      return `The optional value at ${error.path} has tag ${error.tag} at offset ${error.offset}; expected 0 or 1.`;
    case 'INVALID_DISCRIMINANT':
      return `The enum at ${error.path} has discriminant ${error.discriminant} at offset ${error.offset}, but only ${error.variantCount} variants exist.`;
    case 'INVALID_BOOLEAN':
      return `The bool at ${error.path} has byte ${error.byte} at offset ${error.offset}; expected 0 or 1.`;
    case 'INVALID_LENGTH':
      return `The sequence at ${error.path} claims ${error.length} elements at offset ${error.offset}, more than the ${error.available} bytes that remain can hold.`;
    case 'MALFORMED_SCHEMA_DATA':
      return `The serialized schema is malformed at ${error.path} (offset ${error.offset}): ${error.reason}.`;
    case 'UNKNOWN_DISCRIMINATOR':
      return `The data does not start with any known ${error.target} discriminator (got ${error.discriminator}).`;
    case 'PROGRAM_NOT_REGISTERED':
      return `No IDL is registered for program ${error.programId}.`;
    default:
      return error satisfies never;
  }
}

/**
 * Get a short title for an IDL error, suitable for headings in a UI.
 */
export function getErrorTitle(error: IdlErrorType): string {
  switch (error.code) {
    case 'DUPLICATE_TYPE_NAME':
    case 'MALFORMED_DECLARATION':
    case 'UNKNOWN_TYPE_NAME':
    case 'UNRESOLVABLE_RECURSION':
    case 'MALFORMED_TYPE_EXPRESSION':
      return 'Invalid IDL';
    case 'TRUNCATED_BUFFER':
      return 'Data Too Short';
    case 'INVALID_UTF8':
    case 'INVALID_OPTION_TAG':
    case 'INVALID_DISCRIMINANT':
    case 'INVALID_BOOLEAN':
    case 'INVALID_LENGTH':
    case 'MALFORMED_SCHEMA_DATA':
      return 'Corrupt Data';
    case 'UNKNOWN_DISCRIMINATOR':
      return 'Unknown Data Type';
    case 'PROGRAM_NOT_REGISTERED':
      return 'Program Not Registered';
    default:
      return error satisfies never;
  }
}
