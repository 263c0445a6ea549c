/**
 * Type guards and predicates for errors.
 *
 * @packageDocumentation
 */

import {
  type IdlErrorType,
  type IdlCompileErrorType,
  type IdlDecodeErrorType,
  IdlError,
  IdlCompileError,
  IdlDecodeError,
  DuplicateTypeNameError,
  MalformedDeclarationError,
  UnknownTypeNameError,
  UnresolvableRecursionError,
  MalformedTypeExpressionError,
  TruncatedBufferError,
  InvalidUtf8Error,
  InvalidOptionTagError,
  InvalidDiscriminantError,
  InvalidBooleanError,
  InvalidLengthError,
  MalformedSchemaDataError,
  UnknownDiscriminatorError,
  ProgramNotRegisteredError,
} from './errors.js';

/**
 * Check if error is any IDL error.
 */
export function isIdlError(error: unknown): error is IdlErrorType {
  return error instanceof IdlError;
}

/**
 * Check if error was raised while compiling an IDL.
 */
export function isIdlCompileError(error: unknown): error is IdlCompileErrorType {
  return error instanceof IdlCompileError;
}

/**
 * Check if error was raised while decoding bytes.
 */
export function isIdlDecodeError(error: unknown): error is IdlDecodeErrorType {
  return error instanceof IdlDecodeError;
}

/**
 * Check if error is DuplicateTypeNameError.
 */
export function isDuplicateTypeNameError(error: unknown): error is DuplicateTypeNameError {
  return error instanceof DuplicateTypeNameError;
}

/**
 * Check if error is MalformedDeclarationError.
 */
export function isMalformedDeclarationError(error: unknown): error is MalformedDeclarationError {
  return error instanceof MalformedDeclarationError;
}

/**
 * Check if error is UnknownTypeNameError.
 */
export function isUnknownTypeNameError(error: unknown): error is UnknownTypeNameError {
  return error instanceof UnknownTypeNameError;
}

/**
 * Check if error is UnresolvableRecursionError.
 */
export function isUnresolvableRecursionError(error: unknown): error is UnresolvableRecursionError {
  return error instanceof UnresolvableRecursionError;
}

/**
 * Check if error is MalformedTypeExpressionError.
 */
export function isMalformedTypeExpressionError(
  error: unknown
): error is MalformedTypeExpressionError {
  return error instanceof MalformedTypeExpressionError;
}

/**
 * Check if error is TruncatedBufferError.
 */
export function isTruncatedBufferError(error: unknown): error is TruncatedBufferError {
  return error instanceof TruncatedBufferError;
}

/**
 * Check if error is InvalidUtf8Error.
 */
export function isInvalidUtf8Error(error: unknown): error is InvalidUtf8Error {
  return error instanceof InvalidUtf8Error;
}

/**
 * Check if error is InvalidOptionTagError.
 */
export function isInvalidOptionTagError(error: unknown): error is InvalidOptionTagError {
  return error instanceof InvalidOptionTagError;
}

/**
 * Check if error is InvalidDiscriminantError.
 */
export function isInvalidDiscriminantError(error: unknown): error is InvalidDiscriminantError {
  return error instanceof InvalidDiscriminantError;
}

/**
 * Check if error is InvalidBooleanError.
 */
export function isInvalidBooleanError(error: unknown): error is InvalidBooleanError {
  return error instanceof InvalidBooleanError;
}

/**
 * Check if error is InvalidLengthError.
 */
export function isInvalidLengthError(error: unknown): error is InvalidLengthError {
  return error instanceof InvalidLengthError;
}

/**
 * Check if error is MalformedSchemaDataError.
 */
export function isMalformedSchemaDataError(error: unknown): error is MalformedSchemaDataError {
  return error instanceof MalformedSchemaDataError;
}

/**
 * Check if error is UnknownDiscriminatorError.
 */
export function isUnknownDiscriminatorError(error: unknown): error is UnknownDiscriminatorError {
  return error instanceof UnknownDiscriminatorError;
}

/**
 * Check if error is ProgramNotRegisteredError.
 */
export function isProgramNotRegisteredError(error: unknown): error is ProgramNotRegisteredError {
  return error instanceof ProgramNotRegisteredError;
}
