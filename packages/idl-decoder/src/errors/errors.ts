/**
 * Typed error definitions for IDL compilation and binary decoding.
 *
 * @packageDocumentation
 */

/**
 * Base error class for all IDL-related errors.
 */
export class IdlError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'IdlError';
    Object.setPrototypeOf(this, IdlError.prototype);
  }
}

// ============================================================================
// Compile errors
// ============================================================================

/**
 * Base class for errors raised while building the symbol table or compiling schemas.
 * `path` locates the offending declaration or type expression in the IDL document,
 * e.g. `types[3].type.fields[1].type.vec`.
 */
export class IdlCompileError extends IdlError {
  constructor(
    message: string,
    code: string,
    public readonly path: string,
    context?: Record<string, unknown>
  ) {
    super(message, code, { ...context, path });
    this.name = 'IdlCompileError';
    Object.setPrototypeOf(this, IdlCompileError.prototype);
  }
}

/**
 * Error thrown when two type declarations share a name.
 */
export class DuplicateTypeNameError extends IdlCompileError {
  declare readonly code: 'DUPLICATE_TYPE_NAME';

  constructor(
    public readonly typeName: string,
    path: string
  ) {
    super(`Duplicate type name "${typeName}" at ${path}`, 'DUPLICATE_TYPE_NAME', path, {
      typeName,
    });
    this.name = 'DuplicateTypeNameError';
    Object.setPrototypeOf(this, DuplicateTypeNameError.prototype);
  }
}

/**
 * Error thrown when a declaration (type, account, instruction, field or variant)
 * does not have the expected shape.
 */
export class MalformedDeclarationError extends IdlCompileError {
  declare readonly code: 'MALFORMED_DECLARATION';

  constructor(
    public readonly reason: string,
    path: string
  ) {
    super(`Malformed declaration at ${path}: ${reason}`, 'MALFORMED_DECLARATION', path, {
      reason,
    });
    this.name = 'MalformedDeclarationError';
    Object.setPrototypeOf(this, MalformedDeclarationError.prototype);
  }
}

/**
 * Error thrown when a type reference names a type the IDL does not declare.
 */
export class UnknownTypeNameError extends IdlCompileError {
  declare readonly code: 'UNKNOWN_TYPE_NAME';

  constructor(
    public readonly typeName: string,
    path: string
  ) {
    super(`Unknown type "${typeName}" referenced at ${path}`, 'UNKNOWN_TYPE_NAME', path, {
      typeName,
    });
    this.name = 'UnknownTypeNameError';
    Object.setPrototypeOf(this, UnknownTypeNameError.prototype);
  }
}

/**
 * Error thrown when a type refers back to itself without passing through a
 * variable-size container (vec, option, bytes), which would make its size infinite.
 */
export class UnresolvableRecursionError extends IdlCompileError {
  declare readonly code: 'UNRESOLVABLE_RECURSION';

  constructor(
    public readonly cycle: readonly string[],
    path: string
  ) {
    super(
      `Unresolvable recursive type ${cycle.join(' -> ')} at ${path}`,
      'UNRESOLVABLE_RECURSION',
      path,
      { cycle }
    );
    this.name = 'UnresolvableRecursionError';
    Object.setPrototypeOf(this, UnresolvableRecursionError.prototype);
  }
}

/**
 * Error thrown when a type expression is not recognized.
 */
export class MalformedTypeExpressionError extends IdlCompileError {
  declare readonly code: 'MALFORMED_TYPE_EXPRESSION';

  constructor(
    public readonly reason: string,
    path: string,
    public readonly expression?: unknown
  ) {
    super(`Malformed type expression at ${path}: ${reason}`, 'MALFORMED_TYPE_EXPRESSION', path, {
      reason,
      expression,
    });
    this.name = 'MalformedTypeExpressionError';
    Object.setPrototypeOf(this, MalformedTypeExpressionError.prototype);
  }
}

// ============================================================================
// Decode errors
// ============================================================================

/**
 * Base class for errors raised while decoding bytes against a schema.
 * `offset` is the absolute byte offset of the failed read and `path` the
 * schema path being decoded, e.g. `Vault.owners[2]`.
 */
export class IdlDecodeError extends IdlError {
  constructor(
    message: string,
    code: string,
    public readonly offset: number,
    public readonly path: string,
    context?: Record<string, unknown>
  ) {
    super(message, code, { ...context, offset, path });
    this.name = 'IdlDecodeError';
    Object.setPrototypeOf(this, IdlDecodeError.prototype);
  }
}

/**
 * Error thrown when the buffer ends before a read completes.
 */
export class TruncatedBufferError extends IdlDecodeError {
  declare readonly code: 'TRUNCATED_BUFFER';

  constructor(
    offset: number,
    public readonly bytesNeeded: number,
    public readonly available: number,
    path: string
  ) {
    super(
      `Buffer truncated at offset ${offset} (${path}): needed ${bytesNeeded} bytes, ${available} available`,
      'TRUNCATED_BUFFER',
      offset,
      path,
      { bytesNeeded, available }
    );
    this.name = 'TruncatedBufferError';
    Object.setPrototypeOf(this, TruncatedBufferError.prototype);
  }
}

/**
 * Error thrown when string bytes are not valid UTF-8.
 */
export class InvalidUtf8Error extends IdlDecodeError {
  declare readonly code: 'INVALID_UTF8';

  constructor(offset: number, path: string, cause?: unknown) {
    super(`Invalid UTF-8 string at offset ${offset} (${path})`, 'INVALID_UTF8', offset, path, {
      cause,
    });
    this.name = 'InvalidUtf8Error';
    Object.setPrototypeOf(this, InvalidUtf8Error.prototype);
  }
}

/**
 * Error thrown when an option presence tag is neither 0 nor 1.
 */
export class InvalidOptionTagError extends IdlDecodeError {
  declare readonly code: 'INVALID_OPTION_TAG';

  constructor(
    offset: number,
    public readonly tag: number,
    path: string
  ) {
    super(
      `Invalid option tag ${tag} at offset ${offset} (${path})`,
      'INVALID_OPTION_TAG',
      offset,
      path,
      { tag }
    );
    this.name = 'InvalidOptionTagError';
    Object.setPrototypeOf(this, InvalidOptionTagError.prototype);
  }
}

/**
 * Error thrown when an enum discriminant has no matching variant.
 */
export class InvalidDiscriminantError extends IdlDecodeError {
  declare readonly code: 'INVALID_DISCRIMINANT';

  constructor(
    offset: number,
    public readonly discriminant: number,
    public readonly variantCount: number,
    path: string
  ) {
    super(
      `Invalid enum discriminant ${discriminant} at offset ${offset} (${path}): expected less than ${variantCount}`,
      'INVALID_DISCRIMINANT',
      offset,
      path,
      { discriminant, variantCount }
    );
    this.name = 'InvalidDiscriminantError';
    Object.setPrototypeOf(this, InvalidDiscriminantError.prototype);
  }
}

/**
 * Error thrown when a bool byte is neither 0 nor 1.
 */
export class InvalidBooleanError extends IdlDecodeError {
  declare readonly code: 'INVALID_BOOLEAN';

  constructor(
    offset: number,
    public readonly byte: number,
    path: string
  ) {
    super(`Invalid bool byte ${byte} at offset ${offset} (${path})`, 'INVALID_BOOLEAN', offset, path, {
      byte,
    });
    this.name = 'InvalidBooleanError';
    Object.setPrototypeOf(this, InvalidBooleanError.prototype);
  }
}

/**
 * Error thrown when a sequence length cannot fit in the bytes that remain.
 * Raised for sequences whose elements may encode to zero bytes, where the
 * length alone would otherwise drive the element count.
 */
export class InvalidLengthError extends IdlDecodeError {
  declare readonly code: 'INVALID_LENGTH';

  constructor(
    offset: number,
    public readonly length: number,
    public readonly available: number,
    path: string
  ) {
    super(
      `Invalid sequence length ${length} at offset ${offset} (${path}): only ${available} bytes remain`,
      'INVALID_LENGTH',
      offset,
      path,
      { length, available }
    );
    this.name = 'InvalidLengthError';
    Object.setPrototypeOf(this, InvalidLengthError.prototype);
  }
}

/**
 * Error thrown when a serialized schema cannot be read back.
 */
export class MalformedSchemaDataError extends IdlDecodeError {
  declare readonly code: 'MALFORMED_SCHEMA_DATA';

  constructor(
    offset: number,
    public readonly reason: string,
    path: string
  ) {
    super(
      `Malformed schema data at offset ${offset} (${path}): ${reason}`,
      'MALFORMED_SCHEMA_DATA',
      offset,
      path,
      { reason }
    );
    this.name = 'MalformedSchemaDataError';
    Object.setPrototypeOf(this, MalformedSchemaDataError.prototype);
  }
}

/**
 * Error thrown when account or instruction data starts with a discriminator
 * the IDL does not declare.
 */
export class UnknownDiscriminatorError extends IdlDecodeError {
  declare readonly code: 'UNKNOWN_DISCRIMINATOR';

  constructor(
    public readonly target: 'account' | 'instruction',
    public readonly discriminator: string
  ) {
    super(
      `No ${target} matches discriminator ${discriminator}`,
      'UNKNOWN_DISCRIMINATOR',
      0,
      target,
      { target, discriminator }
    );
    this.name = 'UnknownDiscriminatorError';
    Object.setPrototypeOf(this, UnknownDiscriminatorError.prototype);
  }
}

// ============================================================================
// Registry errors
// ============================================================================

/**
 * Error thrown when decoding for a program that has no registered IDL.
 */
export class ProgramNotRegisteredError extends IdlError {
  declare readonly code: 'PROGRAM_NOT_REGISTERED';

  constructor(public readonly programId: string) {
    super(
      `Program ${programId} not registered. Call registerProgramFromJson() first.`,
      'PROGRAM_NOT_REGISTERED',
      { programId }
    );
    this.name = 'ProgramNotRegisteredError';
    Object.setPrototypeOf(this, ProgramNotRegisteredError.prototype);
  }
}

/**
 * Union type of all compile errors.
 */
export type IdlCompileErrorType =
  | DuplicateTypeNameError
  | MalformedDeclarationError
  | UnknownTypeNameError
  | UnresolvableRecursionError
  | MalformedTypeExpressionError;

/**
 * Union type of all decode errors.
 */
export type IdlDecodeErrorType =
  | TruncatedBufferError
  | InvalidUtf8Error
  | InvalidOptionTagError
  | InvalidDiscriminantError
  | InvalidBooleanError
  | InvalidLengthError
  | MalformedSchemaDataError
  | UnknownDiscriminatorError;

/**
 * Union type of all IDL errors.
 */
export type IdlErrorType = IdlCompileErrorType | IdlDecodeErrorType | ProgramNotRegisteredError;
