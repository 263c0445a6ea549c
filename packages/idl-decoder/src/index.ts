/**
 * @idlwire/decoder - compile program IDLs into binary layouts and decode
 * account and instruction data into JSON-safe values.
 *
 * @packageDocumentation
 */

// Core types
export type {
  ProgramIdl,
  IdlInstruction,
  IdlAccountItem,
  IdlInstructionAccount,
  IdlInstructionAccountGroup,
  IdlDiscriminant,
  IdlField,
  IdlType,
  IdlTypeName,
  IdlTypeDefTy,
  IdlAccountDef,
  IdlEnumVariant,
  IdlTypeDef,
} from './types.js';

// Program (main API)
export { compileIdl, CompiledIdl } from './program.js';
export type {
  CompiledAccount,
  CompiledInstruction,
  ParsedAccount,
  ParsedInstruction,
} from './program.js';

// Registry
export { IdlDecoderRegistry } from './registry.js';

// IDL loading and parsing
export { loadIdlFromJson } from './loader.js';
export { parseIdl } from './parser.js';
export type {
  ParsedIdl,
  SymbolTable,
  TypeDeclaration,
  StructDeclaration,
  EnumDeclaration,
  AliasDeclaration,
  VariantDeclaration,
  FieldsDeclaration,
  FieldDeclaration,
  TupleElementDeclaration,
  AccountDeclaration,
  InstructionDeclaration,
} from './parser.js';

// Schema compilation
export { SchemaCompiler } from './compiler.js';
export type { SchemaCompilerOptions } from './compiler.js';
export { isPrimitiveName, minWireSize } from './schema.js';
export type {
  SchemaNode,
  SchemaResolver,
  PrimitiveName,
  NumberPrimitiveName,
  BigIntPrimitiveName,
  LengthPrefix,
  TagWidth,
  PrimitiveSchema,
  PublicKeySchema,
  StringSchema,
  BytesSchema,
  RemainingBytesSchema,
  ArraySchema,
  VecSchema,
  OptionSchema,
  TupleSchema,
  StructSchema,
  SchemaField,
  EnumSchema,
  SchemaVariant,
  DefinedSchema,
} from './schema.js';

// Decoding
export { decode } from './decoder.js';
export type { DecodeOptions, DecodeResult } from './decoder.js';
export { getField } from './value.js';
export type {
  ValueNode,
  NumberValue,
  BigIntValue,
  BooleanValue,
  PublicKeyValue,
  StringValue,
  BytesValue,
  ArrayValue,
  TupleValue,
  OptionValue,
  StructValue,
  EnumValue,
} from './value.js';

// Schema serialization
export {
  serializeSchema,
  deserializeSchema,
  serializeCompiledIdl,
  deserializeCompiledIdl,
  COMPILED_IDL_FORMAT_VERSION,
  MAX_SCHEMA_DEPTH,
} from './serialization.js';

// Formatting
export {
  formatValue,
  formatSchema,
  formatAccount,
  formatInstruction,
  stringifyValue,
} from './formatter.js';
export type { JsonValue } from './formatter.js';

// Discriminators
export {
  accountDiscriminator,
  instructionDiscriminator,
  camelToSnakeCase,
  startsWithDiscriminator,
  discriminatorToHex,
} from './discriminator.js';

// Configuration and logging
export {
  resolveOptions,
  DEFAULT_DECODER_OPTIONS,
  DEFAULT_DISCRIMINATOR_LENGTH,
  DEFAULT_ENUM_DISCRIMINANT_WIDTH,
  MAX_DISCRIMINATOR_LENGTH,
} from './config.js';
export type { IdlDecoderOptions, ResolvedDecoderOptions } from './config.js';
export { createLogger, silentLogger } from './logging.js';
export type { Logger, LoggingOptions, LogLevel } from './logging.js';

// Errors
export * from './errors/index.js';
