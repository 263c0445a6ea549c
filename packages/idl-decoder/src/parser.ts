/**
 * IDL parser and symbol table builder.
 *
 * Validates the shape of an IDL document and indexes its type declarations by
 * name. Type expressions are carried through unvalidated; compiling them is the
 * job of {@link SchemaCompiler}.
 *
 * @packageDocumentation
 */

import { getU16Encoder, getU32Encoder, getU64Encoder, getU8Encoder } from '@solana/codecs';
import { DuplicateTypeNameError, MalformedDeclarationError } from './errors/index.js';
import type { TagWidth } from './schema.js';

// ============================================================================
// Declarations
// ============================================================================

export interface FieldDeclaration {
  name: string;
  /**
   * Raw type expression, compiled later.
   */
  type: unknown;
  /**
   * Location of the type expression in the IDL document.
   */
  path: string;
}

export interface TupleElementDeclaration {
  type: unknown;
  path: string;
}

/**
 * Body of a struct or enum variant: named fields or positional elements.
 */
export type FieldsDeclaration =
  | { kind: 'named'; fields: FieldDeclaration[] }
  | { kind: 'tuple'; elements: TupleElementDeclaration[] };

export interface StructDeclaration {
  kind: 'struct';
  name: string;
  path: string;
  body: FieldsDeclaration;
}

export interface VariantDeclaration {
  name: string;
  path: string;
  /**
   * `null` for a unit variant.
   */
  payload: FieldsDeclaration | null;
}

export interface EnumDeclaration {
  kind: 'enum';
  name: string;
  path: string;
  variants: VariantDeclaration[];
  /**
   * Declared discriminant width, if the IDL sets one.
   */
  tagWidth?: TagWidth;
}

/**
 * Type alias (`{ kind: "type", alias: T }`).
 */
export interface AliasDeclaration {
  kind: 'alias';
  name: string;
  path: string;
  type: unknown;
  typePath: string;
}

export type TypeDeclaration = StructDeclaration | EnumDeclaration | AliasDeclaration;

/**
 * Type declarations keyed by name, in declaration order.
 */
export type SymbolTable = ReadonlyMap<string, TypeDeclaration>;

export interface AccountDeclaration {
  name: string;
  path: string;
  /**
   * Explicit discriminator, if the IDL declares one.
   */
  discriminator?: Uint8Array;
}

export interface InstructionDeclaration {
  name: string;
  path: string;
  /**
   * Account names, flattened in declaration order.
   */
  accounts: string[];
  args: FieldDeclaration[];
  /**
   * Explicit discriminator, if the IDL declares one.
   */
  discriminator?: Uint8Array;
}

export interface ParsedIdl {
  /**
   * Program name, `""` when the IDL does not carry one.
   */
  name: string;
  address?: string;
  symbols: SymbolTable;
  accounts: AccountDeclaration[];
  instructions: InstructionDeclaration[];
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse an IDL document into a symbol table plus account and instruction declarations.
 *
 * Inline account layouts (legacy format) are merged into the symbol table unless
 * `types` already declares a type of the same name.
 *
 * @param idl - Raw IDL object, typically the result of `JSON.parse`
 * @throws DuplicateTypeNameError if two declarations share a name
 * @throws MalformedDeclarationError if a declaration has the wrong shape
 *
 * @example
 * ```ts
 * const parsed = parseIdl(JSON.parse(idlJson));
 * parsed.symbols.get('Vault'); // { kind: 'struct', ... }
 * ```
 */
export function parseIdl(idl: unknown): ParsedIdl {
  const root = requireRecord(idl, '(root)', 'IDL must be an object');
  const metadata = isRecord(root.metadata) ? root.metadata : undefined;

  const name = optionalString(root.name) ?? optionalString(metadata?.name) ?? '';
  const address = optionalString(root.address) ?? optionalString(metadata?.address);

  const symbols = new Map<string, TypeDeclaration>();

  optionalArray(root.types, 'types').forEach((raw, index) => {
    const path = `types[${index}]`;
    const typeDef = requireRecord(raw, path, 'type definition must be an object');
    const typeName = requireName(typeDef, path);
    if (symbols.has(typeName)) {
      throw new DuplicateTypeNameError(typeName, path);
    }
    symbols.set(typeName, parseTypeBody(typeName, typeDef.type, `${path}.type`));
  });

  const inlineAccounts = new Set<string>();
  const accounts = optionalArray(root.accounts, 'accounts').map((raw, index) => {
    const path = `accounts[${index}]`;
    const account = requireRecord(raw, path, 'account must be an object');
    const accountName = requireName(account, path);

    if (account.type !== undefined) {
      if (inlineAccounts.has(accountName)) {
        throw new DuplicateTypeNameError(accountName, path);
      }
      inlineAccounts.add(accountName);
      // A proper `types` entry wins over the inline layout.
      if (!symbols.has(accountName)) {
        symbols.set(accountName, parseTypeBody(accountName, account.type, `${path}.type`));
      }
    }

    const declaration: AccountDeclaration = { name: accountName, path };
    const discriminator = parseDiscriminator(account, path);
    if (discriminator) {
      declaration.discriminator = discriminator;
    }
    return declaration;
  });

  const instructions = optionalArray(root.instructions, 'instructions').map((raw, index) =>
    parseInstruction(raw, `instructions[${index}]`)
  );

  const result: ParsedIdl = { name, symbols, accounts, instructions };
  if (address) {
    result.address = address;
  }
  return result;
}

/**
 * Parse an instruction declaration.
 */
function parseInstruction(raw: unknown, path: string): InstructionDeclaration {
  const instruction = requireRecord(raw, path, 'instruction must be an object');
  const name = requireName(instruction, path);

  const accounts: string[] = [];
  collectAccountNames(optionalArray(instruction.accounts, `${path}.accounts`), `${path}.accounts`, accounts);

  const args = optionalArray(instruction.args, `${path}.args`).map((arg, index) =>
    parseField(arg, `${path}.args[${index}]`)
  );

  const declaration: InstructionDeclaration = { name, path, accounts, args };
  const discriminator = parseDiscriminator(instruction, path);
  if (discriminator) {
    declaration.discriminator = discriminator;
  }
  return declaration;
}

/**
 * Flatten instruction accounts, descending into composite groups.
 */
function collectAccountNames(items: unknown[], path: string, into: string[]): void {
  items.forEach((raw, index) => {
    const itemPath = `${path}[${index}]`;
    const item = requireRecord(raw, itemPath, 'account item must be an object');
    if (Array.isArray(item.accounts)) {
      collectAccountNames(item.accounts, `${itemPath}.accounts`, into);
      return;
    }
    into.push(requireName(item, itemPath));
  });
}

/**
 * Parse a struct, enum or alias body.
 */
function parseTypeBody(name: string, raw: unknown, path: string): TypeDeclaration {
  const body = requireRecord(raw, path, 'type body must be an object');

  switch (body.kind) {
    case 'struct':
      return {
        kind: 'struct',
        name,
        path,
        body:
          body.fields === undefined
            ? { kind: 'named', fields: [] }
            : parseFieldList(body.fields, `${path}.fields`),
      };

    case 'enum': {
      if (!Array.isArray(body.variants)) {
        throw new MalformedDeclarationError('enum must have a variants array', path);
      }
      const declaration: EnumDeclaration = {
        kind: 'enum',
        name,
        path,
        variants: body.variants.map((variant, index) =>
          parseVariant(variant, `${path}.variants[${index}]`)
        ),
      };
      if (body.discriminant !== undefined) {
        declaration.tagWidth = parseTagWidth(body.discriminant, `${path}.discriminant`);
      }
      return declaration;
    }

    case 'type':
      if (body.alias === undefined) {
        throw new MalformedDeclarationError('type alias must have an alias', path);
      }
      return { kind: 'alias', name, path, type: body.alias, typePath: `${path}.alias` };

    default:
      throw new MalformedDeclarationError(`unknown kind ${JSON.stringify(body.kind)}`, path);
  }
}

/**
 * Parse an enum variant.
 */
function parseVariant(raw: unknown, path: string): VariantDeclaration {
  const variant = requireRecord(raw, path, 'variant must be an object');
  const name = requireName(variant, path);

  if (variant.fields === undefined) {
    return { name, path, payload: null };
  }
  const payload = parseFieldList(variant.fields, `${path}.fields`);
  const empty = payload.kind === 'named' ? payload.fields.length === 0 : payload.elements.length === 0;
  return { name, path, payload: empty ? null : payload };
}

/**
 * Parse a field list: either all named fields or all bare type expressions.
 */
function parseFieldList(raw: unknown, path: string): FieldsDeclaration {
  if (!Array.isArray(raw)) {
    throw new MalformedDeclarationError('fields must be an array', path);
  }

  const named = raw.filter(isNamedField).length;
  if (named === raw.length) {
    const fields = raw.map((field, index) => parseField(field, `${path}[${index}]`));
    const seen = new Set<string>();
    fields.forEach((field, index) => {
      if (seen.has(field.name)) {
        throw new MalformedDeclarationError(`duplicate field "${field.name}"`, `${path}[${index}]`);
      }
      seen.add(field.name);
    });
    return { kind: 'named', fields };
  }
  if (named === 0) {
    return {
      kind: 'tuple',
      elements: raw.map((type, index) => ({ type, path: `${path}[${index}]` })),
    };
  }
  throw new MalformedDeclarationError('fields mix named fields and bare types', path);
}

/**
 * Parse a field definition.
 */
function parseField(raw: unknown, path: string): FieldDeclaration {
  const field = requireRecord(raw, path, 'field must be an object');
  const name = requireName(field, path);
  if (field.type === undefined) {
    throw new MalformedDeclarationError(`field "${name}" must have a type`, path);
  }
  return { name, type: field.type, path: `${path}.type` };
}

function isNamedField(value: unknown): boolean {
  return isRecord(value) && typeof value.name === 'string' && 'type' in value;
}

/**
 * Parse an explicit discriminator: a byte array (`discriminator`) or an integer
 * of a given width (`discriminant`). Returns undefined when neither is present.
 */
function parseDiscriminator(
  declaration: Record<string, unknown>,
  path: string
): Uint8Array | undefined {
  if (declaration.discriminator !== undefined) {
    return parseDiscriminatorBytes(declaration.discriminator, `${path}.discriminator`);
  }
  if (declaration.discriminant !== undefined) {
    return parseDiscriminant(declaration.discriminant, `${path}.discriminant`);
  }
  return undefined;
}

function parseDiscriminatorBytes(raw: unknown, path: string): Uint8Array {
  if (!Array.isArray(raw) || raw.length === 0) {
    throw new MalformedDeclarationError('discriminator must be a non-empty byte array', path);
  }
  const bytes = new Uint8Array(raw.length);
  raw.forEach((byte, index) => {
    if (typeof byte !== 'number' || !Number.isInteger(byte) || byte < 0 || byte > 255) {
      throw new MalformedDeclarationError(
        `discriminator byte ${JSON.stringify(byte)} is not in 0..255`,
        `${path}[${index}]`
      );
    }
    bytes[index] = byte;
  });
  return bytes;
}

const DISCRIMINANT_LIMITS = {
  u8: 0xff,
  u16: 0xffff,
  u32: 0xffff_ffff,
  u64: Number.MAX_SAFE_INTEGER,
} as const;

function parseDiscriminant(raw: unknown, path: string): Uint8Array {
  const discriminant = requireRecord(raw, path, 'discriminant must be an object');
  const { type, value } = discriminant;

  if (type !== 'u8' && type !== 'u16' && type !== 'u32' && type !== 'u64') {
    throw new MalformedDeclarationError(
      `discriminant type must be u8, u16, u32 or u64, got ${JSON.stringify(type)}`,
      `${path}.type`
    );
  }
  if (
    typeof value !== 'number' ||
    !Number.isInteger(value) ||
    value < 0 ||
    value > DISCRIMINANT_LIMITS[type]
  ) {
    throw new MalformedDeclarationError(
      `discriminant value ${JSON.stringify(value)} does not fit in ${type}`,
      `${path}.value`
    );
  }

  switch (type) {
    case 'u8':
      return Uint8Array.from(getU8Encoder().encode(value));
    case 'u16':
      return Uint8Array.from(getU16Encoder().encode(value));
    case 'u32':
      return Uint8Array.from(getU32Encoder().encode(value));
    case 'u64':
      return Uint8Array.from(getU64Encoder().encode(value));
  }
}

function parseTagWidth(raw: unknown, path: string): TagWidth {
  switch (raw) {
    case 'u8':
      return 1;
    case 'u16':
      return 2;
    case 'u32':
      return 4;
    default:
      throw new MalformedDeclarationError(
        `enum discriminant must be u8, u16 or u32, got ${JSON.stringify(raw)}`,
        path
      );
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireRecord(value: unknown, path: string, message: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new MalformedDeclarationError(message, path);
  }
  return value;
}

function requireName(declaration: Record<string, unknown>, path: string): string {
  const { name } = declaration;
  if (typeof name !== 'string' || name.length === 0) {
    throw new MalformedDeclarationError('missing name', path);
  }
  return name;
}

function optionalArray(value: unknown, path: string): unknown[] {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new MalformedDeclarationError('expected an array', path);
  }
  return value;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}
