/**
 * IDL type definitions for Solana programs.
 * Covers both the legacy Anchor JSON format and the 0.30+ format.
 *
 * These types describe well-formed input. {@link parseIdl} accepts `unknown`
 * and validates the document itself.
 *
 * @packageDocumentation
 */

/**
 * Root IDL structure for a Solana program.
 */
export interface ProgramIdl {
  /**
   * IDL version.
   */
  version?: string;

  /**
   * Program name (legacy format; 0.30+ puts it in `metadata`).
   */
  name?: string;

  /**
   * Program address (0.30+ format).
   */
  address?: string;

  /**
   * List of instructions exposed by the program.
   */
  instructions?: IdlInstruction[];

  /**
   * Account declarations. Legacy IDLs carry the layout inline in `type`.
   */
  accounts?: IdlAccountDef[];

  /**
   * Type definitions for complex types (structs, enums, etc.).
   */
  types?: IdlTypeDef[];

  /**
   * Program metadata.
   */
  metadata?: {
    name?: string;
    version?: string;
    address?: string;
  };
}

/**
 * Instruction definition in IDL.
 */
export interface IdlInstruction {
  /**
   * Instruction name. The implicit discriminator hashes its snake_case form.
   */
  name: string;

  /**
   * Accounts required by this instruction, possibly nested in groups.
   */
  accounts?: IdlAccountItem[];

  /**
   * Instruction arguments/parameters.
   */
  args?: IdlField[];

  /**
   * Explicit discriminator bytes (0.30+ format).
   */
  discriminator?: number[];

  /**
   * Explicit discriminant (legacy non-Anchor programs).
   */
  discriminant?: IdlDiscriminant;

  /**
   * Documentation strings.
   */
  docs?: string[];
}

/**
 * Discriminant written as an integer of the given width.
 */
export interface IdlDiscriminant {
  type: 'u8' | 'u16' | 'u32' | 'u64';
  value: number;
}

/**
 * Account item in instruction definition.
 */
export type IdlAccountItem = IdlInstructionAccount | IdlInstructionAccountGroup;

export interface IdlInstructionAccount {
  name: string;
  isMut?: boolean;
  isSigner?: boolean;
  writable?: boolean;
  signer?: boolean;
  optional?: boolean;
  docs?: string[];
}

/**
 * Composite group of accounts, flattened in declaration order.
 */
export interface IdlInstructionAccountGroup {
  name: string;
  accounts: IdlAccountItem[];
}

/**
 * A named argument or struct field.
 */
export interface IdlField {
  name: string;
  type: IdlType;
  docs?: string[];
}

/**
 * Named primitive and built-in types.
 */
export type IdlTypeName =
  | 'bool'
  | 'u8'
  | 'u16'
  | 'u32'
  | 'u64'
  | 'u128'
  | 'i8'
  | 'i16'
  | 'i32'
  | 'i64'
  | 'i128'
  | 'f32'
  | 'f64'
  | 'string'
  | 'publicKey'
  | 'pubkey'
  | 'bytes'
  | 'bytes_remaining'
  | 'rest';

/**
 * IDL type expression.
 * The parser also accepts a bare type name in place of `{ defined }` and
 * the `"[T; N]"` array shorthand.
 */
export type IdlType =
  | IdlTypeName
  | { vec: IdlType }
  | { option: IdlType }
  | { coption: IdlType }
  | { array: [IdlType, number] }
  | { tuple: IdlType[] }
  | { defined: string | { name: string } };

/**
 * Body of a type definition.
 */
export type IdlTypeDefTy =
  | {
      kind: 'struct';
      /**
       * Named fields, or bare types for a tuple struct. Omitted for a unit struct.
       */
      fields?: IdlField[] | IdlType[];
    }
  | {
      kind: 'enum';
      variants: IdlEnumVariant[];
      /**
       * Discriminant width. Borsh uses `u8`.
       */
      discriminant?: 'u8' | 'u16' | 'u32';
    }
  | {
      kind: 'type';
      alias: IdlType;
    };

/**
 * Account declaration. Legacy IDLs carry the layout inline in `type`;
 * otherwise it is looked up in `types` under the same name.
 */
export interface IdlAccountDef {
  name: string;
  type?: IdlTypeDefTy;
  discriminator?: number[];
  discriminant?: IdlDiscriminant;
  docs?: string[];
}

export interface IdlEnumVariant {
  name: string;
  /**
   * Named fields, or bare types for a tuple variant. Omitted for a unit variant.
   */
  fields?: IdlField[] | IdlType[];
  docs?: string[];
}

export interface IdlTypeDef {
  name: string;
  type: IdlTypeDefTy;
  docs?: string[];
}
