/**
 * Whole-program compilation: every account and instruction of an IDL, keyed
 * by discriminator, ready to decode raw account data and instruction data.
 *
 * @packageDocumentation
 */

import { SchemaCompiler } from './compiler.js';
import { resolveOptions, type IdlDecoderOptions, type ResolvedDecoderOptions } from './config.js';
import { decode } from './decoder.js';
import {
  accountDiscriminator,
  discriminatorToHex,
  instructionDiscriminator,
  startsWithDiscriminator,
} from './discriminator.js';
import {
  TruncatedBufferError,
  UnknownDiscriminatorError,
  UnknownTypeNameError,
} from './errors/index.js';
import { parseIdl } from './parser.js';
import type { SchemaNode, SchemaResolver, StructSchema } from './schema.js';
import type { ValueNode } from './value.js';

/**
 * An account type with its discriminator and compiled layout.
 */
export interface CompiledAccount {
  readonly name: string;
  readonly discriminator: Uint8Array;
  readonly schema: SchemaNode;
}

/**
 * An instruction with its discriminator, account names and compiled argument layout.
 */
export interface CompiledInstruction {
  readonly name: string;
  readonly discriminator: Uint8Array;
  readonly accounts: readonly string[];
  readonly schema: StructSchema;
}

/**
 * Decoded account data.
 */
export interface ParsedAccount {
  name: string;
  schema: SchemaNode;
  value: ValueNode;
}

/**
 * Decoded instruction data.
 */
export interface ParsedInstruction {
  name: string;
  schema: StructSchema;
  /**
   * Instruction accounts paired with the names the IDL gives them.
   * Accounts past the declared list are named `Account <n>`.
   */
  accounts: Array<{ name: string; address: string }>;
  value: ValueNode;
}

type Target = 'account' | 'instruction';

/**
 * A compiled IDL.
 *
 * @example
 * ```ts
 * const program = compileIdl(JSON.parse(idlJson));
 * const { name, value } = program.decodeAccount(accountData);
 * console.log(name, formatValue(value));
 * ```
 */
export class CompiledIdl implements SchemaResolver {
  private readonly accountsByName = new Map<string, CompiledAccount>();
  private readonly instructionsByName = new Map<string, CompiledInstruction>();
  private readonly accountMatchers: CompiledAccount[] = [];
  private readonly instructionMatchers: CompiledInstruction[] = [];

  constructor(
    readonly name: string,
    readonly address: string | undefined,
    private readonly types: SchemaResolver,
    accounts: readonly CompiledAccount[],
    instructions: readonly CompiledInstruction[],
    private readonly options: ResolvedDecoderOptions
  ) {
    for (const account of accounts) {
      this.accountsByName.set(account.name, account);
      this.addMatcher('account', this.accountMatchers, account);
    }
    for (const instruction of instructions) {
      this.instructionsByName.set(instruction.name, instruction);
      this.addMatcher('instruction', this.instructionMatchers, instruction);
    }
    // Longest discriminator first, so a short one never shadows a longer match.
    this.accountMatchers.sort((a, b) => b.discriminator.length - a.discriminator.length);
    this.instructionMatchers.sort((a, b) => b.discriminator.length - a.discriminator.length);
  }

  /**
   * All account types, in declaration order.
   */
  get accounts(): CompiledAccount[] {
    return [...this.accountsByName.values()];
  }

  /**
   * All instructions, in declaration order.
   */
  get instructions(): CompiledInstruction[] {
    return [...this.instructionsByName.values()];
  }

  account(name: string): CompiledAccount | undefined {
    return this.accountsByName.get(name);
  }

  instruction(name: string): CompiledInstruction | undefined {
    return this.instructionsByName.get(name);
  }

  /**
   * Compiled schema of any named type in the IDL.
   */
  resolve(name: string): SchemaNode {
    return this.types.resolve(name);
  }

  /**
   * Find the account type whose discriminator prefixes the data.
   */
  identifyAccount(data: Uint8Array): CompiledAccount | undefined {
    return this.accountMatchers.find((account) =>
      startsWithDiscriminator(data, account.discriminator)
    );
  }

  /**
   * Find the instruction whose discriminator prefixes the data.
   */
  identifyInstruction(data: Uint8Array): CompiledInstruction | undefined {
    return this.instructionMatchers.find((instruction) =>
      startsWithDiscriminator(data, instruction.discriminator)
    );
  }

  /**
   * Identify and decode account data.
   *
   * @throws UnknownDiscriminatorError if no account type matches
   * @throws TruncatedBufferError if the data is shorter than any discriminator
   */
  decodeAccount(data: Uint8Array): ParsedAccount {
    const account = this.identifyAccount(data);
    if (!account) {
      throw this.unmatched('account', this.accountMatchers, data);
    }
    return this.decodeAccountWith(account, data);
  }

  /**
   * Decode account data as a known account type, skipping its discriminator.
   *
   * @throws UnknownTypeNameError if the IDL declares no such account
   */
  decodeAccountAs(name: string, data: Uint8Array): ParsedAccount {
    const account = this.accountsByName.get(name);
    if (!account) {
      throw new UnknownTypeNameError(name, 'accounts');
    }
    return this.decodeAccountWith(account, data);
  }

  /**
   * Identify and decode instruction data.
   *
   * @param data - Instruction data, discriminator included
   * @param accountKeys - Addresses of the instruction's accounts, in order
   * @throws UnknownDiscriminatorError if no instruction matches
   * @throws TruncatedBufferError if the data is shorter than any discriminator
   */
  decodeInstruction(data: Uint8Array, accountKeys: readonly string[] = []): ParsedInstruction {
    const instruction = this.identifyInstruction(data);
    if (!instruction) {
      throw this.unmatched('instruction', this.instructionMatchers, data);
    }

    const { value } = decode(instruction.schema, data, {
      offset: instruction.discriminator.length,
      resolver: this,
      path: instruction.name,
    });

    return {
      name: instruction.name,
      schema: instruction.schema,
      accounts: accountKeys.map((address, index) => ({
        name: instruction.accounts[index] ?? `Account ${index + 1}`,
        address,
      })),
      value,
    };
  }

  private decodeAccountWith(account: CompiledAccount, data: Uint8Array): ParsedAccount {
    const { value } = decode(account.schema, data, {
      skipDiscriminator: true,
      discriminatorLength: account.discriminator.length,
      resolver: this,
      path: account.name,
    });
    return { name: account.name, schema: account.schema, value };
  }

  private addMatcher<T extends { name: string; discriminator: Uint8Array }>(
    target: Target,
    matchers: T[],
    entry: T
  ): void {
    const clash = matchers.find(
      (existing) =>
        existing.discriminator.length === entry.discriminator.length &&
        startsWithDiscriminator(existing.discriminator, entry.discriminator)
    );
    if (clash) {
      this.options.logger.warn(`Duplicate ${target} discriminator, keeping the first`, {
        discriminator: discriminatorToHex(entry.discriminator),
        kept: clash.name,
        ignored: entry.name,
      });
      return;
    }
    matchers.push(entry);
  }

  private unmatched(
    target: Target,
    matchers: ReadonlyArray<{ discriminator: Uint8Array }>,
    data: Uint8Array
  ): Error {
    const shortest = Math.min(...matchers.map((entry) => entry.discriminator.length));
    if (matchers.length > 0 && data.length < shortest) {
      return new TruncatedBufferError(0, shortest, data.length, `${target}.discriminator`);
    }
    const longest = matchers[0]?.discriminator.length ?? this.defaultDiscriminatorLength(target);
    const discriminator = discriminatorToHex(data.slice(0, longest));
    this.options.logger.debug(`Unknown ${target} discriminator`, { discriminator });
    return new UnknownDiscriminatorError(target, discriminator);
  }

  private defaultDiscriminatorLength(target: Target): number {
    return target === 'account'
      ? this.options.accountDiscriminatorLength
      : this.options.instructionDiscriminatorLength;
  }
}

/**
 * Compile an IDL document into a {@link CompiledIdl}.
 *
 * Accounts and instructions without an explicit discriminator get the Anchor
 * one: `sha256("account:<Name>")` and `sha256("global:<snake_name>")`,
 * truncated to the configured length.
 *
 * @param idl - Parsed IDL JSON
 * @param options - Discriminator lengths, enum width and logging
 * @throws IdlCompileError if the IDL cannot be compiled
 *
 * @example
 * ```ts
 * const program = compileIdl(idl, { logging: { level: 'debug' } });
 * const ix = program.decodeInstruction(data, accountKeys);
 * ```
 */
export function compileIdl(idl: unknown, options: IdlDecoderOptions = {}): CompiledIdl {
  const resolved = resolveOptions(options);
  const parsed = parseIdl(idl);
  const compiler = new SchemaCompiler(parsed.symbols, {
    enumDiscriminantWidth: resolved.enumDiscriminantWidth,
    logger: resolved.logger,
  });

  const accounts: CompiledAccount[] = parsed.accounts.map((account) => ({
    name: account.name,
    discriminator:
      account.discriminator ??
      accountDiscriminator(account.name, resolved.accountDiscriminatorLength),
    schema: compiler.compileType(account.name, account.path),
  }));

  const instructions: CompiledInstruction[] = parsed.instructions.map((instruction) => ({
    name: instruction.name,
    discriminator:
      instruction.discriminator ??
      instructionDiscriminator(instruction.name, resolved.instructionDiscriminatorLength),
    accounts: instruction.accounts,
    schema: compiler.compileFields(instruction.args),
  }));

  resolved.logger.debug('Compiled IDL', {
    program: parsed.name,
    accounts: accounts.length,
    instructions: instructions.length,
    types: compiler.size,
  });

  return new CompiledIdl(parsed.name, parsed.address, compiler, accounts, instructions, resolved);
}
