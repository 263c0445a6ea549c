/**
 * IDL program registry for decoding data of many programs.
 *
 * @packageDocumentation
 */

import type { IdlDecoderOptions } from './config.js';
import { ProgramNotRegisteredError } from './errors/index.js';
import { loadIdlFromJson } from './loader.js';
import { createLogger, type Logger } from './logging.js';
import { compileIdl, type CompiledIdl, type ParsedAccount, type ParsedInstruction } from './program.js';
import type { ProgramIdl } from './types.js';

/**
 * Registry that compiles each program's IDL once and decodes its accounts and
 * instructions on demand.
 */
export class IdlDecoderRegistry {
  private readonly cache = new Map<string, CompiledIdl>();
  private readonly logger: Logger;

  /**
   * @param options - Options applied to every IDL compiled by this registry
   */
  constructor(private readonly options: IdlDecoderOptions = {}) {
    this.logger = createLogger(options.logging);
  }

  /**
   * Register a program from a JSON IDL.
   * Replaces any IDL already registered for the program.
   *
   * @param programId - Program address
   * @param idl - IDL JSON string or object
   * @returns The compiled IDL
   * @throws IdlCompileError if the IDL cannot be compiled
   *
   * @example
   * ```ts
   * const idlJson = fs.readFileSync('idl.json', 'utf-8');
   * registry.registerProgramFromJson(programId, idlJson);
   * ```
   */
  registerProgramFromJson(programId: string, idl: string | ProgramIdl): CompiledIdl {
    const compiled = compileIdl(loadIdlFromJson(idl), this.options);
    this.register(programId, compiled);
    return compiled;
  }

  /**
   * Register an already compiled IDL.
   */
  register(programId: string, compiled: CompiledIdl): void {
    this.cache.set(programId, compiled);
    this.logger.info('Registered program', {
      programId,
      name: compiled.name,
      accounts: compiled.accounts.length,
      instructions: compiled.instructions.length,
    });
  }

  /**
   * Decode account data owned by a registered program.
   *
   * @param programId - Owner program address
   * @param data - Raw account data, discriminator included
   * @throws ProgramNotRegisteredError if the program is not registered
   *
   * @example
   * ```ts
   * const { name, value } = registry.decodeAccount(owner, accountInfo.data);
   * ```
   */
  decodeAccount(programId: string, data: Uint8Array): ParsedAccount {
    return this.getCompiledIdl(programId).decodeAccount(data);
  }

  /**
   * Decode instruction data for a registered program.
   *
   * @param programId - Program address
   * @param data - Raw instruction data, discriminator included
   * @param accountKeys - Addresses of the instruction's accounts, in order
   * @throws ProgramNotRegisteredError if the program is not registered
   */
  decodeInstruction(
    programId: string,
    data: Uint8Array,
    accountKeys: readonly string[] = []
  ): ParsedInstruction {
    return this.getCompiledIdl(programId).decodeInstruction(data, accountKeys);
  }

  /**
   * Get the compiled IDL for a registered program.
   *
   * @param programId - Program address
   * @throws ProgramNotRegisteredError if the program is not registered
   */
  getCompiledIdl(programId: string): CompiledIdl {
    const compiled = this.cache.get(programId);
    if (!compiled) {
      throw new ProgramNotRegisteredError(programId);
    }
    return compiled;
  }

  /**
   * Check if a program is registered.
   */
  isRegistered(programId: string): boolean {
    return this.cache.has(programId);
  }

  /**
   * Clear the cache for a specific program or all programs.
   *
   * @param programId - Optional program address. If not provided, clears all.
   */
  clearCache(programId?: string): void {
    if (programId) {
      this.cache.delete(programId);
    } else {
      this.cache.clear();
    }
  }
}
