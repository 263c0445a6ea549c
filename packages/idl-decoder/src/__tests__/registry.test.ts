/**
 * Tests for IdlDecoderRegistry.
 */

import { describe, it, expect, vi } from 'vitest';
import { instructionDiscriminator } from '../discriminator.js';
import { MalformedDeclarationError, ProgramNotRegisteredError } from '../errors/index.js';
import { formatValue } from '../formatter.js';
import { compileIdl } from '../program.js';
import { IdlDecoderRegistry } from '../registry.js';
import type { ProgramIdl } from '../types.js';
import { captureError, concatBytes, u64 } from './helpers.js';

const PROGRAM_ID = 'Memo1UhkJRfHyvLMcVucJwxXeuD728EqVDDwQDxFMNo';

const memoIdl: ProgramIdl = {
  name: 'memo',
  instructions: [
    {
      name: 'tip',
      accounts: [{ name: 'payer', isMut: true, isSigner: true }],
      args: [{ name: 'lamports', type: 'u64' }],
    },
  ],
  accounts: [],
  types: [],
};

describe('IdlDecoderRegistry', () => {
  it('should register a program from a JSON string', () => {
    const registry = new IdlDecoderRegistry();
    const compiled = registry.registerProgramFromJson(PROGRAM_ID, JSON.stringify(memoIdl));

    expect(compiled.name).toBe('memo');
    expect(registry.isRegistered(PROGRAM_ID)).toBe(true);
    expect(registry.getCompiledIdl(PROGRAM_ID)).toBe(compiled);
  });

  it('should decode instructions of a registered program', () => {
    const registry = new IdlDecoderRegistry();
    registry.registerProgramFromJson(PROGRAM_ID, memoIdl);

    const data = concatBytes(instructionDiscriminator('tip'), u64(42n));
    const parsed = registry.decodeInstruction(PROGRAM_ID, data, [PROGRAM_ID]);

    expect(parsed.name).toBe('tip');
    expect(parsed.accounts).toEqual([{ name: 'payer', address: PROGRAM_ID }]);
    expect(formatValue(parsed.value)).toEqual({ lamports: '42' });
  });

  it('should throw for unregistered programs', () => {
    const registry = new IdlDecoderRegistry();

    const error = captureError(() => registry.decodeAccount(PROGRAM_ID, new Uint8Array(8)));
    expect(error).toBeInstanceOf(ProgramNotRegisteredError);
    expect(error).toMatchObject({ code: 'PROGRAM_NOT_REGISTERED', programId: PROGRAM_ID });
    expect(() => registry.getCompiledIdl(PROGRAM_ID)).toThrow(ProgramNotRegisteredError);
  });

  it('should reject invalid JSON', () => {
    const registry = new IdlDecoderRegistry();

    const error = captureError(() => registry.registerProgramFromJson(PROGRAM_ID, '{ not json'));
    expect(error).toBeInstanceOf(MalformedDeclarationError);
    expect(error).toMatchObject({ path: '(root)' });
    expect(registry.isRegistered(PROGRAM_ID)).toBe(false);
  });

  it('should register an already compiled IDL', () => {
    const registry = new IdlDecoderRegistry();
    const compiled = compileIdl(memoIdl);
    registry.register(PROGRAM_ID, compiled);
    expect(registry.getCompiledIdl(PROGRAM_ID)).toBe(compiled);
  });

  it('should clear one program or all of them', () => {
    const registry = new IdlDecoderRegistry();
    const other = '11111111111111111111111111111111';
    registry.registerProgramFromJson(PROGRAM_ID, memoIdl);
    registry.registerProgramFromJson(other, memoIdl);

    registry.clearCache(PROGRAM_ID);
    expect(registry.isRegistered(PROGRAM_ID)).toBe(false);
    expect(registry.isRegistered(other)).toBe(true);

    registry.clearCache();
    expect(registry.isRegistered(other)).toBe(false);
  });

  it('should log registrations at info level', () => {
    const logger = vi.fn();
    const registry = new IdlDecoderRegistry({ logging: { logger, level: 'info' } });
    registry.registerProgramFromJson(PROGRAM_ID, memoIdl);

    expect(logger).toHaveBeenCalledWith('Registered program', {
      programId: PROGRAM_ID,
      name: 'memo',
      accounts: 0,
      instructions: 1,
    });
  });
});
