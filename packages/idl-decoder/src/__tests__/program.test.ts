/**
 * Tests for whole-program compilation and account/instruction decoding.
 */

import { describe, it, expect, vi } from 'vitest';
import { accountDiscriminator, instructionDiscriminator } from '../discriminator.js';
import {
  MalformedDeclarationError,
  TruncatedBufferError,
  UnknownDiscriminatorError,
  UnknownTypeNameError,
  UnresolvableRecursionError,
} from '../errors/index.js';
import { formatAccount, formatInstruction, formatValue } from '../formatter.js';
import { compileIdl } from '../program.js';
import {
  captureError,
  concatBytes,
  i64,
  pubkey,
  str,
  SYSTEM_PROGRAM,
  u16,
  u32,
  u64,
  u8,
} from './helpers.js';

const AUTHORITY = 'So11111111111111111111111111111111111111112';

const vaultIdl = {
  address: 'Vault11111111111111111111111111111111111111',
  metadata: { name: 'vault', version: '0.1.0' },
  instructions: [
    {
      name: 'initialize',
      accounts: [
        { name: 'vault', writable: true },
        { name: 'authority', signer: true },
      ],
      args: [
        { name: 'bump', type: 'u8' },
        { name: 'limit', type: { option: 'u64' } },
      ],
    },
    {
      name: 'setLabel',
      discriminant: { type: 'u8', value: 7 },
      accounts: [{ name: 'vault', writable: true }],
      args: [{ name: 'label', type: 'string' }],
    },
    {
      name: 'close',
      accounts: [{ name: 'vault', writable: true }],
      args: [],
    },
  ],
  accounts: [
    {
      name: 'Vault',
      type: {
        kind: 'struct',
        fields: [
          { name: 'authority', type: 'publicKey' },
          { name: 'balance', type: 'u64' },
          { name: 'state', type: { defined: 'VaultState' } },
          { name: 'history', type: { vec: { defined: 'Entry' } } },
        ],
      },
    },
    { name: 'LinkedNode', discriminator: [1, 2, 3, 4, 5, 6, 7, 8] },
  ],
  types: [
    {
      name: 'VaultState',
      type: {
        kind: 'enum',
        variants: [
          { name: 'Active' },
          { name: 'Frozen', fields: [{ name: 'reason', type: 'string' }] },
          { name: 'Closed', fields: ['i64'] },
        ],
      },
    },
    {
      name: 'Entry',
      type: {
        kind: 'struct',
        fields: [
          { name: 'slot', type: 'u64' },
          { name: 'delta', type: 'i64' },
        ],
      },
    },
    {
      name: 'LinkedNode',
      type: {
        kind: 'struct',
        fields: [
          { name: 'value', type: 'u32' },
          { name: 'next', type: { option: { defined: 'LinkedNode' } } },
        ],
      },
    },
  ],
};

const LINKED_NODE_DISCRIMINATOR = [1, 2, 3, 4, 5, 6, 7, 8];

function frozenVault(prefix: Uint8Array = accountDiscriminator('Vault')): Uint8Array {
  return concatBytes(
    prefix,
    pubkey(SYSTEM_PROGRAM),
    u64(1000n),
    u8(1),
    str('audit'),
    u32(1),
    u64(5n),
    i64(-20n)
  );
}

describe('compileIdl', () => {
  it('should compile accounts and instructions with their discriminators', () => {
    const program = compileIdl(vaultIdl);

    expect(program.name).toBe('vault');
    expect(program.address).toBe('Vault11111111111111111111111111111111111111');
    expect(program.accounts.map((account) => account.name)).toEqual(['Vault', 'LinkedNode']);
    expect(program.instructions.map((instruction) => instruction.name)).toEqual([
      'initialize',
      'setLabel',
      'close',
    ]);
    expect(program.account('Vault')?.discriminator).toEqual(accountDiscriminator('Vault'));
    expect(program.account('LinkedNode')?.discriminator).toEqual(
      new Uint8Array(LINKED_NODE_DISCRIMINATOR)
    );
    expect(program.instruction('setLabel')?.discriminator).toEqual(new Uint8Array([7]));
    expect(program.instruction('initialize')?.accounts).toEqual(['vault', 'authority']);
  });

  it('should surface compile errors', () => {
    expect(() =>
      compileIdl({
        accounts: [{ name: 'Ghost' }],
      })
    ).toThrow(UnknownTypeNameError);

    expect(() =>
      compileIdl({
        types: [{ name: 'Loop', type: { kind: 'struct', fields: [{ name: 'self', type: { defined: 'Loop' } }] } }],
        accounts: [{ name: 'Loop' }],
      })
    ).toThrow(UnresolvableRecursionError);

    expect(() => compileIdl('not an idl')).toThrow(MalformedDeclarationError);
  });

  it('should reject invalid options', () => {
    expect(() => compileIdl(vaultIdl, { accountDiscriminatorLength: 0 })).toThrow(RangeError);
  });

  it('should warn about duplicate discriminators and keep the first', () => {
    const logger = vi.fn();
    const program = compileIdl(
      {
        instructions: [
          { name: 'first', discriminator: [1], args: [] },
          { name: 'second', discriminator: [1], args: [] },
        ],
      },
      { logging: { logger } }
    );

    expect(logger).toHaveBeenCalledTimes(1);
    expect(logger).toHaveBeenCalledWith('Duplicate instruction discriminator, keeping the first', {
      discriminator: '01',
      kept: 'first',
      ignored: 'second',
    });
    expect(program.decodeInstruction(new Uint8Array([1])).name).toBe('first');
  });
});

describe('CompiledIdl', () => {
  const program = compileIdl(vaultIdl);

  describe('accounts', () => {
    it('should identify and decode an account', () => {
      const parsed = program.decodeAccount(frozenVault());

      expect(parsed.name).toBe('Vault');
      expect(formatAccount(parsed)).toEqual({
        name: 'Vault',
        schema: {
          authority: 'pubkey',
          balance: 'u64',
          state: {
            'type:enum': {
              Active: null,
              Frozen: { reason: 'string' },
              Closed: { 'type:tuple': ['i64'] },
            },
          },
          history: { 'type:vec': { slot: 'u64', delta: 'i64' } },
        },
        value: {
          authority: SYSTEM_PROGRAM,
          balance: '1000',
          state: { name: 'Frozen', value: { reason: 'audit' } },
          history: [{ slot: '5', delta: '-20' }],
        },
      });
    });

    it('should decode recursive accounts through the program resolver', () => {
      const data = concatBytes(LINKED_NODE_DISCRIMINATOR, u32(1), u8(1), u32(2), u8(0));
      const parsed = program.decodeAccount(data);

      expect(parsed.name).toBe('LinkedNode');
      expect(formatValue(parsed.value)).toEqual({ value: 1, next: { value: 2, next: null } });
      expect(formatAccount(parsed)).toMatchObject({
        schema: { value: 'u32', next: { 'type:option': { 'type:defined': 'LinkedNode' } } },
      });
    });

    it('should decode an account as a named type', () => {
      const parsed = program.decodeAccountAs('LinkedNode', concatBytes(LINKED_NODE_DISCRIMINATOR, u32(9), u8(0)));
      expect(formatValue(parsed.value)).toEqual({ value: 9, next: null });

      const error = captureError(() => program.decodeAccountAs('Nope', new Uint8Array(16)));
      expect(error).toBeInstanceOf(UnknownTypeNameError);
      expect(error).toMatchObject({ typeName: 'Nope', path: 'accounts' });
    });

    it('should reject unknown discriminators', () => {
      const data = new Uint8Array([255, 255, 255, 255, 255, 255, 255, 255, 0, 0]);
      const error = captureError(() => program.decodeAccount(data));

      expect(error).toBeInstanceOf(UnknownDiscriminatorError);
      expect(error).toMatchObject({
        target: 'account',
        discriminator: 'ffffffffffffffff',
        offset: 0,
        path: 'account',
      });
    });

    it('should reject data shorter than any discriminator', () => {
      const error = captureError(() => program.decodeAccount(new Uint8Array([1, 2, 3])));

      expect(error).toBeInstanceOf(TruncatedBufferError);
      expect(error).toMatchObject({
        offset: 0,
        bytesNeeded: 8,
        available: 3,
        path: 'account.discriminator',
      });
    });

    it('should report truncated account data with its path', () => {
      const data = concatBytes(accountDiscriminator('Vault'), new Uint8Array(10));
      const error = captureError(() => program.decodeAccount(data));

      expect(error).toBeInstanceOf(TruncatedBufferError);
      expect(error).toMatchObject({ offset: 8, bytesNeeded: 32, available: 10, path: 'Vault.authority' });
    });

    it('should ignore trailing bytes after an account', () => {
      const parsed = program.decodeAccount(concatBytes(frozenVault(), [0xde, 0xad]));
      expect(formatValue(parsed.value)).toMatchObject({ balance: '1000' });
    });
  });

  describe('instructions', () => {
    it('should decode instruction args and name the accounts', () => {
      const data = concatBytes(instructionDiscriminator('initialize'), u8(254), u8(1), u64(500n));
      const parsed = program.decodeInstruction(data, [SYSTEM_PROGRAM, AUTHORITY, SYSTEM_PROGRAM]);

      expect(formatInstruction(parsed)).toEqual({
        name: 'initialize',
        schema: { bump: 'u8', limit: { 'type:option': 'u64' } },
        accounts: [
          { name: 'vault', address: SYSTEM_PROGRAM },
          { name: 'authority', address: AUTHORITY },
          { name: 'Account 3', address: SYSTEM_PROGRAM },
        ],
        value: { bump: 254, limit: '500' },
      });
    });

    it('should match short explicit discriminators', () => {
      const parsed = program.decodeInstruction(concatBytes([7], str('hi')));
      expect(parsed.name).toBe('setLabel');
      expect(parsed.accounts).toEqual([]);
      expect(formatValue(parsed.value)).toEqual({ label: 'hi' });
    });

    it('should decode instructions without args', () => {
      const parsed = program.decodeInstruction(instructionDiscriminator('close'));
      expect(parsed.name).toBe('close');
      expect(formatValue(parsed.value)).toEqual({});
    });

    it('should report truncated args with the argument path', () => {
      const data = concatBytes(instructionDiscriminator('initialize'), u8(1));
      const error = captureError(() => program.decodeInstruction(data));

      expect(error).toBeInstanceOf(TruncatedBufferError);
      expect(error).toMatchObject({ offset: 9, bytesNeeded: 1, available: 0, path: 'initialize.limit' });
    });

    it('should reject unknown instruction discriminators', () => {
      const error = captureError(() => program.decodeInstruction(new Uint8Array([9, 9, 9])));

      expect(error).toBeInstanceOf(UnknownDiscriminatorError);
      expect(error).toMatchObject({ target: 'instruction', discriminator: '090909' });
    });
  });

  describe('options', () => {
    it('should use the configured discriminator length', () => {
      const short = compileIdl(vaultIdl, { accountDiscriminatorLength: 4 });
      expect(short.account('Vault')?.discriminator).toEqual(accountDiscriminator('Vault', 4));

      const parsed = short.decodeAccount(frozenVault(accountDiscriminator('Vault', 4)));
      expect(formatValue(parsed.value)).toMatchObject({ balance: '1000' });
    });

    it('should use the configured enum discriminant width', () => {
      const wide = compileIdl(vaultIdl, { enumDiscriminantWidth: 2 });
      const data = concatBytes(
        accountDiscriminator('Vault'),
        pubkey(SYSTEM_PROGRAM),
        u64(1n),
        u16(2),
        i64(-1n),
        u32(0)
      );

      expect(formatValue(wide.decodeAccount(data).value)).toEqual({
        authority: SYSTEM_PROGRAM,
        balance: '1',
        state: { name: 'Closed', value: ['-1'] },
        history: [],
      });
    });
  });
});

describe('IDL dialects', () => {
  it('should decode an IDL with explicit discriminators and pubkey types', () => {
    const program = compileIdl({
      address: 'Counter111111111111111111111111111111111111',
      metadata: { name: 'counter', version: '0.1.0', spec: '0.1.0' },
      instructions: [
        {
          name: 'increment',
          discriminator: [11, 18, 104, 9, 104, 174, 59, 33],
          accounts: [{ name: 'counter', writable: true }],
          args: [{ name: 'by', type: 'u32' }],
        },
      ],
      accounts: [{ name: 'Counter', discriminator: [255, 176, 4, 245, 188, 253, 124, 25] }],
      types: [
        {
          name: 'Counter',
          type: {
            kind: 'struct',
            fields: [
              { name: 'count', type: 'u64' },
              { name: 'owner', type: 'pubkey' },
            ],
          },
        },
      ],
    });

    const account = program.decodeAccount(
      concatBytes([255, 176, 4, 245, 188, 253, 124, 25], u64(3n), pubkey(AUTHORITY))
    );
    expect(program.name).toBe('counter');
    expect(formatValue(account.value)).toEqual({ count: '3', owner: AUTHORITY });

    const instruction = program.decodeInstruction(
      concatBytes([11, 18, 104, 9, 104, 174, 59, 33], u32(2)),
      [SYSTEM_PROGRAM]
    );
    expect(instruction.accounts).toEqual([{ name: 'counter', address: SYSTEM_PROGRAM }]);
    expect(formatValue(instruction.value)).toEqual({ by: 2 });
  });
});
