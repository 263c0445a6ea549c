/**
 * JSON rendering of decoded values and compiled schemas.
 *
 * Output is plain JSON data: integers of 64 bits or wider and floats become
 * decimal strings so no precision is lost, bytes become arrays of numbers and
 * struct keys keep their declared order.
 *
 * @packageDocumentation
 */

import type { ParsedAccount, ParsedInstruction } from './program.js';
import type { NumberPrimitiveName, SchemaNode, SchemaVariant, StructSchema } from './schema.js';
import type { ValueNode } from './value.js';

/**
 * Any value `JSON.stringify` round-trips.
 */
export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

type JsonObject = { [key: string]: JsonValue };

/**
 * Render a decoded value as JSON data.
 *
 * Works through an explicit task list, so values nested deeper than the call
 * stack still render.
 *
 * @example
 * ```ts
 * formatValue({ kind: 'bigint', type: 'u64', value: 42n }); // '42'
 * formatValue({ kind: 'number', type: 'f32', value: 0.5 }); // '0.5'
 * formatValue({ kind: 'option', value: null }); // null
 * ```
 */
export function formatValue(value: ValueNode): JsonValue {
  let result: JsonValue = null;
  const tasks: [ValueNode, (json: JsonValue) => void][] = [
    [
      value,
      (json) => {
        result = json;
      },
    ],
  ];

  for (let task = tasks.pop(); task !== undefined; task = tasks.pop()) {
    const [node, assign] = task;
    switch (node.kind) {
      case 'number':
        assign(formatNumber(node.type, node.value));
        break;
      case 'bigint':
        assign(node.value.toString());
        break;
      case 'bool':
      case 'publicKey':
      case 'string':
        assign(node.value);
        break;
      case 'bytes':
        assign(Array.from(node.value));
        break;
      case 'array':
      case 'tuple': {
        const items: JsonValue[] = new Array<JsonValue>(node.elements.length).fill(null);
        assign(items);
        node.elements.forEach((element, index) => {
          tasks.push([
            element,
            (json) => {
              items[index] = json;
            },
          ]);
        });
        break;
      }
      case 'option':
        if (node.value === null) {
          assign(null);
        } else {
          tasks.push([node.value, assign]);
        }
        break;
      case 'struct': {
        const object: JsonObject = {};
        assign(object);
        for (const field of node.fields) {
          defineKey(object, field.name, null);
          tasks.push([field.value, (json) => defineKey(object, field.name, json)]);
        }
        break;
      }
      case 'enum': {
        if (node.payload === null) {
          assign({ name: node.variant });
          break;
        }
        const object: JsonObject = { name: node.variant, value: null };
        assign(object);
        tasks.push([
          node.payload,
          (json) => {
            object.value = json;
          },
        ]);
        break;
      }
      default:
        node satisfies never;
    }
  }

  return result;
}

/**
 * Render a decoded value as a JSON string.
 */
export function stringifyValue(value: ValueNode, space?: number): string {
  return JSON.stringify(formatValue(value), null, space);
}

/**
 * Render a compiled schema as a readable type description.
 *
 * Leaves render as their type names (`"u64"`, `"pubkey"`, `"string"`,
 * `"bytes_remaining"`). Containers render as single-key objects tagged
 * `type:<container>`; structs render as a map of field name to type.
 *
 * @example
 * ```ts
 * formatSchema({ kind: 'vec', element: { kind: 'publicKey' }, lengthPrefix: 'u32' });
 * // { 'type:vec': 'pubkey' }
 * formatSchema({ kind: 'array', element: { kind: 'primitive', type: 'u8' }, length: 4 });
 * // { 'type:array': { size: 4, type: 'u8' } }
 * ```
 */
export function formatSchema(schema: SchemaNode): JsonValue {
  switch (schema.kind) {
    case 'primitive':
      return schema.type;
    case 'publicKey':
      return 'pubkey';
    case 'string':
      return 'string';
    case 'bytes':
      return { 'type:vec': 'u8' };
    case 'remainingBytes':
      return 'bytes_remaining';
    case 'array':
      return { 'type:array': { size: schema.length, type: formatSchema(schema.element) } };
    case 'vec':
      return schema.lengthPrefix === 'u32'
        ? { 'type:vec': formatSchema(schema.element) }
        : { 'type:smallvec': { len: schema.lengthPrefix, elem: formatSchema(schema.element) } };
    case 'option':
      return schema.tagWidth === 4
        ? { 'type:coption': formatSchema(schema.inner) }
        : { 'type:option': formatSchema(schema.inner) };
    case 'tuple':
      return { 'type:tuple': schema.elements.map(formatSchema) };
    case 'struct':
      return formatStructSchema(schema);
    case 'enum':
      return { 'type:enum': formatVariants(schema.variants) };
    case 'defined':
      return { 'type:defined': schema.name };
    default:
      return schema satisfies never;
  }
}

/**
 * Render a decoded account as `{ name, schema, value }`.
 */
export function formatAccount(account: ParsedAccount): JsonValue {
  return {
    name: account.name,
    schema: formatSchema(account.schema),
    value: formatValue(account.value),
  };
}

/**
 * Render a decoded instruction as `{ name, schema, accounts, value }`.
 */
export function formatInstruction(instruction: ParsedInstruction): JsonValue {
  return {
    name: instruction.name,
    schema: formatSchema(instruction.schema),
    accounts: instruction.accounts.map((account) => ({
      name: account.name,
      address: account.address,
    })),
    value: formatValue(instruction.value),
  };
}

function formatNumber(type: NumberPrimitiveName, value: number): JsonValue {
  switch (type) {
    case 'f32':
      return formatF32(value);
    case 'f64':
      return String(value);
    default:
      return value;
  }
}

/**
 * Shortest decimal text that reads back as the same f32.
 */
function formatF32(value: number): string {
  if (!Number.isFinite(value)) {
    return String(value);
  }
  for (let digits = 1; digits <= 9; digits++) {
    const candidate = Number(value.toPrecision(digits));
    if (Math.fround(candidate) === value) {
      return String(candidate);
    }
  }
  return String(value);
}

/**
 * Set an own enumerable key, including names such as `__proto__` that plain
 * assignment would treat as the prototype.
 */
function defineKey(target: JsonObject, key: string, value: JsonValue): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

function formatStructSchema(schema: StructSchema): JsonObject {
  const result: JsonObject = {};
  for (const field of schema.fields) {
    defineKey(result, field.name, formatSchema(field.schema));
  }
  return result;
}

function formatVariants(variants: readonly SchemaVariant[]): JsonObject {
  const result: JsonObject = {};
  for (const variant of variants) {
    defineKey(result, variant.name, variant.payload ? formatSchema(variant.payload) : null);
  }
  return result;
}
