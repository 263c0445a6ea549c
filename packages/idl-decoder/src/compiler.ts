/**
 * Schema compiler.
 *
 * Turns IDL type expressions into closed {@link SchemaNode} trees. Named types
 * are expanded in place and memoized; a named type that refers back to itself
 * is only accepted when the reference sits behind a container that may hold
 * zero elements (vec, option, empty array), and is then emitted as a deferred
 * `defined` node.
 *
 * @packageDocumentation
 */

import { DEFAULT_ENUM_DISCRIMINANT_WIDTH } from './config.js';
import {
  MalformedTypeExpressionError,
  UnknownTypeNameError,
  UnresolvableRecursionError,
} from './errors/index.js';
import type { Logger } from './logging.js';
import { silentLogger } from './logging.js';
import type {
  FieldDeclaration,
  FieldsDeclaration,
  SymbolTable,
  TypeDeclaration,
} from './parser.js';
import { isRecord } from './parser.js';
import type {
  LengthPrefix,
  SchemaNode,
  SchemaResolver,
  SchemaVariant,
  StructSchema,
  TagWidth,
  TupleSchema,
} from './schema.js';
import { isPrimitiveName } from './schema.js';

/**
 * Options for {@link SchemaCompiler}.
 */
export interface SchemaCompilerOptions {
  /**
   * Discriminant width for enums that do not declare one. Defaults to 1.
   */
  enumDiscriminantWidth?: TagWidth;
  logger?: Logger;
}

/**
 * `"[T; N]"` array shorthand.
 */
const ARRAY_SHORTHAND = /^\[\s*(.+?)\s*;\s*(\d+)\s*\]$/;

/**
 * `SmallVec<u8, T>` / `SmallVec<u16, T>`: a vec with a narrow length prefix.
 */
const SMALL_VEC = /^SmallVec<\s*([^,\s]+)\s*,\s*(.+?)\s*>$/;

/**
 * Compiles type expressions against a symbol table.
 *
 * One compiler instance owns one memoization cache. Compiled nodes are
 * immutable and may be shared across decode calls.
 *
 * @example
 * ```ts
 * const { symbols } = parseIdl(idl);
 * const compiler = new SchemaCompiler(symbols);
 * const vault = compiler.compileType('Vault');
 * ```
 */
export class SchemaCompiler implements SchemaResolver {
  private readonly cache = new Map<string, SchemaNode>();
  /**
   * Names currently being expanded, with the container depth at which each started.
   */
  private readonly inProgress = new Map<string, number>();
  private readonly stack: string[] = [];
  /**
   * Names cached during the current top-level call, dropped again if it fails.
   */
  private readonly uncommitted: string[] = [];
  private readonly enumDiscriminantWidth: TagWidth;
  private readonly logger: Logger;

  constructor(
    private readonly symbols: SymbolTable,
    options: SchemaCompilerOptions = {}
  ) {
    this.enumDiscriminantWidth = options.enumDiscriminantWidth ?? DEFAULT_ENUM_DISCRIMINANT_WIDTH;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Compile a named type.
   *
   * @throws UnknownTypeNameError if the symbol table has no such type
   * @throws UnresolvableRecursionError if the type contains itself directly
   * @throws MalformedTypeExpressionError if a field type is not recognized
   */
  compileType(name: string, path: string = name): SchemaNode {
    return this.commit(() => this.compileNamed(name, 0, path));
  }

  /**
   * Compile every declared type, in declaration order.
   */
  compileAll(): Map<string, SchemaNode> {
    const compiled = new Map<string, SchemaNode>();
    for (const [name, declaration] of this.symbols) {
      compiled.set(name, this.compileType(name, declaration.path));
    }
    return compiled;
  }

  /**
   * Resolve a deferred `defined` node at decode time.
   */
  resolve(name: string): SchemaNode {
    return this.compileType(name, `defined(${name})`);
  }

  /**
   * Compile a free-standing type expression.
   */
  compileTypeExpression(expression: unknown, path: string): SchemaNode {
    return this.commit(() => this.compileExpression(expression, 0, path));
  }

  /**
   * Compile a list of named fields (e.g. instruction args) into a struct.
   */
  compileFields(fields: readonly FieldDeclaration[]): StructSchema {
    return this.commit(() => this.compileStruct(fields, 0));
  }

  /**
   * Number of named types compiled so far.
   */
  get size(): number {
    return this.cache.size;
  }

  /**
   * Run a top-level compilation. A type compiled while an enclosing type was in
   * progress may hold deferred references to it, so when the call fails every
   * type it cached is evicted too.
   */
  private commit<T>(compile: () => T): T {
    try {
      return compile();
    } catch (error) {
      for (const name of this.uncommitted) {
        this.cache.delete(name);
      }
      throw error;
    } finally {
      this.uncommitted.length = 0;
    }
  }

  private compileNamed(name: string, depth: number, path: string): SchemaNode {
    const cached = this.cache.get(name);
    if (cached) {
      return cached;
    }

    const startedAt = this.inProgress.get(name);
    if (startedAt !== undefined) {
      if (depth > startedAt) {
        this.logger.debug('Deferring recursive type reference', { name, path });
        return { kind: 'defined', name };
      }
      const cycle = [...this.stack.slice(this.stack.indexOf(name)), name];
      throw new UnresolvableRecursionError(cycle, path);
    }

    const declaration = this.symbols.get(name);
    if (!declaration) {
      throw new UnknownTypeNameError(name, path);
    }

    this.inProgress.set(name, depth);
    this.stack.push(name);
    let node: SchemaNode;
    try {
      node = this.compileDeclaration(declaration, depth);
    } finally {
      this.inProgress.delete(name);
      this.stack.pop();
    }

    this.cache.set(name, node);
    this.uncommitted.push(name);
    return node;
  }

  private compileDeclaration(declaration: TypeDeclaration, depth: number): SchemaNode {
    switch (declaration.kind) {
      case 'struct':
        return this.compileBody(declaration.body, depth);

      case 'enum': {
        const variants: SchemaVariant[] = declaration.variants.map((variant) => ({
          name: variant.name,
          payload: variant.payload ? this.compileBody(variant.payload, depth) : null,
        }));
        return {
          kind: 'enum',
          variants,
          tagWidth: declaration.tagWidth ?? this.enumDiscriminantWidth,
        };
      }

      case 'alias':
        return this.compileExpression(declaration.type, depth, declaration.typePath);
    }
  }

  private compileBody(body: FieldsDeclaration, depth: number): StructSchema | TupleSchema {
    if (body.kind === 'named') {
      return this.compileStruct(body.fields, depth);
    }
    return {
      kind: 'tuple',
      elements: body.elements.map((element) =>
        this.compileExpression(element.type, depth, element.path)
      ),
    };
  }

  private compileStruct(fields: readonly FieldDeclaration[], depth: number): StructSchema {
    return {
      kind: 'struct',
      fields: fields.map((field) => ({
        name: field.name,
        schema: this.compileExpression(field.type, depth, field.path),
      })),
    };
  }

  private compileExpression(expression: unknown, depth: number, path: string): SchemaNode {
    if (typeof expression === 'string') {
      return this.compileTypeName(expression, depth, path);
    }
    if (!isRecord(expression)) {
      throw new MalformedTypeExpressionError(
        'expected a type name or a type object',
        path,
        expression
      );
    }

    if ('vec' in expression) {
      const element = this.compileExpression(expression.vec, depth + 1, `${path}.vec`);
      if (element.kind === 'primitive' && element.type === 'u8') {
        return { kind: 'bytes' };
      }
      return { kind: 'vec', element, lengthPrefix: 'u32' };
    }

    if ('option' in expression) {
      return {
        kind: 'option',
        inner: this.compileExpression(expression.option, depth + 1, `${path}.option`),
        tagWidth: 1,
      };
    }

    if ('coption' in expression) {
      return {
        kind: 'option',
        inner: this.compileExpression(expression.coption, depth + 1, `${path}.coption`),
        tagWidth: 4,
      };
    }

    if ('array' in expression) {
      const { array } = expression;
      if (!Array.isArray(array) || array.length !== 2) {
        throw new MalformedTypeExpressionError('array must be [type, length]', path, expression);
      }
      const [element, length] = array;
      if (typeof length !== 'number' || !Number.isSafeInteger(length) || length < 0) {
        throw new MalformedTypeExpressionError(
          `array length must be a non-negative integer, got ${JSON.stringify(length)}`,
          `${path}.array[1]`,
          expression
        );
      }
      return this.compileArray(element, length, depth, `${path}.array[0]`);
    }

    if ('tuple' in expression) {
      const { tuple } = expression;
      if (!Array.isArray(tuple)) {
        throw new MalformedTypeExpressionError('tuple must be an array of types', path, expression);
      }
      return {
        kind: 'tuple',
        elements: tuple.map((element, index) =>
          this.compileExpression(element, depth, `${path}.tuple[${index}]`)
        ),
      };
    }

    if ('defined' in expression) {
      const { defined } = expression;
      const name = isRecord(defined) ? defined.name : defined;
      if (typeof name !== 'string' || name.length === 0) {
        throw new MalformedTypeExpressionError('defined must name a type', path, expression);
      }
      if (isRecord(defined) && Array.isArray(defined.generics) && defined.generics.length > 0) {
        throw new MalformedTypeExpressionError(
          `generic type arguments are not supported (${name})`,
          path,
          expression
        );
      }
      return this.compileReference(name, depth, `${path}.defined`);
    }

    throw new MalformedTypeExpressionError(
      `unrecognized type object with keys ${Object.keys(expression).join(', ') || '(none)'}`,
      path,
      expression
    );
  }

  /**
   * Compile a type given as a string: a built-in, array shorthand, SmallVec or a type name.
   */
  private compileTypeName(name: string, depth: number, path: string): SchemaNode {
    const trimmed = name.trim();

    if (isPrimitiveName(trimmed)) {
      return { kind: 'primitive', type: trimmed };
    }

    switch (trimmed) {
      case 'string':
        return { kind: 'string' };
      case 'bytes':
        return { kind: 'bytes' };
      case 'bytes_remaining':
      case 'rest':
        return { kind: 'remainingBytes' };
    }
    if (isPublicKeyName(trimmed)) {
      return { kind: 'publicKey' };
    }

    const array = ARRAY_SHORTHAND.exec(trimmed);
    if (array) {
      const [, element = '', digits = ''] = array;
      const length = Number(digits);
      if (!Number.isSafeInteger(length)) {
        throw new MalformedTypeExpressionError(
          `array length must be a non-negative integer, got ${digits}`,
          path,
          name
        );
      }
      return this.compileArray(element, length, depth, path);
    }

    return this.compileReference(trimmed, depth, path);
  }

  /**
   * Compile a reference to a named type, which may be a SmallVec instantiation.
   */
  private compileReference(name: string, depth: number, path: string): SchemaNode {
    const smallVec = SMALL_VEC.exec(name);
    if (smallVec) {
      const [, prefix = '', element = ''] = smallVec;
      if (prefix !== 'u8' && prefix !== 'u16') {
        throw new MalformedTypeExpressionError(
          `SmallVec length must be u8 or u16, got ${prefix}`,
          path,
          name
        );
      }
      const lengthPrefix: LengthPrefix = prefix;
      return {
        kind: 'vec',
        element: this.compileTypeName(element, depth + 1, path),
        lengthPrefix,
      };
    }
    if (name.length === 0) {
      throw new MalformedTypeExpressionError('empty type name', path, name);
    }
    return this.compileNamed(name, depth, path);
  }

  /**
   * An empty array consumes no bytes, so it is a valid recursion boundary like vec and option.
   */
  private compileArray(element: unknown, length: number, depth: number, path: string): SchemaNode {
    return {
      kind: 'array',
      element: this.compileExpression(element, length === 0 ? depth + 1 : depth, path),
      length,
    };
  }
}

function isPublicKeyName(name: string): boolean {
  const lower = name.toLowerCase();
  return lower === 'publickey' || lower === 'pubkey';
}
