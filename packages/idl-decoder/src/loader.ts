/**
 * IDL loading utilities.
 *
 * @packageDocumentation
 */

import { MalformedDeclarationError } from './errors/index.js';
import type { ProgramIdl } from './types.js';

/**
 * Load IDL from a JSON string or object.
 * Objects are returned as-is; validation happens when the IDL is compiled.
 *
 * @param idl - IDL JSON string or object
 * @returns Parsed IDL document
 * @throws MalformedDeclarationError if the string is not valid JSON
 *
 * @example
 * ```ts
 * const idlJson = fs.readFileSync('idl.json', 'utf-8');
 * const program = compileIdl(loadIdlFromJson(idlJson));
 * ```
 */
export function loadIdlFromJson(idl: string | ProgramIdl): unknown {
  if (typeof idl !== 'string') {
    return idl;
  }
  try {
    return JSON.parse(idl);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedDeclarationError(`IDL is not valid JSON (${reason})`, '(root)');
  }
}
