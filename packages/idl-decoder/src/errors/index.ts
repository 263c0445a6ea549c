/**
 * Error types and utilities for IDL compilation and decoding.
 *
 * @packageDocumentation
 */

export * from './errors.js';
export * from './predicates.js';
export * from './messages.js';
