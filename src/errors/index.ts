/**
 * Error module - unrecoverable error helpers.
 *
 * Recoverable data errors are Result values; see types/error.ts.
 */

export { InvariantError, assertNever } from "./invariant-error.ts";
export { fatal } from "./fatal.ts";
