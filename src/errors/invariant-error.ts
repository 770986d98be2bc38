/**
 * Thrown when library code reaches a state its types rule out.
 *
 * Never returned in a Result: a broken invariant is a programming error,
 * not a data error.
 */
export class InvariantError extends Error {
	readonly code = "INVARIANT_VIOLATED";

	constructor(message: string) {
		super(`Internal error: ${message}`);
		this.name = "InvariantError";
	}
}

/**
 * Exhaustiveness guard for switches over tagged unions.
 */
export function assertNever(value: never, what: string): never {
	throw new InvariantError(`unhandled ${what}: ${JSON.stringify(value)}`);
}
