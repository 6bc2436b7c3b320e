/** Anything identified by a stable name. */
export type Identified = { readonly name: string };

/**
 * Identifier → value lookup table for one kind of open enumeration.
 * Populated at startup, read during decoding.
 */
export type StyleRegistry<T extends Identified> = {
	/** What the registry holds, used in error messages (e.g. "colour"). */
	readonly label: string;
	/** Add a value. Throws if its identifier is already registered. */
	register: (value: T) => T;
	get: (name: string) => T | undefined;
	has: (name: string) => boolean;
	/** Registered values in registration order. */
	values: () => readonly T[];
};
