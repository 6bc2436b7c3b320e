import type { Identified, StyleRegistry } from "./types.ts";

/**
 * Create a registry pre-filled with `initial`.
 *
 * @param label - Kind of value held, e.g. "colour"
 * @param initial - Values registered up front, in order
 */
export const createStyleRegistry = <T extends Identified>(
	label: string,
	initial: readonly T[] = [],
): StyleRegistry<T> => {
	const byName = new Map<string, T>();

	const registry: StyleRegistry<T> = {
		label,
		register: (value) => {
			if (byName.has(value.name)) {
				throw new Error(`Duplicate ${label} identifier: ${value.name}`);
			}
			byName.set(value.name, value);
			return value;
		},
		get: (name) => byName.get(name),
		has: (name) => byName.has(name),
		values: () => [...byName.values()],
	};

	for (const value of initial) registry.register(value);
	return registry;
};
