import { ConfigurationError } from "./errors.ts";

/**
 * A closed set of ordinals `0..n-1`. Either just its size, or an enum-like object
 * whose numeric members are exactly `0..n-1` (a TypeScript numeric `enum`,
 * or an `as const` object literal).
 *
 * @example
 * ```typescript
 * enum State { Ready, Printing, Finished }
 * describeUniverse("state", State); // { size: 3, names: ["Ready", "Printing", "Finished"] }
 * describeUniverse("input", 2);     // { size: 2, names: ["0", "1"] }
 * ```
 */
export type Universe = number | Readonly<Record<string, string | number>>;

/** Largest supported universe size (and transition table size): the array length limit. */
export const MAX_UNIVERSE_SIZE = 2 ** 32 - 1;

/** Normalized universe: its size and a display name for every ordinal. */
export type UniverseDescriptor = {
	size: number;
	names: readonly string[];
};

/**
 * Normalizes a universe definition.
 * @param kind - Used in error messages only (e.g. "state", "input")
 * @throws ConfigurationError if the universe is empty or not consecutive from 0
 */
export function describeUniverse(
	kind: string,
	universe: Universe
): UniverseDescriptor {
	if (typeof universe === "number") {
		if (!Number.isSafeInteger(universe) || universe < 1) {
			throw new ConfigurationError([
				{ reason: `${kind} count must be a positive integer, got ${universe}` },
			]);
		}
		if (universe > MAX_UNIVERSE_SIZE) {
			throw new ConfigurationError([
				{ reason: `${kind} count ${universe} exceeds ${MAX_UNIVERSE_SIZE}` },
			]);
		}
		return {
			size: universe,
			names: Array.from({ length: universe }, (_, i) => String(i)),
		};
	}

	// numeric enums also carry reverse (value -> key) string members, skip those
	const members = Object.entries(universe).filter(
		(entry): entry is [string, number] => typeof entry[1] === "number"
	);

	if (members.length === 0) {
		throw new ConfigurationError([
			{ reason: `${kind} universe has no numeric members` },
		]);
	}

	const names: string[] = new Array(members.length);
	for (const [key, value] of members) {
		if (!Number.isInteger(value) || value < 0 || value >= members.length) {
			throw new ConfigurationError([
				{
					reason: `${kind} "${key}" = ${value} breaks the consecutive 0..${
						members.length - 1
					} numbering`,
				},
			]);
		}
		if (names[value] !== undefined) {
			throw new ConfigurationError([
				{
					reason: `${kind} "${key}" reuses value ${value} of "${names[value]}"`,
				},
			]);
		}
		names[value] = key;
	}

	return { size: members.length, names };
}
