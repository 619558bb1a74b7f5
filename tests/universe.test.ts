import { expect, test } from "vitest";
import { ConfigurationError, describeUniverse } from "../src/mod.ts";

test("counted universe", () => {
	expect(describeUniverse("state", 3)).toEqual({
		size: 3,
		names: ["0", "1", "2"],
	});
});

test("numeric enum universe ignores reverse mappings", () => {
	enum Direction {
		North,
		East,
		South,
		West,
	}

	expect(describeUniverse("state", Direction)).toEqual({
		size: 4,
		names: ["North", "East", "South", "West"],
	});
});

test("const object universe may list members out of order", () => {
	const Input = { Stop: 1, Go: 0 } as const;

	expect(describeUniverse("input", Input)).toEqual({
		size: 2,
		names: ["Go", "Stop"],
	});
});

test("invalid counts", () => {
	expect(() => describeUniverse("state", 0)).toThrow(
		"Invalid state machine configuration: state count must be a positive integer, got 0"
	);
	expect(() => describeUniverse("input", 2.5)).toThrow(ConfigurationError);
	expect(() => describeUniverse("input", Number.NaN)).toThrow(
		ConfigurationError
	);
	expect(() => describeUniverse("state", 2 ** 33)).toThrow(
		"Invalid state machine configuration: state count 8589934592 exceeds 4294967295"
	);
});

test("enum members must be consecutive from zero", () => {
	expect(() => describeUniverse("state", { A: 0, B: 2 })).toThrow(
		'Invalid state machine configuration: state "B" = 2 breaks the consecutive 0..1 numbering'
	);
	expect(() => describeUniverse("state", { A: 1, B: 2 })).toThrow(
		ConfigurationError
	);
	expect(() => describeUniverse("state", { A: 0, B: 0 })).toThrow(
		'Invalid state machine configuration: state "B" reuses value 0 of "A"'
	);
});

test("enum without numeric members is rejected", () => {
	enum Color {
		Red = "red",
		Green = "green",
	}

	expect(() => describeUniverse("input", Color)).toThrow(
		"Invalid state machine configuration: input universe has no numeric members"
	);
	expect(() => describeUniverse("input", {})).toThrow(ConfigurationError);
});
