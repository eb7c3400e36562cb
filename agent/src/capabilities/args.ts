import type { ArgBag } from "./types.js";

export type ArgKind = "string" | "int" | "number" | "bool" | "object";

interface ArgKindMap {
	string: string;
	int: number;
	number: number;
	bool: boolean;
	object: Record<string, unknown>;
}

const INT32_MIN = -2_147_483_648;
const INT32_MAX = 2_147_483_647;

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function matches<K extends ArgKind>(kind: K, value: unknown): value is ArgKindMap[K] {
	switch (kind) {
		case "string":
			return typeof value === "string";
		case "int":
			return (
				typeof value === "number" &&
				Number.isInteger(value) &&
				value >= INT32_MIN &&
				value <= INT32_MAX
			);
		case "number":
			return typeof value === "number" && Number.isFinite(value);
		case "bool":
			return typeof value === "boolean";
		case "object":
			return isPlainObject(value);
		default:
			return false;
	}
}

/**
 * Read `args[name]` as `kind`. Absent, null or wrong-typed values yield
 * `fallback`; this never throws.
 */
export function decodeArg<K extends ArgKind, D>(
	args: ArgBag | null | undefined,
	name: string,
	kind: K,
	fallback: D,
): ArgKindMap[K] | D {
	if (!isPlainObject(args)) return fallback;
	if (!Object.hasOwn(args, name)) return fallback;
	const value = args[name];
	return matches(kind, value) ? value : fallback;
}

export function getStringArg(args: ArgBag | null | undefined, name: string): string | undefined;
export function getStringArg(
	args: ArgBag | null | undefined,
	name: string,
	fallback: string,
): string;
export function getStringArg(
	args: ArgBag | null | undefined,
	name: string,
	fallback?: string,
): string | undefined {
	return decodeArg(args, name, "string", fallback);
}

export function getIntArg(args: ArgBag | null | undefined, name: string, fallback = 0): number {
	return decodeArg(args, name, "int", fallback);
}

export function getBoolArg(
	args: ArgBag | null | undefined,
	name: string,
	fallback = false,
): boolean {
	return decodeArg(args, name, "bool", fallback);
}

export function getObjectArg(
	args: ArgBag | null | undefined,
	name: string,
): Record<string, unknown> {
	return decodeArg(args, name, "object", {});
}
