/**
 * Tagged wire values.
 *
 * Every property value carries its D-Bus signature from the moment it is
 * built. JavaScript numbers cannot tell `1.0` from `1`, so the signature can
 * never be recovered from the runtime value afterwards.
 */

import { isDeepStrictEqual } from "node:util";

export type WireValue =
	| { readonly type: "s"; readonly value: string }
	| { readonly type: "o"; readonly value: string }
	| { readonly type: "b"; readonly value: boolean }
	| { readonly type: "d"; readonly value: number }
	| { readonly type: "i"; readonly value: number }
	| { readonly type: "x"; readonly value: number }
	| { readonly type: "as"; readonly value: readonly string[] }
	| { readonly type: "a{sv}"; readonly value: PropertyTable };

export type WireSignature = WireValue["type"];

export type Tagged<S extends WireSignature> = Extract<WireValue, { type: S }>;

/**
 * Property name to value, one table per interface. Also the payload of an
 * `a{sv}` dictionary.
 */
export type PropertyTable = Readonly<Record<string, WireValue>>;

/**
 * A reply argument: a plain wire value, or one boxed in a variant (`v`)
 */
export type ReplyValue = WireValue | { readonly type: "v"; readonly value: WireValue };

export const wire = {
	string: (value: string): Tagged<"s"> => ({ type: "s", value }),
	objectPath: (value: string): Tagged<"o"> => ({ type: "o", value }),
	boolean: (value: boolean): Tagged<"b"> => ({ type: "b", value }),
	double: (value: number): Tagged<"d"> => ({ type: "d", value }),
	int32: (value: number): Tagged<"i"> => ({ type: "i", value: Math.trunc(value) }),
	int64: (value: number): Tagged<"x"> => ({ type: "x", value: Math.trunc(value) }),
	stringArray: (value: readonly string[]): Tagged<"as"> => ({
		type: "as",
		value: [...value],
	}),
	dict: (value: PropertyTable): Tagged<"a{sv}"> => ({ type: "a{sv}", value }),
	variant: (value: WireValue): ReplyValue => ({ type: "v", value }),
};

/**
 * Structural equality: same signature and same contents
 */
export function wireEquals(a: WireValue, b: WireValue): boolean {
	return isDeepStrictEqual(a, b);
}

/**
 * Concatenated D-Bus signature of a list of arguments
 */
export function signatureOf(values: readonly ReplyValue[]): string {
	return values.map((value) => value.type).join("");
}

export type PlainValue =
	| string
	| number
	| boolean
	| readonly string[]
	| { readonly [key: string]: PlainValue };

/**
 * Drop the tags, for logging and display
 */
export function toPlain(value: WireValue): PlainValue {
	if (value.type === "a{sv}") {
		return toPlainTable(value.value);
	}
	return value.value;
}

export function toPlainTable(table: PropertyTable): { [key: string]: PlainValue } {
	const plain: { [key: string]: PlainValue } = {};
	for (const [name, value] of Object.entries(table)) {
		plain[name] = toPlain(value);
	}
	return plain;
}
