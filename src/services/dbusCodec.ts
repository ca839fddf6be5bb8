/**
 * Conversion between tagged wire values and the values dbus-next marshals
 */

import * as dbus from "dbus-next";
import type { VariantArgument } from "../interfaces";
import type { ReplyValue } from "../mpris/wire";

/**
 * A reply or signal argument as dbus-next expects it in a message body.
 * `x` becomes a BigInt, dictionary entries and `v` become Variants.
 */
export function encodeReplyValue(value: ReplyValue): unknown {
	switch (value.type) {
		case "x":
			return BigInt(value.value);
		case "as":
			return [...value.value];
		case "a{sv}": {
			const entries: Record<string, dbus.Variant> = {};
			for (const [name, entry] of Object.entries(value.value)) {
				entries[name] = new dbus.Variant(entry.type, encodeReplyValue(entry));
			}
			return entries;
		}
		case "v":
			return new dbus.Variant(value.value.type, encodeReplyValue(value.value));
		default:
			return value.value;
	}
}

/**
 * An inbound body argument; Variants, including nested ones, become
 * `VariantArgument`s
 */
export function decodeArgument(value: unknown): unknown {
	if (value instanceof dbus.Variant) {
		const argument: VariantArgument = {
			signature: value.signature,
			value: decodeArgument(value.value),
		};
		return argument;
	}
	if (Array.isArray(value)) {
		return value.map(decodeArgument);
	}
	return value;
}
