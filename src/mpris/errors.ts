/**
 * Protocol errors. Each maps to the D-Bus error name sent in the reply; the
 * message names the offending interface, property or member.
 */

import { DBUS_ERRORS } from "../config/constants";

export abstract class MprisError extends Error {
	abstract readonly dbusName: string;
}

export class PropertyNotFoundError extends MprisError {
	readonly dbusName = DBUS_ERRORS.UNKNOWN_PROPERTY;

	constructor(
		readonly interfaceName: string,
		readonly propertyName: string,
	) {
		super(`Property ${propertyName} was not found on ${interfaceName}`);
		this.name = "PropertyNotFoundError";
	}
}

export class UnsupportedInterfaceError extends MprisError {
	readonly dbusName = DBUS_ERRORS.UNKNOWN_INTERFACE;

	constructor(readonly interfaceName: string) {
		super(`This object does not implement the ${interfaceName} interface`);
		this.name = "UnsupportedInterfaceError";
	}
}

export class ReadOnlyPropertyError extends MprisError {
	readonly dbusName = DBUS_ERRORS.PROPERTY_READ_ONLY;

	constructor(
		readonly interfaceName: string,
		readonly propertyName: string,
	) {
		super(`Property ${propertyName} on ${interfaceName} is read-only`);
		this.name = "ReadOnlyPropertyError";
	}
}

export class InvalidArgsError extends MprisError {
	readonly dbusName = DBUS_ERRORS.INVALID_ARGS;

	constructor(
		readonly member: string,
		detail: string,
	) {
		super(`Invalid arguments for ${member}: ${detail}`);
		this.name = "InvalidArgsError";
	}
}

export class UnknownMethodError extends MprisError {
	readonly dbusName = DBUS_ERRORS.UNKNOWN_METHOD;

	constructor(
		readonly interfaceName: string,
		readonly member: string,
	) {
		super(`No method ${member} on interface ${interfaceName || "(none)"}`);
		this.name = "UnknownMethodError";
	}
}
