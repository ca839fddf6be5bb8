/**
 * Default introspection document: every interface exported at a path with
 * its methods and signals. Properties are not listed here.
 */

import { Builder } from "xml2js";
import { INTROSPECTION_DOCTYPE } from "../config/constants";
import type { ArgumentDescription, InterfaceDescription, MemberDescription } from "../interfaces";

function renderArg(arg: ArgumentDescription) {
	return { $: { ...arg } };
}

function renderMember(member: MemberDescription) {
	return { $: { name: member.name }, arg: member.args.map(renderArg) };
}

/**
 * Serialize an xml2js object tree with the D-Bus DOCTYPE in front
 */
export function buildIntrospectionXml(document: object): string {
	const body = new Builder({ headless: true }).buildObject(document);
	return `${INTROSPECTION_DOCTYPE}\n${body}\n`;
}

export function renderIntrospection(
	path: string,
	interfaces: readonly InterfaceDescription[],
): string {
	return buildIntrospectionXml({
		node: {
			$: { name: path },
			interface: interfaces.map((description) => ({
				$: { name: description.name },
				method: description.methods.map(renderMember),
				signal: description.signals.map(renderMember),
			})),
		},
	});
}
