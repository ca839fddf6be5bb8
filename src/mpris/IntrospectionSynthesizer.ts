/**
 * Introspection Synthesizer
 * Adds property descriptors to the transport's default introspection XML
 */

import { parseStringPromise } from "xml2js";
import { z } from "zod";
import { ROOT_INTERFACE, WRITABLE_PROPERTIES } from "../config/constants";
import type { IBusTransport } from "../interfaces";
import { buildIntrospectionXml } from "../services/introspectionXml";
import type { PropertyTable } from "./wire";

const AttributesSchema = z.record(z.string());

const InterfaceSchema = z
	.object({
		$: z.object({ name: z.string() }).passthrough(),
		property: z.array(z.object({ $: AttributesSchema }).passthrough()).optional(),
	})
	.passthrough();

const NodeSchema = z
	.object({
		$: AttributesSchema.optional(),
		interface: z.array(InterfaceSchema).optional(),
	})
	.passthrough();

// xml2js yields "" for an element without attributes or children
const DocumentSchema = z.object({ node: z.union([NodeSchema, z.literal("")]) });

type InterfaceElement = z.infer<typeof InterfaceSchema>;

export interface PropertySource {
	tableFor(interfaceName: string): PropertyTable | null;
}

export interface PropertyDescriptor {
	name: string;
	type: string;
	access: "read" | "readwrite";
}

/**
 * Descriptors for a table. The type is the value's wire tag, so the
 * advertised schema and the published values cannot disagree.
 */
export function describeProperties(table: PropertyTable): PropertyDescriptor[] {
	return Object.entries(table).map(([name, value]) => ({
		name,
		type: value.type,
		access: WRITABLE_PROPERTIES.has(name) ? "readwrite" : "read",
	}));
}

export class IntrospectionSynthesizer {
	constructor(
		private transport: Pick<IBusTransport, "defaultIntrospection">,
		private properties: PropertySource,
	) {}

	/**
	 * Introspection XML for `path` with a `<property>` element for every
	 * property of each MPRIS interface listed in the default document
	 */
	async introspect(path: string): Promise<string> {
		const base = this.transport.defaultIntrospection(path);
		const { node } = DocumentSchema.parse(await parseStringPromise(base));
		if (node === "" || !node.interface) {
			return base;
		}

		const interfaces = node.interface.map((element) => this.withProperties(element));
		return buildIntrospectionXml({ node: { ...node, interface: interfaces } });
	}

	private withProperties(element: InterfaceElement): InterfaceElement {
		const name = element.$.name;
		if (!name.startsWith(ROOT_INTERFACE)) {
			return element;
		}

		const table = this.properties.tableFor(name);
		if (!table) {
			return element;
		}

		const added = describeProperties(table).map((descriptor) => ({ $: { ...descriptor } }));
		return { ...element, property: [...(element.property ?? []), ...added] };
	}
}
