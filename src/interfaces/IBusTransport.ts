import type { ReplyValue, WireValue } from "../mpris/wire";

/**
 * A method argument boxed in a variant, as decoded off the bus
 */
export interface VariantArgument {
	readonly signature: string;
	readonly value: unknown;
}

/**
 * An inbound method call, decoded by the transport
 */
export interface MethodCall {
	readonly path: string;
	readonly interface: string;
	readonly member: string;
	readonly signature: string;
	/** Plain values; variants arrive as `VariantArgument` */
	readonly args: readonly unknown[];
}

export interface BusObjectHandler {
	/**
	 * Answer a call. Rejecting with an `MprisError` produces the matching
	 * D-Bus error reply.
	 */
	handleCall(call: MethodCall): Promise<readonly ReplyValue[]>;
}

export interface ArgumentDescription {
	readonly name: string;
	readonly type: string;
	readonly direction?: "in" | "out";
}

export interface MemberDescription {
	readonly name: string;
	readonly args: readonly ArgumentDescription[];
}

/**
 * Methods and signals of one interface, used for the default introspection
 * document. Properties are added later from the live tables.
 */
export interface InterfaceDescription {
	readonly name: string;
	readonly methods: readonly MemberDescription[];
	readonly signals: readonly MemberDescription[];
}

/**
 * Bus Transport Interface
 * Everything the adapter needs from the message bus
 */
export interface IBusTransport {
	/**
	 * Claim a well-known name
	 * @throws when the name is owned by someone else
	 */
	requestName(name: string): Promise<void>;
	releaseName(name: string): Promise<void>;

	exportObject(
		path: string,
		handler: BusObjectHandler,
		interfaces: readonly InterfaceDescription[],
	): void;
	unexportObject(path: string): void;

	emitSignal(
		path: string,
		interfaceName: string,
		member: string,
		args: readonly WireValue[],
	): void;

	/**
	 * Introspection XML for an exported path: methods and signals only
	 */
	defaultIntrospection(path: string): string;

	disconnect(): void;
}
