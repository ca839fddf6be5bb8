/**
 * In-process bus transport. Records names and signals instead of talking to a
 * bus daemon; `call` delivers a method call the way a remote client would.
 */

import type {
	BusObjectHandler,
	IBusTransport,
	InterfaceDescription,
	MethodCall,
} from "../interfaces";
import type { ReplyValue, WireValue } from "../mpris/wire";
import { renderIntrospection } from "../services/introspectionXml";

export interface RecordedSignal {
	path: string;
	interface: string;
	member: string;
	args: readonly WireValue[];
}

export interface MemoryBusOptions {
	/** Names some other connection already owns */
	takenNames?: readonly string[];
}

export class MemoryBusTransport implements IBusTransport {
	readonly signals: RecordedSignal[] = [];
	readonly ownedNames = new Set<string>();
	disconnected = false;

	private objects = new Map<
		string,
		{ handler: BusObjectHandler; interfaces: readonly InterfaceDescription[] }
	>();
	private takenNames: Set<string>;

	constructor(options: MemoryBusOptions = {}) {
		this.takenNames = new Set(options.takenNames ?? []);
	}

	async requestName(name: string): Promise<void> {
		if (this.takenNames.has(name)) {
			throw new Error(`Bus name ${name} is already taken`);
		}
		this.ownedNames.add(name);
	}

	async releaseName(name: string): Promise<void> {
		this.ownedNames.delete(name);
	}

	exportObject(
		path: string,
		handler: BusObjectHandler,
		interfaces: readonly InterfaceDescription[],
	): void {
		this.objects.set(path, { handler, interfaces });
	}

	unexportObject(path: string): void {
		this.objects.delete(path);
	}

	isExported(path: string): boolean {
		return this.objects.has(path);
	}

	emitSignal(
		path: string,
		interfaceName: string,
		member: string,
		args: readonly WireValue[],
	): void {
		this.signals.push({ path, interface: interfaceName, member, args });
	}

	defaultIntrospection(path: string): string {
		return renderIntrospection(path, this.objects.get(path)?.interfaces ?? []);
	}

	disconnect(): void {
		this.objects.clear();
		this.ownedNames.clear();
		this.disconnected = true;
	}

	/**
	 * Call a method on an exported object
	 * @throws when nothing is exported at `path`, or with the handler's error
	 */
	async call(
		path: string,
		interfaceName: string,
		member: string,
		...args: unknown[]
	): Promise<readonly ReplyValue[]> {
		const exported = this.objects.get(path);
		if (!exported) {
			throw new Error(`No object exported at ${path}`);
		}
		const call: MethodCall = {
			path,
			interface: interfaceName,
			member,
			signature: "",
			args,
		};
		return exported.handler.handleCall(call);
	}

	/**
	 * Signals recorded with the given member name
	 */
	signalsNamed(member: string): RecordedSignal[] {
		return this.signals.filter((signal) => signal.member === member);
	}

	clearSignals(): void {
		this.signals.length = 0;
	}
}
