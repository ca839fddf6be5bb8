/**
 * D-Bus Transport
 * Serves exported objects on the session bus through dbus-next's low-level
 * message API
 */

import * as dbus from "dbus-next";
import { DBUS_ERRORS, PEER_INTERFACE } from "../config/constants";
import type {
	BusObjectHandler,
	IBusTransport,
	InterfaceDescription,
	MethodCall,
} from "../interfaces";
import { MprisError } from "../mpris/errors";
import { type ReplyValue, type WireValue, signatureOf } from "../mpris/wire";
import { getLogger } from "../utils/Logger";
import { decodeArgument, encodeReplyValue } from "./dbusCodec";
import { renderIntrospection } from "./introspectionXml";

const logger = getLogger("DbusTransport");

/**
 * The requested name is owned by another connection
 */
export class BusNameUnavailableError extends Error {
	constructor(
		readonly busName: string,
		readonly reply: number,
	) {
		super(`Bus name ${busName} is already taken (reply ${reply})`);
		this.name = "BusNameUnavailableError";
	}
}

/**
 * The parts of a dbus-next `MessageBus` the transport uses
 */
export interface BusConnection {
	requestName(name: string, flags: number): Promise<number>;
	releaseName(name: string): Promise<unknown>;
	addMethodHandler(handler: (message: dbus.Message) => boolean): void;
	removeMethodHandler(handler: (message: dbus.Message) => boolean): void;
	send(message: dbus.Message): void;
	disconnect(): void;
}

interface ExportedObject {
	handler: BusObjectHandler;
	interfaces: readonly InterfaceDescription[];
}

export class DbusTransport implements IBusTransport {
	private objects = new Map<string, ExportedObject>();
	private listening = false;

	constructor(private bus: BusConnection = dbus.sessionBus()) {}

	async requestName(name: string): Promise<void> {
		const reply = await this.bus.requestName(name, dbus.NameFlag.DO_NOT_QUEUE);
		if (
			reply !== dbus.RequestNameReply.PRIMARY_OWNER &&
			reply !== dbus.RequestNameReply.ALREADY_OWNER
		) {
			throw new BusNameUnavailableError(name, reply);
		}
		logger.debug(`Owning ${name}`);
	}

	async releaseName(name: string): Promise<void> {
		await this.bus.releaseName(name);
		logger.debug(`Released ${name}`);
	}

	exportObject(
		path: string,
		handler: BusObjectHandler,
		interfaces: readonly InterfaceDescription[],
	): void {
		this.objects.set(path, { handler, interfaces });
		if (!this.listening) {
			this.bus.addMethodHandler(this.handleMessage);
			this.listening = true;
		}
	}

	unexportObject(path: string): void {
		this.objects.delete(path);
		if (this.objects.size === 0 && this.listening) {
			this.bus.removeMethodHandler(this.handleMessage);
			this.listening = false;
		}
	}

	emitSignal(
		path: string,
		interfaceName: string,
		member: string,
		args: readonly WireValue[],
	): void {
		this.bus.send(
			dbus.Message.newSignal(
				path,
				interfaceName,
				member,
				signatureOf(args),
				args.map(encodeReplyValue),
			),
		);
	}

	defaultIntrospection(path: string): string {
		return renderIntrospection(path, this.objects.get(path)?.interfaces ?? []);
	}

	disconnect(): void {
		if (this.listening) {
			this.bus.removeMethodHandler(this.handleMessage);
			this.listening = false;
		}
		this.objects.clear();
		this.bus.disconnect();
	}

	// ─────────────────────────────────────────────────────────────
	// Inbound calls
	// ─────────────────────────────────────────────────────────────

	/**
	 * Claims method calls to exported paths. Peer calls and calls to other
	 * paths are left to dbus-next.
	 */
	private handleMessage = (message: dbus.Message): boolean => {
		if (message.type !== dbus.MessageType.METHOD_CALL) return false;
		if (message.interface === PEER_INTERFACE) return false;

		const path = message.path ?? "";
		const exported = this.objects.get(path);
		if (!exported) return false;

		const call: MethodCall = {
			path,
			interface: message.interface ?? "",
			member: message.member ?? "",
			signature: message.signature ?? "",
			args: (message.body ?? []).map(decodeArgument),
		};

		// A reply that fails to go out is answered as an error instead
		exported.handler
			.handleCall(call)
			.then((reply) => this.bus.send(this.methodReturn(message, reply)))
			.catch((error: unknown) => this.bus.send(this.errorReply(message, call, error)))
			.catch((error: unknown) => {
				logger.error(`Failed to answer ${call.interface}.${call.member}`, error);
			});
		return true;
	};

	private methodReturn(message: dbus.Message, reply: readonly ReplyValue[]): dbus.Message {
		return dbus.Message.newMethodReturn(
			message,
			signatureOf(reply),
			reply.map(encodeReplyValue),
		);
	}

	private errorReply(message: dbus.Message, call: MethodCall, error: unknown): dbus.Message {
		if (error instanceof MprisError) {
			logger.debug(`${call.interface}.${call.member} -> ${error.dbusName}: ${error.message}`);
			return dbus.Message.newError(message, error.dbusName, error.message);
		}
		const text = error instanceof Error ? error.message : String(error);
		return dbus.Message.newError(message, DBUS_ERRORS.FAILED, text);
	}
}
