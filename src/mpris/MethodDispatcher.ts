/**
 * Method Dispatcher
 * Answers inbound bus calls from the current snapshot and relays control
 * requests to the host
 */

import { z } from "zod";
import {
	INTROSPECTABLE_INTERFACE,
	PLAYER_INTERFACE,
	PROPERTIES_INTERFACE,
	ROOT_INTERFACE,
	WRITABLE_PROPERTIES,
} from "../config/constants";
import type {
	BusObjectHandler,
	IPlayerHost,
	MethodCall,
	VariantArgument,
} from "../interfaces";
import type { ErrorHandler } from "../services/ErrorHandler";
import { getLogger } from "../utils/Logger";
import { clampUnit, toHostVolume } from "../utils/volume";
import type { ChangeNotifier } from "./ChangeNotifier";
import {
	InvalidArgsError,
	MprisError,
	PropertyNotFoundError,
	ReadOnlyPropertyError,
	UnknownMethodError,
	UnsupportedInterfaceError,
} from "./errors";
import type { IntrospectionSynthesizer } from "./IntrospectionSynthesizer";
import type { SnapshotBuilder } from "./SnapshotBuilder";
import { type PropertyTable, type ReplyValue, type WireValue, wire } from "./wire";

const logger = getLogger("MethodDispatcher");

// ─────────────────────────────────────────────────────────────
// Argument schemas
// ─────────────────────────────────────────────────────────────

const VariantArgumentSchema = z.object({
	signature: z.string(),
	value: z.unknown(),
});

const Int64Schema = z.union([z.bigint(), z.number().int()]);

const NoArgs = z.tuple([]);
const GetArgs = z.tuple([z.string(), z.string()]);
const SetArgs = z.tuple([z.string(), z.string(), VariantArgumentSchema]);
const GetAllArgs = z.tuple([z.string()]);
const SetPositionArgs = z.tuple([z.string(), Int64Schema]);

function parseArgs<T extends z.ZodTypeAny>(
	member: string,
	schema: T,
	args: readonly unknown[],
): z.infer<T> {
	const result = schema.safeParse(args);
	if (!result.success) {
		throw new InvalidArgsError(
			member,
			result.error.issues.map((issue) => issue.message).join("; "),
		);
	}
	return result.data;
}

type Route = (args: readonly unknown[]) => readonly ReplyValue[];

const NO_REPLY: readonly ReplyValue[] = [];

export class MethodDispatcher implements BusObjectHandler {
	private routes: ReadonlyMap<string, Route>;
	/** Member name to qualified route, for calls sent without an interface */
	private byMember: ReadonlyMap<string, string>;

	constructor(
		private host: IPlayerHost,
		private builder: SnapshotBuilder,
		private notifier: ChangeNotifier,
		private introspection: IntrospectionSynthesizer,
		private errorHandler: ErrorHandler,
	) {
		const noArgs = (member: string, action: () => void): Route => (args) => {
			parseArgs(member, NoArgs, args);
			action();
			return NO_REPLY;
		};

		this.routes = new Map<string, Route>([
			[
				`${PROPERTIES_INTERFACE}.Get`,
				(args) => {
					const [interfaceName, propertyName] = parseArgs("Get", GetArgs, args);
					return [wire.variant(this.getProperty(interfaceName, propertyName))];
				},
			],
			[
				`${PROPERTIES_INTERFACE}.Set`,
				(args) => {
					const [interfaceName, propertyName, value] = parseArgs("Set", SetArgs, args);
					this.setProperty(interfaceName, propertyName, {
						signature: value.signature,
						value: value.value,
					});
					return NO_REPLY;
				},
			],
			[
				`${PROPERTIES_INTERFACE}.GetAll`,
				(args) => {
					const [interfaceName] = parseArgs("GetAll", GetAllArgs, args);
					return [wire.dict(this.getAllProperties(interfaceName))];
				},
			],
			[`${ROOT_INTERFACE}.Raise`, noArgs("Raise", () => this.raise())],
			[`${ROOT_INTERFACE}.Quit`, noArgs("Quit", () => this.quit())],
			[`${PLAYER_INTERFACE}.Next`, noArgs("Next", () => this.next())],
			[`${PLAYER_INTERFACE}.Previous`, noArgs("Previous", () => this.previous())],
			[`${PLAYER_INTERFACE}.PlayPause`, noArgs("PlayPause", () => this.playPause())],
			[`${PLAYER_INTERFACE}.Play`, noArgs("Play", () => this.play())],
			[`${PLAYER_INTERFACE}.Pause`, noArgs("Pause", () => this.pause())],
			[`${PLAYER_INTERFACE}.Stop`, noArgs("Stop", () => this.stop())],
			[
				`${PLAYER_INTERFACE}.SetPosition`,
				(args) => {
					const [trackId, position] = parseArgs("SetPosition", SetPositionArgs, args);
					this.setPosition(trackId, position);
					return NO_REPLY;
				},
			],
		]);
		this.byMember = new Map(
			[...this.routes.keys()].map((method): [string, string] => [
				method.slice(method.lastIndexOf(".") + 1),
				method,
			]),
		);
	}

	/**
	 * Answer one call. Protocol errors reject with their `MprisError`; anything
	 * the host throws is logged and rejected as is.
	 */
	async handleCall(call: MethodCall): Promise<readonly ReplyValue[]> {
		const introspection = call.interface === INTROSPECTABLE_INTERFACE || call.interface === "";
		if (introspection && call.member === "Introspect") {
			parseArgs("Introspect", NoArgs, call.args);
			return [wire.string(await this.introspection.introspect(call.path))];
		}
		return this.dispatch(call);
	}

	/**
	 * Synchronous part of `handleCall`: everything except introspection
	 */
	dispatch(call: MethodCall): readonly ReplyValue[] {
		// The interface header is optional; without it the member name decides
		const method = call.interface
			? `${call.interface}.${call.member}`
			: this.byMember.get(call.member);
		const route = method === undefined ? undefined : this.routes.get(method);
		if (method === undefined || !route) {
			throw new UnknownMethodError(call.interface, call.member);
		}

		logger.debug(method);
		try {
			return route(call.args);
		} catch (error) {
			if (error instanceof MprisError) throw error;
			throw this.errorHandler.handleHostError(error, method);
		}
	}

	// ─────────────────────────────────────────────────────────────
	// org.freedesktop.DBus.Properties
	// ─────────────────────────────────────────────────────────────

	getAllProperties(interfaceName: string): PropertyTable {
		const table = this.builder.tableFor(interfaceName);
		if (!table) {
			throw new UnsupportedInterfaceError(interfaceName);
		}
		return table;
	}

	getProperty(interfaceName: string, propertyName: string): WireValue {
		const table = this.getAllProperties(interfaceName);
		if (!Object.hasOwn(table, propertyName)) {
			throw new PropertyNotFoundError(interfaceName, propertyName);
		}
		return table[propertyName];
	}

	/**
	 * Only the player's Volume is writable. Writes to the root interface are
	 * accepted and ignored. Every check runs before the host is touched, so a
	 * rejected write has no effect.
	 */
	setProperty(interfaceName: string, propertyName: string, value: VariantArgument): void {
		if (interfaceName === ROOT_INTERFACE) {
			logger.debug(`Ignoring write to ${interfaceName}.${propertyName}`);
			return;
		}
		if (interfaceName !== PLAYER_INTERFACE) {
			throw new UnsupportedInterfaceError(interfaceName);
		}
		if (!Object.hasOwn(this.builder.playerProperties(), propertyName)) {
			throw new PropertyNotFoundError(interfaceName, propertyName);
		}
		if (!WRITABLE_PROPERTIES.has(propertyName)) {
			throw new ReadOnlyPropertyError(interfaceName, propertyName);
		}

		const volume = value.value;
		if (value.signature !== "d" || typeof volume !== "number" || !Number.isFinite(volume)) {
			throw new InvalidArgsError("Set", `${propertyName} must be a double`);
		}

		this.host.setVolume(toHostVolume(clampUnit(volume)));
	}

	// ─────────────────────────────────────────────────────────────
	// org.mpris.MediaPlayer2
	// ─────────────────────────────────────────────────────────────

	raise(): void {
		this.host.bringToTop();
	}

	quit(): void {
		this.host.quit();
	}

	// ─────────────────────────────────────────────────────────────
	// org.mpris.MediaPlayer2.Player
	// ─────────────────────────────────────────────────────────────

	/**
	 * Skip, unless the host is still fetching songs; a second request would
	 * race the pending fetch.
	 */
	next(): void {
		if (this.host.waitingForPlaylist) {
			logger.debug("Next ignored while waiting for the playlist");
			return;
		}
		this.host.nextSong();
	}

	/**
	 * The host cannot go back.
	 */
	previous(): void {}

	playPause(): void {
		if (this.host.currentSong) {
			this.host.playpause();
		}
	}

	play(): void {
		if (this.host.currentSong) {
			this.host.play();
		}
	}

	pause(): void {
		if (this.host.currentSong) {
			this.host.pause();
		}
	}

	/**
	 * The host has no stopped state; stopping pauses.
	 */
	stop(): void {
		this.host.pause();
	}

	/**
	 * The host cannot seek. The request is accepted and answered with a Seeked
	 * carrying the unchanged position, so clients that show a position slider
	 * snap back to the real position instead of the one they asked for.
	 */
	setPosition(trackId: string, requestedMicros: bigint | number): void {
		logger.debug(`SetPosition(${trackId}, ${requestedMicros}) answered without seeking`);
		this.notifier.positionCorrected(this.builder.positionMicros());
	}
}
