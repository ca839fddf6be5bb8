/**
 * MPRIS Adapter
 * Owns the bus registration and relays host events as MPRIS signals
 */

import {
	type AdapterConfig,
	DEFAULT_ADAPTER_CONFIG,
	busNameFor,
} from "../config/adapter";
import { MPRIS_PATH, NANOS_PER_MICRO, PLAYER_INTERFACE } from "../config/constants";
import type { EventSubscription } from "../events";
import type { IBusTransport, IIconResolver, IPlayerHost } from "../interfaces";
import { type ErrorHandler, getErrorHandler } from "../services/ErrorHandler";
import { IconThemeService } from "../services/IconThemeService";
import type { HostSong } from "../types/host";
import { getLogger } from "../utils/Logger";
import { toProtocolVolume } from "../utils/volume";
import { ChangeNotifier } from "./ChangeNotifier";
import { MPRIS_OBJECT_INTERFACES } from "./interfaces";
import { IntrospectionSynthesizer } from "./IntrospectionSynthesizer";
import { MethodDispatcher } from "./MethodDispatcher";
import { SnapshotBuilder } from "./SnapshotBuilder";
import { type PropertyTable, wire } from "./wire";

const logger = getLogger("MprisAdapter");

export interface MprisAdapterOptions {
	host: IPlayerHost;
	transport: IBusTransport;
	config?: AdapterConfig;
	/** Defaults to an `IconThemeService` over `config.iconThemes` */
	icons?: IIconResolver;
	errorHandler?: ErrorHandler;
}

/**
 * One adapter per host. `start()` exports the object and claims the bus name;
 * `stop()` undoes both and drops the host subscriptions.
 */
export class MprisAdapter {
	readonly busName: string;
	readonly builder: SnapshotBuilder;
	readonly notifier: ChangeNotifier;
	readonly dispatcher: MethodDispatcher;

	private host: IPlayerHost;
	private transport: IBusTransport;
	private errorHandler: ErrorHandler;
	private subscriptions: EventSubscription[] = [];
	private running = false;
	/** In-flight start, shared by overlapping callers */
	private starting: Promise<void> | null = null;

	constructor(options: MprisAdapterOptions) {
		const config = options.config ?? DEFAULT_ADAPTER_CONFIG;
		this.host = options.host;
		this.transport = options.transport;
		this.errorHandler = options.errorHandler ?? getErrorHandler();
		this.busName = busNameFor(config);

		const icons = options.icons ?? new IconThemeService(config.iconThemes);
		this.builder = new SnapshotBuilder(this.host, config, icons, this.errorHandler);
		this.notifier = new ChangeNotifier(this.transport, MPRIS_PATH);
		const introspection = new IntrospectionSynthesizer(this.transport, this.builder);
		this.dispatcher = new MethodDispatcher(
			this.host,
			this.builder,
			this.notifier,
			introspection,
			this.errorHandler,
		);
	}

	isRunning(): boolean {
		return this.running;
	}

	/**
	 * Export the MPRIS object, subscribe to the host and claim the bus name.
	 * When the host already has a song, its metadata and play state are
	 * published right away.
	 *
	 * @throws when the bus name cannot be claimed; nothing stays registered
	 */
	async start(): Promise<void> {
		if (this.running) return;

		this.starting ??= this.claim().finally(() => {
			this.starting = null;
		});
		return this.starting;
	}

	private async claim(): Promise<void> {
		this.transport.exportObject(MPRIS_PATH, this.dispatcher, MPRIS_OBJECT_INTERFACES);
		this.notifier.prime(PLAYER_INTERFACE, {
			PlaybackStatus: wire.string("Stopped"),
			Volume: wire.double(this.builder.volume()),
			Metadata: wire.dict(this.builder.buildMetadata(null)),
		});
		this.subscribe();

		try {
			await this.transport.requestName(this.busName);
		} catch (error) {
			this.unsubscribe();
			this.transport.unexportObject(MPRIS_PATH);
			this.notifier.reset();
			throw this.errorHandler.handleBusError(error, `request ${this.busName}`);
		}

		this.running = true;
		logger.info(`Exported ${MPRIS_PATH} as ${this.busName}`);

		const song = this.host.currentSong;
		if (song) {
			this.onMetadataChanged(song);
			this.publishPlayer({ PlaybackStatus: wire.string(this.builder.playbackStatus()) });
		}
	}

	/**
	 * Leave the bus and drop the host subscriptions
	 */
	async stop(): Promise<void> {
		if (this.starting) {
			try {
				await this.starting;
			} catch {
				// The failed start already unregistered everything
				return;
			}
		}
		if (!this.running) return;
		this.running = false;

		this.unsubscribe();
		this.transport.unexportObject(MPRIS_PATH);
		this.notifier.reset();

		try {
			await this.transport.releaseName(this.busName);
		} catch (error) {
			throw this.errorHandler.handleBusError(error, `release ${this.busName}`);
		}
		logger.info(`Released ${this.busName}`);
	}

	// ─────────────────────────────────────────────────────────────
	// Host events
	// ─────────────────────────────────────────────────────────────

	private subscribe(): void {
		this.subscriptions = [
			this.host.on("metadataChanged", (song) => this.onMetadataChanged(song)),
			this.host.on("playStateChanged", (playing) => this.onPlayStateChanged(playing)),
			this.host.on("volumeChanged", (volume) => this.onVolumeChanged(volume)),
			this.host.on("bufferingFinished", (position) => this.onBufferingFinished(position)),
		];
	}

	private unsubscribe(): void {
		for (const subscription of this.subscriptions) {
			subscription.unsubscribe();
		}
		this.subscriptions = [];
	}

	private publishPlayer(fragment: PropertyTable): void {
		this.notifier.publish(PLAYER_INTERFACE, fragment);
	}

	/**
	 * Metadata for songs other than the current one (prefetched ones) is
	 * ignored.
	 */
	private onMetadataChanged(song: HostSong): void {
		if (song !== this.host.currentSong) return;
		this.publishPlayer({ Metadata: wire.dict(this.builder.buildMetadata(song)) });
	}

	private onPlayStateChanged(playing: boolean): void {
		this.publishPlayer({ PlaybackStatus: wire.string(playing ? "Playing" : "Paused") });
	}

	private onVolumeChanged(volume: number): void {
		this.publishPlayer({ Volume: wire.double(toProtocolVolume(volume)) });
	}

	/**
	 * Buffering moved the engine position without a seek; clients hear about
	 * it as a Seeked, not as a property change.
	 */
	private onBufferingFinished(positionNanos: number): void {
		this.notifier.positionCorrected(Math.floor(positionNanos / NANOS_PER_MICRO));
	}
}
