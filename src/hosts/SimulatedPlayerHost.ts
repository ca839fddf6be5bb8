/**
 * Simulated Player Host
 * An in-memory player that raises the same events a real host does. Drives
 * the demo script and the adapter tests.
 */

import {
	type EventListener,
	type EventSubscription,
	type HostEventBus,
	type HostEventMap,
	createHostEventBus,
} from "../events";
import type { IPlayerHost } from "../interfaces";
import type { HostSong } from "../types/host";
import { getLogger } from "../utils/Logger";
import { clampUnit } from "../utils/volume";

const logger = getLogger("SimulatedPlayerHost");

export interface SimulatedPlayerOptions {
	/** Songs played in order by `nextSong` */
	playlist?: readonly HostSong[];
	volume?: number;
	/** Engine duration in nanoseconds; null while unknown */
	duration?: number | null;
}

export class SimulatedPlayerHost implements IPlayerHost {
	currentSong: HostSong | null = null;
	playing = false;
	waitingForPlaylist = false;

	/** Set by `bringToTop` and `quit`, for inspection */
	raised = false;
	quitRequested = false;

	private events: HostEventBus = createHostEventBus();
	private playlist: HostSong[];
	private volume: number;
	private position: number | null = null;
	private duration: number | null;

	constructor(options: SimulatedPlayerOptions = {}) {
		this.playlist = [...(options.playlist ?? [])];
		this.volume = clampUnit(options.volume ?? 1);
		this.duration = options.duration ?? null;
	}

	on<K extends keyof HostEventMap>(
		event: K,
		listener: EventListener<HostEventMap[K]>,
	): EventSubscription {
		return this.events.on(event, listener);
	}

	listenerCount(event: keyof HostEventMap): number {
		return this.events.listenerCount(event);
	}

	// ─────────────────────────────────────────────────────────────
	// Engine queries
	// ─────────────────────────────────────────────────────────────

	queryPosition(): number | null {
		return this.position;
	}

	queryDuration(): number | null {
		return this.duration;
	}

	getVolume(): number {
		return this.volume;
	}

	setVolume(volume: number): void {
		this.volume = clampUnit(volume);
		this.events.emit("volumeChanged", this.volume);
	}

	// ─────────────────────────────────────────────────────────────
	// Controls
	// ─────────────────────────────────────────────────────────────

	nextSong(): void {
		const song = this.playlist.shift();
		if (!song) {
			logger.info("Playlist exhausted");
			this.waitingForPlaylist = true;
			return;
		}
		this.loadSong(song);
		this.setPlaying(true);
	}

	playpause(): void {
		this.setPlaying(!this.playing);
	}

	play(): void {
		this.setPlaying(true);
	}

	pause(): void {
		this.setPlaying(false);
	}

	bringToTop(): void {
		this.raised = true;
	}

	quit(): void {
		this.quitRequested = true;
		this.setPlaying(false);
	}

	// ─────────────────────────────────────────────────────────────
	// Simulation
	// ─────────────────────────────────────────────────────────────

	/**
	 * Make `song` current and announce its metadata. Position restarts at 0.
	 */
	loadSong(song: HostSong): void {
		this.currentSong = song;
		this.position = 0;
		this.events.emit("metadataChanged", song);
	}

	/**
	 * Announce metadata for a song that is not (yet) current
	 */
	announce(song: HostSong): void {
		this.events.emit("metadataChanged", song);
	}

	enqueue(...songs: HostSong[]): void {
		this.playlist.push(...songs);
		this.waitingForPlaylist = false;
	}

	setWaitingForPlaylist(waiting: boolean): void {
		this.waitingForPlaylist = waiting;
	}

	setPlaying(playing: boolean): void {
		if (this.playing === playing) return;
		this.playing = playing;
		this.events.emit("playStateChanged", playing);
	}

	setDuration(nanos: number | null): void {
		this.duration = nanos;
	}

	/**
	 * Move the position without a seek, as the engine does while buffering
	 */
	advance(nanos: number): void {
		this.position = (this.position ?? 0) + nanos;
	}

	finishBuffering(): void {
		this.events.emit("bufferingFinished", this.position ?? 0);
	}
}
