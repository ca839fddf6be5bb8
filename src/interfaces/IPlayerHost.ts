import type { EventListener, EventSubscription, HostEventMap } from "../events";
import type { HostSong } from "../types/host";

/**
 * Player Host Interface
 * The player application the adapter projects onto the bus
 */
export interface IPlayerHost {
	/** Song loaded in the player, or null before the first one */
	readonly currentSong: HostSong | null;
	readonly playing: boolean;
	/** True while the host is fetching the next batch of songs */
	readonly waitingForPlaylist: boolean;

	/**
	 * Playback position in nanoseconds, or null when the engine cannot tell
	 */
	queryPosition(): number | null;

	/**
	 * Duration reported by the engine in nanoseconds, or null before it knows
	 */
	queryDuration(): number | null;

	/** Linear engine volume, 0..1 */
	getVolume(): number;
	setVolume(volume: number): void;

	nextSong(): void;
	playpause(): void;
	play(): void;
	pause(): void;
	bringToTop(): void;
	quit(): void;

	on<K extends keyof HostEventMap>(
		event: K,
		listener: EventListener<HostEventMap[K]>,
	): EventSubscription;
}
