/**
 * MPRIS Types
 * Types for the MPRIS D-Bus interface
 */

/**
 * MPRIS Playback status
 */
export type PlaybackStatus = "Playing" | "Paused" | "Stopped";

/**
 * MPRIS Loop status. This adapter only ever reports "None".
 */
export type LoopStatus = "None" | "Track" | "Playlist";

/**
 * Track metadata projected from a host song. Built wholesale on each track
 * change and never mutated.
 */
export interface TrackMetadata {
	/** Object path derived from the host track token */
	readonly trackId: string;
	readonly title: string;
	readonly artists: readonly string[];
	readonly album: string;
	/** 5 for loved tracks, 0 otherwise */
	readonly userRating: 0 | 5;
	readonly artUrl: string;
	readonly sourceUrl: string;
	readonly durationMicros: number;
	/** The host's raw rating string, published under the extension key */
	readonly extensionRating: string;
}

/**
 * Current player state, recomputed from the host on every query
 */
export interface PlaybackSnapshot {
	readonly status: PlaybackStatus;
	/** Cube-root scaled, 0.0 to 1.0 */
	readonly volume: number;
	readonly positionMicros: number;
	readonly durationMicros: number;
}
