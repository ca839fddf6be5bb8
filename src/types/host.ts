/**
 * Host Types
 * What the adapter reads from the player it exposes
 */

/**
 * A song as the host player knows it. Optional text fields may be missing or
 * empty; the adapter substitutes placeholders.
 */
export interface HostSong {
	/** Opaque token the host uses to identify the track (arbitrary text) */
	readonly trackToken: string;
	readonly title?: string | null;
	readonly artist?: string | null;
	readonly album?: string | null;
	/** Host rating; only `"love"` is recognized */
	readonly rating?: string | null;
	/** Cover art URI provided by the music source */
	readonly artUrl?: string | null;
	/** Stream URL of the audio */
	readonly audioUrl?: string | null;
	/** Length in seconds declared by the music source */
	readonly trackLength: number;
}
