/**
 * State Snapshot Builder
 * Projects host state onto tagged MPRIS property tables
 */

import { pathToFileURL } from "node:url";
import type { AdapterConfig } from "../config/adapter";
import {
	LOVED_RATING,
	LOVED_USER_RATING,
	METADATA_PLACEHOLDERS,
	MICROS_PER_SECOND,
	NANOS_PER_MICRO,
	NO_TRACK_PATH,
	PLAYER_INTERFACE,
	ROOT_INTERFACE,
} from "../config/constants";
import type { IIconResolver, IPlayerHost } from "../interfaces";
import type { ErrorHandler } from "../services/ErrorHandler";
import type { HostSong } from "../types/host";
import type {
	LoopStatus,
	PlaybackSnapshot,
	PlaybackStatus,
	TrackMetadata,
} from "../types/mpris";
import { toProtocolVolume } from "../utils/volume";
import { type PropertyTable, wire } from "./wire";

function textOr(value: string | null | undefined, placeholder: string): string {
	return value ? value : placeholder;
}

function nanosToMicros(nanos: number): number {
	return Math.floor(nanos / NANOS_PER_MICRO);
}

// No repeat or shuffle modes
const LOOP_STATUS: LoopStatus = "None";

/**
 * Hex-encode a track token under `prefix` so any token yields a valid object
 * path. An empty token encodes as "0", which no hex string can collide with.
 */
export function encodeTrackId(prefix: string, trackToken: string): string {
	const hex = Buffer.from(trackToken, "utf8").toString("hex");
	return `${prefix}/${hex || "0"}`;
}

export class SnapshotBuilder {
	constructor(
		private host: IPlayerHost,
		private config: AdapterConfig,
		private icons: IIconResolver,
		private errorHandler: ErrorHandler,
	) {}

	// ─────────────────────────────────────────────────────────────
	// Playback state
	// ─────────────────────────────────────────────────────────────

	playbackStatus(): PlaybackStatus {
		if (!this.host.currentSong) return "Stopped";
		return this.host.playing ? "Playing" : "Paused";
	}

	volume(): number {
		return toProtocolVolume(this.host.getVolume());
	}

	positionMicros(): number {
		const position = this.host.queryPosition();
		return position === null ? 0 : nanosToMicros(position);
	}

	/**
	 * Engine duration when known; before that the length the music source
	 * declared for the song.
	 */
	durationMicros(song: HostSong): number {
		const duration = this.host.queryDuration();
		if (duration !== null) {
			return nanosToMicros(duration);
		}
		return Math.round(song.trackLength * MICROS_PER_SECOND);
	}

	snapshot(): PlaybackSnapshot {
		const song = this.host.currentSong;
		return {
			status: this.playbackStatus(),
			volume: this.volume(),
			positionMicros: this.positionMicros(),
			durationMicros: song ? this.durationMicros(song) : 0,
		};
	}

	// ─────────────────────────────────────────────────────────────
	// Metadata
	// ─────────────────────────────────────────────────────────────

	buildTrackMetadata(song: HostSong): TrackMetadata {
		return {
			trackId: encodeTrackId(this.config.trackIdPrefix, song.trackToken),
			title: textOr(song.title, METADATA_PLACEHOLDERS.title),
			artists: [textOr(song.artist, METADATA_PLACEHOLDERS.artist)],
			album: textOr(song.album, METADATA_PLACEHOLDERS.album),
			userRating: song.rating === LOVED_RATING ? LOVED_USER_RATING : 0,
			artUrl: song.artUrl ? song.artUrl : this.fallbackArtUrl(),
			sourceUrl: song.audioUrl ?? "",
			durationMicros: this.durationMicros(song),
			extensionRating: song.rating ?? "",
		};
	}

	/**
	 * The `Metadata` dictionary. Without a song it holds exactly the no-track
	 * id and an empty url, which some shell extensions require.
	 */
	buildMetadata(song: HostSong | null): PropertyTable {
		if (!song) {
			return {
				"mpris:trackid": wire.objectPath(NO_TRACK_PATH),
				"xesam:url": wire.string(""),
			};
		}
		return this.metadataTable(this.buildTrackMetadata(song));
	}

	metadataTable(metadata: TrackMetadata): PropertyTable {
		return {
			"mpris:trackid": wire.objectPath(metadata.trackId),
			"xesam:title": wire.string(metadata.title),
			"xesam:artist": wire.stringArray(metadata.artists),
			"xesam:album": wire.string(metadata.album),
			"xesam:userRating": wire.int32(metadata.userRating),
			"mpris:artUrl": wire.string(metadata.artUrl),
			"xesam:url": wire.string(metadata.sourceUrl),
			"mpris:length": wire.int64(metadata.durationMicros),
			[`${this.config.ratingNamespace}:rating`]: wire.string(metadata.extensionRating),
		};
	}

	/**
	 * Themed generic audio icon as a file URI, else the configured placeholder
	 */
	private fallbackArtUrl(): string {
		const { iconName } = this.config;
		try {
			const path = this.icons.resolve(iconName);
			if (path) {
				return pathToFileURL(path).href;
			}
		} catch (error) {
			this.errorHandler.handleIconThemeError(error, iconName);
		}
		return this.config.fallbackArtUrl;
	}

	// ─────────────────────────────────────────────────────────────
	// Property tables
	// ─────────────────────────────────────────────────────────────

	rootProperties(): PropertyTable {
		return {
			CanQuit: wire.boolean(true),
			CanRaise: wire.boolean(true),
			HasTrackList: wire.boolean(false),
			Identity: wire.string(this.config.identity),
			DesktopEntry: wire.string(this.config.desktopEntry),
			SupportedUriSchemes: wire.stringArray(this.config.supportedUriSchemes),
			SupportedMimeTypes: wire.stringArray(this.config.supportedMimeTypes),
		};
	}

	/**
	 * Player table. CanGoNext, CanPlay, CanPause and CanSeek stay true whatever
	 * the host state: some applets read them once and would stay disabled, and
	 * some only show the position slider when seeking is advertised. Whether a
	 * call does anything is decided when it arrives.
	 */
	playerProperties(): PropertyTable {
		return {
			PlaybackStatus: wire.string(this.playbackStatus()),
			LoopStatus: wire.string(LOOP_STATUS),
			Rate: wire.double(1.0),
			Shuffle: wire.boolean(false),
			Metadata: wire.dict(this.buildMetadata(this.host.currentSong)),
			Volume: wire.double(this.volume()),
			Position: wire.int64(this.positionMicros()),
			MinimumRate: wire.double(1.0),
			MaximumRate: wire.double(1.0),
			CanGoNext: wire.boolean(true),
			CanGoPrevious: wire.boolean(false),
			CanPlay: wire.boolean(true),
			CanPause: wire.boolean(true),
			CanSeek: wire.boolean(true),
			CanControl: wire.boolean(true),
		};
	}

	/**
	 * Current table of a supported interface, or null for any other name
	 */
	tableFor(interfaceName: string): PropertyTable | null {
		switch (interfaceName) {
			case ROOT_INTERFACE:
				return this.rootProperties();
			case PLAYER_INTERFACE:
				return this.playerProperties();
			default:
				return null;
		}
	}
}
