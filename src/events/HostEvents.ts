/**
 * Host Event Map
 * Events a player host raises toward the MPRIS adapter
 */

import type { HostSong } from "../types/host";
import { createEventEmitter, type EventEmitter } from "./EventEmitter";

/**
 * Host event map
 * Maps event names to their payload types
 */
export interface HostEventMap {
	/** A song's metadata is known or changed (not necessarily the current song) */
	metadataChanged: HostSong;
	/** `true` when playback started, `false` when it paused */
	playStateChanged: boolean;
	/** New linear volume of the audio engine, 0..1 */
	volumeChanged: number;
	/** Buffering completed and the engine reports its position, in nanoseconds */
	bufferingFinished: number;
}

export type HostEventBus = EventEmitter<HostEventMap>;

export function createHostEventBus(): HostEventBus {
	return createEventEmitter<HostEventMap>();
}
