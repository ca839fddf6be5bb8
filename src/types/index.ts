export type { HostSong } from "./host";
export type {
	LoopStatus,
	PlaybackSnapshot,
	PlaybackStatus,
	TrackMetadata,
} from "./mpris";
