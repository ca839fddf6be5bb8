import { beforeEach, describe, expect, it } from "vitest";
import {
	INTROSPECTABLE_INTERFACE,
	MPRIS_PATH,
	PLAYER_INTERFACE,
	PROPERTIES_INTERFACE,
} from "../config/constants";
import { SimulatedPlayerHost } from "../hosts/SimulatedPlayerHost";
import { MemoryBusTransport } from "../testing/MemoryBusTransport";
import type { HostSong } from "../types/host";
import { MprisAdapter } from "./MprisAdapter";
import { type PropertyTable, wire } from "./wire";

const BUS_NAME = "org.mpris.MediaPlayer2.pithos";

const FIRST: HostSong = {
	trackToken: "abc123",
	title: "Test Title",
	artist: "Test Artist",
	album: "Test Album",
	artUrl: "https://example.com/cover.jpg",
	trackLength: 200,
};

const SECOND: HostSong = {
	trackToken: "def456",
	title: "Other Title",
	trackLength: 90,
};

/**
 * Changed-properties dictionaries of every PropertiesChanged recorded
 */
function changes(bus: MemoryBusTransport): PropertyTable[] {
	return bus.signalsNamed("PropertiesChanged").map((signal) => {
		const dict = signal.args[1];
		return dict.type === "a{sv}" ? dict.value : {};
	});
}

describe("MprisAdapter", () => {
	let host: SimulatedPlayerHost;
	let bus: MemoryBusTransport;
	let adapter: MprisAdapter;

	beforeEach(() => {
		host = new SimulatedPlayerHost({ playlist: [FIRST, SECOND], volume: 1 });
		bus = new MemoryBusTransport();
		adapter = new MprisAdapter({ host, transport: bus, icons: { resolve: () => null } });
	});

	describe("start", () => {
		it("exports the object and claims the bus name", async () => {
			await adapter.start();

			expect(adapter.isRunning()).toBe(true);
			expect(bus.isExported(MPRIS_PATH)).toBe(true);
			expect([...bus.ownedNames]).toEqual([BUS_NAME]);
			expect(bus.signals).toHaveLength(0);
		});

		it("publishes the state of a song already playing", async () => {
			host.loadSong(FIRST);
			host.play();

			await adapter.start();

			const [metadata, status] = changes(bus);
			expect(metadata.Metadata.type).toBe("a{sv}");
			expect(status).toEqual({ PlaybackStatus: wire.string("Playing") });
		});

		it("leaves nothing registered when the name is taken", async () => {
			const taken = new MemoryBusTransport({ takenNames: [BUS_NAME] });
			const blocked = new MprisAdapter({ host, transport: taken, icons: { resolve: () => null } });

			await expect(blocked.start()).rejects.toThrow(`Bus name ${BUS_NAME} is already taken`);
			expect(blocked.isRunning()).toBe(false);
			expect(taken.isExported(MPRIS_PATH)).toBe(false);
			expect(host.listenerCount("metadataChanged")).toBe(0);
		});

		it("subscribes once when starts overlap", async () => {
			await Promise.all([adapter.start(), adapter.start()]);

			expect(host.listenerCount("volumeChanged")).toBe(1);
			expect([...bus.ownedNames]).toEqual([BUS_NAME]);

			await adapter.stop();
			host.loadSong(FIRST);
			host.finishBuffering();

			expect(host.listenerCount("bufferingFinished")).toBe(0);
			expect(bus.signals).toHaveLength(0);
		});

		it("stops after a start still in flight", async () => {
			const starting = adapter.start();
			await adapter.stop();
			await starting;

			expect(adapter.isRunning()).toBe(false);
			expect(bus.isExported(MPRIS_PATH)).toBe(false);
			expect(host.listenerCount("metadataChanged")).toBe(0);
		});

		it("does nothing when already running", async () => {
			await adapter.start();
			await adapter.start();

			expect(host.listenerCount("volumeChanged")).toBe(1);
		});
	});

	describe("host events", () => {
		beforeEach(async () => {
			await adapter.start();
		});

		it("publishes metadata for the current song", () => {
			host.nextSong();

			const [metadata, status] = changes(bus);
			expect(metadata.Metadata).toEqual(
				wire.dict({
					"mpris:trackid": wire.objectPath("/io/github/Pithos/TrackId/616263313233"),
					"xesam:title": wire.string("Test Title"),
					"xesam:artist": wire.stringArray(["Test Artist"]),
					"xesam:album": wire.string("Test Album"),
					"xesam:userRating": wire.int32(0),
					"mpris:artUrl": wire.string("https://example.com/cover.jpg"),
					"xesam:url": wire.string(""),
					"mpris:length": wire.int64(200_000_000),
					"pithos:rating": wire.string(""),
				}),
			);
			expect(status).toEqual({ PlaybackStatus: wire.string("Playing") });
		});

		it("ignores metadata of songs that are not current", () => {
			host.loadSong(FIRST);
			bus.clearSignals();

			host.announce(SECOND);

			expect(bus.signals).toHaveLength(0);
		});

		it("publishes play state changes", () => {
			host.loadSong(FIRST);
			host.play();
			host.pause();

			expect(changes(bus).slice(1)).toEqual([
				{ PlaybackStatus: wire.string("Playing") },
				{ PlaybackStatus: wire.string("Paused") },
			]);
		});

		it("publishes volume on the cube-root scale", () => {
			host.setVolume(0.125);

			const [change] = changes(bus);
			expect(Object.keys(change)).toEqual(["Volume"]);
			expect(change.Volume.type).toBe("d");
			expect(change.Volume.value).toBeCloseTo(0.5, 12);
		});

		it("does not repeat an unchanged volume", () => {
			host.setVolume(1);

			expect(bus.signals).toHaveLength(0);
		});

		it("reports the position after buffering as Seeked", () => {
			host.loadSong(FIRST);
			host.advance(2_500_000_999);
			bus.clearSignals();

			host.finishBuffering();

			expect(bus.signals).toEqual([
				{
					path: MPRIS_PATH,
					interface: PLAYER_INTERFACE,
					member: "Seeked",
					args: [wire.int64(2_500_000)],
				},
			]);
		});
	});

	describe("bus calls", () => {
		beforeEach(async () => {
			await adapter.start();
		});

		it("sets the volume and echoes the change", async () => {
			await bus.call(MPRIS_PATH, PROPERTIES_INTERFACE, "Set", PLAYER_INTERFACE, "Volume", {
				signature: "d",
				value: 0.5,
			});

			expect(host.getVolume()).toBe(0.125);
			const [change] = changes(bus);
			expect(change.Volume.value).toBeCloseTo(0.5, 12);
		});

		it("ignores Next while the host waits for a playlist", async () => {
			host.setWaitingForPlaylist(true);

			await bus.call(MPRIS_PATH, PLAYER_INTERFACE, "Next");

			expect(host.currentSong).toBeNull();
			expect(bus.signals).toHaveLength(0);
		});

		it("reports a loved song playing at low volume", async () => {
			const loved: HostSong = {
				trackToken: "abc123",
				title: "X",
				artist: "Y",
				album: "Z",
				rating: "love",
				trackLength: 60,
			};
			host.setVolume(0.125);
			host.loadSong(loved);
			host.play();

			const [reply] = await bus.call(MPRIS_PATH, PROPERTIES_INTERFACE, "GetAll", PLAYER_INTERFACE);
			expect(reply.type).toBe("a{sv}");
			if (reply.type !== "a{sv}") return;

			const { Metadata, PlaybackStatus, Volume } = reply.value;
			expect(PlaybackStatus).toEqual(wire.string("Playing"));
			expect(Volume.value).toBeCloseTo(0.5, 12);
			expect(Metadata.type).toBe("a{sv}");
			if (Metadata.type !== "a{sv}") return;
			expect(Metadata.value["xesam:userRating"]).toEqual(wire.int32(5));
			expect(Metadata.value["mpris:trackid"]).toEqual(
				wire.objectPath("/io/github/Pithos/TrackId/616263313233"),
			);
		});

		it("introspects with properties", async () => {
			const [reply] = await bus.call(MPRIS_PATH, INTROSPECTABLE_INTERFACE, "Introspect");

			expect(reply.type).toBe("s");
			expect(reply.value).toEqual(
				expect.stringContaining('<property name="Volume" type="d" access="readwrite"/>'),
			);
		});
	});

	describe("stop", () => {
		it("releases the name and stops relaying", async () => {
			await adapter.start();
			await adapter.stop();

			expect(adapter.isRunning()).toBe(false);
			expect(bus.ownedNames.size).toBe(0);
			expect(bus.isExported(MPRIS_PATH)).toBe(false);
			expect(host.listenerCount("playStateChanged")).toBe(0);

			host.nextSong();
			expect(bus.signals).toHaveLength(0);
		});

		it("can start again after stopping", async () => {
			await adapter.start();
			await adapter.stop();
			await adapter.start();

			host.setVolume(0.125);
			expect(changes(bus)).toHaveLength(1);
		});
	});
});
