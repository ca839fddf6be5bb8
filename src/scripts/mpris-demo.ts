/**
 * MPRIS Demo Script
 * Run with: npm run demo
 *
 * Publishes a simulated player on the session bus. Watch it with
 * `playerctl --follow metadata` or any desktop media widget.
 */

import { loadAdapterConfig } from "../config/adapter";
import { SimulatedPlayerHost } from "../hosts/SimulatedPlayerHost";
import { MprisAdapter } from "../mpris/MprisAdapter";
import { DbusTransport } from "../services/DbusTransport";
import type { HostSong } from "../types/host";

const SECOND_NANOS = 1_000_000_000;

const DEMO_PLAYLIST: HostSong[] = [
	{
		trackToken: "demo-track-1",
		title: "Morning Static",
		artist: "The Placeholders",
		album: "Sample Rate",
		rating: "love",
		trackLength: 212,
	},
	{
		trackToken: "demo-track-2",
		title: "Untitled Loop",
		artist: null,
		album: "Sample Rate",
		trackLength: 187,
	},
	{
		trackToken: "demo-track-3",
		title: "Low Battery",
		artist: "Quiet Machines",
		album: null,
		trackLength: 240,
	},
];

async function main() {
	console.log("MPRIS Demo - simulated player\n");
	console.log("=".repeat(50));

	const config = loadAdapterConfig();
	const host = new SimulatedPlayerHost({ playlist: DEMO_PLAYLIST, volume: 0.5 });
	const transport = new DbusTransport();
	const adapter = new MprisAdapter({ host, transport, config });

	await adapter.start();
	console.log(`Published as ${adapter.busName}\n`);

	host.nextSong();
	showState(host);

	console.log("\nAvailable Commands:");
	console.log("  p  - Play/Pause");
	console.log("  n  - Next track");
	console.log("  +  - Volume up");
	console.log("  -  - Volume down");
	console.log("  b  - Finish buffering (emits Seeked)");
	console.log("  s  - Show current state");
	console.log("  q  - Quit\n");

	const shutdown = async () => {
		await adapter.stop();
		transport.disconnect();
		console.log("\nBye!");
		process.exit(0);
	};

	process.stdin.setRawMode(true);
	process.stdin.resume();
	process.stdin.setEncoding("utf8");

	process.stdin.on("data", (key: string) => {
		switch (key) {
			case "p":
				host.playpause();
				console.log(host.playing ? "Playing" : "Paused");
				break;
			case "n":
				host.nextSong();
				showState(host);
				break;
			case "+":
			case "=":
				host.setVolume(host.getVolume() + 0.05);
				console.log(`Volume ${Math.round(host.getVolume() * 100)}%`);
				break;
			case "-":
				host.setVolume(host.getVolume() - 0.05);
				console.log(`Volume ${Math.round(host.getVolume() * 100)}%`);
				break;
			case "b":
				host.advance(5 * SECOND_NANOS);
				host.finishBuffering();
				console.log(`Buffered, position ${formatTime(host.queryPosition() ?? 0)}`);
				break;
			case "s":
				showState(host);
				break;
			case "q":
			case "\u0003": // Ctrl+C
				shutdown().catch((err) => {
					console.error("Error:", err);
					process.exit(1);
				});
				break;
		}
	});

	console.log("Listening for commands... (press 'q' to quit)\n");
}

function showState(host: SimulatedPlayerHost): void {
	const song = host.currentSong;
	if (!song) {
		console.log("No song loaded. The playlist is empty.");
		return;
	}
	console.log(`\n${song.title ?? "?"} - ${song.artist ?? "?"}`);
	console.log(
		`   ${host.playing ? "Playing" : "Paused"} ${formatTime(host.queryPosition() ?? 0)} | Vol: ${Math.round(host.getVolume() * 100)}%`,
	);
}

function formatTime(nanos: number): string {
	const totalSeconds = Math.floor(nanos / SECOND_NANOS);
	const minutes = Math.floor(totalSeconds / 60);
	const seconds = totalSeconds % 60;
	return `${minutes}:${seconds.toString().padStart(2, "0")}`;
}

main().catch((err) => {
	console.error("Error:", err);
	process.exit(1);
});
