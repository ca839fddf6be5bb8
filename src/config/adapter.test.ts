import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	ConfigError,
	DEFAULT_ADAPTER_CONFIG,
	busNameFor,
	getConfigPath,
	loadAdapterConfig,
} from "./adapter";

describe("adapter configuration", () => {
	let dir: string;
	let configPath: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "mpris-relay-config-"));
		configPath = join(dir, "config.json");
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it("uses the defaults without a file or environment", () => {
		expect(loadAdapterConfig({ env: {}, path: configPath })).toEqual(DEFAULT_ADAPTER_CONFIG);
	});

	it("reads values from the config file", () => {
		writeFileSync(configPath, JSON.stringify({ identity: "Test Player", iconThemes: ["Papirus"] }));

		const config = loadAdapterConfig({ env: {}, path: configPath });
		expect(config.identity).toBe("Test Player");
		expect(config.iconThemes).toEqual(["Papirus"]);
		expect(config.busNameSuffix).toBe("pithos");
	});

	it("lets the environment override the file", () => {
		writeFileSync(configPath, JSON.stringify({ busNameSuffix: "fromfile" }));

		const config = loadAdapterConfig({
			env: { MPRIS_RELAY_BUS_NAME: "fromenv", MPRIS_RELAY_ICON_THEMES: "Breeze, hicolor," },
			path: configPath,
		});
		expect(config.busNameSuffix).toBe("fromenv");
		expect(config.iconThemes).toEqual(["Breeze", "hicolor"]);
	});

	it("applies explicit overrides last", () => {
		const config = loadAdapterConfig({
			env: { MPRIS_RELAY_IDENTITY: "Env Player" },
			path: configPath,
			overrides: { identity: "Embedded Player" },
		});
		expect(config.identity).toBe("Embedded Player");
	});

	it("lists every invalid field", () => {
		expect(() =>
			loadAdapterConfig({
				env: {},
				path: configPath,
				overrides: { busNameSuffix: "1bad", trackIdPrefix: "/trailing/" },
			}),
		).toThrow(
			"Invalid adapter configuration: busNameSuffix: must be a single bus name element; trackIdPrefix: must be an object path without a trailing slash",
		);
	});

	it("rejects a file that is not JSON", () => {
		writeFileSync(configPath, "{ not json");

		expect(() => loadAdapterConfig({ env: {}, path: configPath })).toThrow(ConfigError);
	});

	it("rejects a file that is not an object", () => {
		writeFileSync(configPath, "[1, 2]");

		expect(() => loadAdapterConfig({ env: {}, path: configPath })).toThrow(
			`Config file ${configPath} must contain a JSON object`,
		);
	});

	it("finds the config file", () => {
		expect(getConfigPath({ MPRIS_RELAY_CONFIG: "/etc/relay.json" })).toBe("/etc/relay.json");
		expect(getConfigPath({ XDG_CONFIG_HOME: "/cfg" })).toBe("/cfg/mpris-relay/config.json");
	});

	it("derives the bus name", () => {
		expect(busNameFor(DEFAULT_ADAPTER_CONFIG)).toBe("org.mpris.MediaPlayer2.pithos");
	});
});
