/**
 * Adapter Configuration
 * Defaults, optional JSON file and environment overrides, validated with zod
 */

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { APP_NAME, MPRIS_PREFIX } from "./constants";

// Well-known bus name elements may not start with a digit
const BUS_NAME_ELEMENT = /^[A-Za-z_-][A-Za-z0-9_-]*$/;
// Absolute object path, no trailing slash
const OBJECT_PATH = /^(\/[A-Za-z0-9_]+)+$/;

export const AdapterConfigSchema = z.object({
	/** Last element of `org.mpris.MediaPlayer2.<suffix>` */
	busNameSuffix: z
		.string()
		.regex(BUS_NAME_ELEMENT, "must be a single bus name element"),
	identity: z.string().min(1),
	desktopEntry: z.string(),
	trackIdPrefix: z
		.string()
		.regex(OBJECT_PATH, "must be an object path without a trailing slash"),
	/** Namespace of the extension rating key, `<namespace>:rating` */
	ratingNamespace: z.string().regex(/^[A-Za-z0-9_-]+$/),
	supportedUriSchemes: z.array(z.string()),
	supportedMimeTypes: z.array(z.string()),
	/** Icon used as cover art when the host has none */
	iconName: z.string().min(1),
	/** Icon themes searched in order */
	iconThemes: z.array(z.string().min(1)),
	/** Art URL used when no icon could be found */
	fallbackArtUrl: z.string(),
});

export type AdapterConfig = z.infer<typeof AdapterConfigSchema>;

export const DEFAULT_ADAPTER_CONFIG: AdapterConfig = {
	busNameSuffix: "pithos",
	identity: "Pithos",
	desktopEntry: "pithos",
	trackIdPrefix: "/io/github/Pithos/TrackId",
	ratingNamespace: "pithos",
	supportedUriSchemes: [],
	supportedMimeTypes: [],
	iconName: "audio-x-generic",
	iconThemes: ["Adwaita", "hicolor"],
	fallbackArtUrl: "",
};

/**
 * Thrown when the configuration file or the merged result is invalid
 */
export class ConfigError extends Error {
	constructor(
		message: string,
		readonly issues: readonly string[] = [],
	) {
		super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
		this.name = "ConfigError";
	}
}

export interface LoadConfigOptions {
	env?: NodeJS.ProcessEnv;
	/** Explicit config file; defaults to `getConfigPath(env)` */
	path?: string;
	/** Applied last, e.g. by the embedding application */
	overrides?: Partial<AdapterConfig>;
}

/**
 * Config file location: `MPRIS_RELAY_CONFIG`, else
 * `$XDG_CONFIG_HOME/mpris-relay/config.json`
 */
export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
	if (env.MPRIS_RELAY_CONFIG) return env.MPRIS_RELAY_CONFIG;
	const configHome = env.XDG_CONFIG_HOME || join(homedir(), ".config");
	return join(configHome, APP_NAME, "config.json");
}

const ConfigFileSchema = z.record(z.unknown());

function readConfigFile(path: string): Record<string, unknown> {
	if (!existsSync(path)) {
		return {};
	}

	let raw: unknown;
	try {
		raw = JSON.parse(readFileSync(path, "utf-8"));
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new ConfigError(`Failed to read ${path}`, [reason]);
	}

	const parsed = ConfigFileSchema.safeParse(raw);
	if (!parsed.success) {
		throw new ConfigError(`Config file ${path} must contain a JSON object`);
	}
	return parsed.data;
}

function splitList(value: string): string[] {
	return value
		.split(",")
		.map((item) => item.trim())
		.filter((item) => item.length > 0);
}

function readEnvOverrides(env: NodeJS.ProcessEnv): Partial<AdapterConfig> {
	const overrides: Partial<AdapterConfig> = {};

	if (env.MPRIS_RELAY_BUS_NAME) overrides.busNameSuffix = env.MPRIS_RELAY_BUS_NAME;
	if (env.MPRIS_RELAY_IDENTITY) overrides.identity = env.MPRIS_RELAY_IDENTITY;
	if (env.MPRIS_RELAY_DESKTOP_ENTRY !== undefined) {
		overrides.desktopEntry = env.MPRIS_RELAY_DESKTOP_ENTRY;
	}
	if (env.MPRIS_RELAY_ICON_THEMES) {
		overrides.iconThemes = splitList(env.MPRIS_RELAY_ICON_THEMES);
	}

	return overrides;
}

/**
 * Merge defaults, the config file, environment and explicit overrides (later
 * wins) and validate the result.
 *
 * @throws ConfigError listing every invalid field
 */
export function loadAdapterConfig(options: LoadConfigOptions = {}): AdapterConfig {
	const env = options.env ?? process.env;
	const merged = {
		...DEFAULT_ADAPTER_CONFIG,
		...readConfigFile(options.path ?? getConfigPath(env)),
		...readEnvOverrides(env),
		...options.overrides,
	};

	const result = AdapterConfigSchema.safeParse(merged);
	if (!result.success) {
		throw new ConfigError(
			"Invalid adapter configuration",
			result.error.issues.map(
				(issue) => `${issue.path.join(".")}: ${issue.message}`,
			),
		);
	}

	return result.data;
}

/**
 * Well-known bus name for a configuration
 */
export function busNameFor(config: AdapterConfig): string {
	return `${MPRIS_PREFIX}.${config.busNameSuffix}`;
}
