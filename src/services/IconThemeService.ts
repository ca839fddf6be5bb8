/**
 * Icon Theme Service
 * Looks up icons in freedesktop icon themes on disk
 */

import { existsSync, readdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import type { IIconResolver } from "../interfaces";
import { getLogger } from "../utils/Logger";

const logger = getLogger("IconThemeService");

const ICON_EXTENSIONS = [".svg", ".png"] as const;

// "48x48", "256x256@2"
const SIZE_DIR = /^(\d+)x\1(?:@(\d+))?$/;

interface IconCandidate {
	path: string;
	/** Pixel size, Infinity for scalable icons */
	size: number;
}

/**
 * Icon base directories in lookup order: ~/.icons, then `icons` under
 * $XDG_DATA_HOME and each of $XDG_DATA_DIRS
 */
export function defaultIconSearchPaths(env: NodeJS.ProcessEnv = process.env): string[] {
	const dataHome = env.XDG_DATA_HOME || join(homedir(), ".local", "share");
	const dataDirs = (env.XDG_DATA_DIRS || "/usr/local/share:/usr/share")
		.split(":")
		.filter((dir) => dir.length > 0);

	return [
		join(homedir(), ".icons"),
		join(dataHome, "icons"),
		...dataDirs.map((dir) => join(dir, "icons")),
	];
}

function parseSizeDir(name: string): number | null {
	if (name === "scalable") return Number.POSITIVE_INFINITY;
	const match = SIZE_DIR.exec(name);
	if (!match) return null;
	return Number(match[1]) * Number(match[2] ?? 1);
}

function listDirectories(dir: string): string[] {
	try {
		return readdirSync(dir, { withFileTypes: true })
			.filter((entry) => entry.isDirectory())
			.map((entry) => entry.name);
	} catch (error) {
		logger.debug(`Cannot list ${dir}`, error instanceof Error ? error.message : error);
		return [];
	}
}

/**
 * Resolves icons the way GTK picks them for an unsized request: the first
 * theme that has the icon wins, and within it a scalable variant beats any
 * raster, otherwise the largest raster is used. Results are cached per name.
 */
export class IconThemeService implements IIconResolver {
	private cache = new Map<string, string | null>();

	constructor(
		private themes: readonly string[],
		private searchPaths: readonly string[] = defaultIconSearchPaths(),
	) {}

	resolve(iconName: string): string | null {
		const cached = this.cache.get(iconName);
		if (cached !== undefined) {
			return cached;
		}

		const resolved = this.lookup(iconName);
		this.cache.set(iconName, resolved);
		if (resolved) {
			logger.debug(`Resolved ${iconName} to ${resolved}`);
		} else {
			logger.warn(`No ${iconName} icon in themes ${this.themes.join(", ")}`);
		}
		return resolved;
	}

	clearCache(): void {
		this.cache.clear();
	}

	private lookup(iconName: string): string | null {
		for (const theme of this.themes) {
			const candidates = this.searchPaths.flatMap((base) =>
				this.collectCandidates(join(base, theme), iconName),
			);
			if (candidates.length === 0) continue;

			return candidates.reduce((best, candidate) =>
				candidate.size > best.size ? candidate : best,
			).path;
		}
		return null;
	}

	/**
	 * Every `<size>/<context>/<iconName>.<ext>` file under a theme directory
	 */
	private collectCandidates(themeDir: string, iconName: string): IconCandidate[] {
		if (!existsSync(themeDir)) return [];

		const candidates: IconCandidate[] = [];
		for (const sizeDir of listDirectories(themeDir)) {
			const size = parseSizeDir(sizeDir);
			if (size === null) continue;

			for (const context of listDirectories(join(themeDir, sizeDir))) {
				for (const extension of ICON_EXTENSIONS) {
					const path = join(themeDir, sizeDir, context, `${iconName}${extension}`);
					if (existsSync(path)) {
						candidates.push({ path, size });
					}
				}
			}
		}
		return candidates;
	}
}
