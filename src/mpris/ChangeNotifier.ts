/**
 * Change Notifier
 * Publishes property changes as one batched PropertiesChanged per interface
 * and position corrections as Seeked
 */

import {
	MPRIS_PATH,
	PLAYER_INTERFACE,
	PROPERTIES_INTERFACE,
} from "../config/constants";
import type { IBusTransport } from "../interfaces";
import { getLogger } from "../utils/Logger";
import { type PropertyTable, type WireValue, toPlainTable, wire, wireEquals } from "./wire";

const logger = getLogger("ChangeNotifier");

export type SignalSink = Pick<IBusTransport, "emitSignal">;

export class ChangeNotifier {
	private published = new Map<string, Map<string, WireValue>>();

	constructor(
		private sink: SignalSink,
		private path: string = MPRIS_PATH,
	) {}

	private tableFor(interfaceName: string): Map<string, WireValue> {
		let table = this.published.get(interfaceName);
		if (!table) {
			table = new Map();
			this.published.set(interfaceName, table);
		}
		return table;
	}

	/**
	 * Record values as already published without emitting anything
	 */
	prime(interfaceName: string, fragment: PropertyTable): void {
		const table = this.tableFor(interfaceName);
		for (const [name, value] of Object.entries(fragment)) {
			table.set(name, value);
		}
	}

	/**
	 * Emit one PropertiesChanged holding the entries of `fragment` that differ
	 * from what was last published. Nothing is emitted when none differ.
	 *
	 * @returns names of the properties that changed
	 */
	publish(interfaceName: string, fragment: PropertyTable): string[] {
		const table = this.tableFor(interfaceName);
		const changed: Record<string, WireValue> = {};

		for (const [name, value] of Object.entries(fragment)) {
			const previous = table.get(name);
			if (previous === undefined || !wireEquals(previous, value)) {
				changed[name] = value;
			}
		}

		const names = Object.keys(changed);
		if (names.length === 0) {
			return names;
		}

		logger.debug(`PropertiesChanged on ${interfaceName}`, toPlainTable(changed));
		this.sink.emitSignal(this.path, PROPERTIES_INTERFACE, "PropertiesChanged", [
			wire.string(interfaceName),
			wire.dict(changed),
			wire.stringArray([]),
		]);

		// Only values that went out count as published
		for (const name of names) {
			table.set(name, changed[name]);
		}

		return names;
	}

	/**
	 * Tell clients the true playback position. Always emitted; a Seeked is not
	 * a property change and is never deduplicated.
	 */
	positionCorrected(positionMicros: number): void {
		logger.debug(`Seeked to ${positionMicros}µs`);
		this.sink.emitSignal(this.path, PLAYER_INTERFACE, "Seeked", [
			wire.int64(positionMicros),
		]);
	}

	lastPublished(interfaceName: string, propertyName: string): WireValue | undefined {
		return this.published.get(interfaceName)?.get(propertyName);
	}

	/**
	 * Forget everything published, e.g. after leaving the bus
	 */
	reset(): void {
		this.published.clear();
	}
}
