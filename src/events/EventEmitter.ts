/**
 * Typed Event Emitter
 * Publish-subscribe keyed by an event map interface
 */

import { getLogger } from "../utils/Logger";

const logger = getLogger("EventEmitter");

export type EventListener<T> = (data: T) => void;

/**
 * Handle returned by `on`; dropping the subscription is idempotent
 */
export interface EventSubscription {
	unsubscribe(): void;
}

/**
 * Delivery is synchronous: `emit` returns after every listener ran, so one
 * host event is fully relayed before the next is raised. A throwing listener
 * is logged and the remaining listeners still run.
 */
type ListenerTable<EventMap extends object> = {
	[K in keyof EventMap]?: Set<EventListener<EventMap[K]>>;
};

export class EventEmitter<EventMap extends object> {
	private listeners: ListenerTable<EventMap> = {};

	on<K extends keyof EventMap>(
		event: K,
		listener: EventListener<EventMap[K]>,
	): EventSubscription {
		const registered = this.listeners[event] ?? new Set<EventListener<EventMap[K]>>();
		registered.add(listener);
		this.listeners[event] = registered;
		return { unsubscribe: () => this.off(event, listener) };
	}

	/**
	 * Subscribe for the next emission only
	 */
	once<K extends keyof EventMap>(
		event: K,
		listener: EventListener<EventMap[K]>,
	): EventSubscription {
		const subscription = this.on(event, (data) => {
			subscription.unsubscribe();
			listener(data);
		});
		return subscription;
	}

	off<K extends keyof EventMap>(event: K, listener: EventListener<EventMap[K]>): void {
		const registered = this.listeners[event];
		if (!registered) return;
		registered.delete(listener);
		if (registered.size === 0) {
			delete this.listeners[event];
		}
	}

	emit<K extends keyof EventMap>(event: K, data: EventMap[K]): void {
		const registered = this.listeners[event];
		if (!registered) return;

		// Listeners added or removed during delivery take effect next time
		for (const listener of Array.from(registered)) {
			try {
				listener(data);
			} catch (error) {
				logger.error(`Listener for '${String(event)}' threw`, error);
			}
		}
	}

	removeAllListeners(event?: keyof EventMap): void {
		if (event === undefined) {
			this.listeners = {};
		} else {
			delete this.listeners[event];
		}
	}

	listenerCount(event: keyof EventMap): number {
		return this.listeners[event]?.size ?? 0;
	}
}

export function createEventEmitter<EventMap extends object>(): EventEmitter<EventMap> {
	return new EventEmitter<EventMap>();
}
