export {
	EventEmitter,
	createEventEmitter,
	type EventListener,
	type EventSubscription,
} from "./EventEmitter";

export {
	createHostEventBus,
	type HostEventBus,
	type HostEventMap,
} from "./HostEvents";
