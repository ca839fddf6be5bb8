export { ChangeNotifier, type SignalSink } from "./ChangeNotifier";
export {
	InvalidArgsError,
	MprisError,
	PropertyNotFoundError,
	ReadOnlyPropertyError,
	UnknownMethodError,
	UnsupportedInterfaceError,
} from "./errors";
export {
	INTROSPECTABLE_DESCRIPTION,
	MPRIS_OBJECT_INTERFACES,
	PLAYER_DESCRIPTION,
	PROPERTIES_DESCRIPTION,
	ROOT_DESCRIPTION,
} from "./interfaces";
export {
	IntrospectionSynthesizer,
	describeProperties,
	type PropertyDescriptor,
	type PropertySource,
} from "./IntrospectionSynthesizer";
export { MethodDispatcher } from "./MethodDispatcher";
export { MprisAdapter, type MprisAdapterOptions } from "./MprisAdapter";
export { SnapshotBuilder, encodeTrackId } from "./SnapshotBuilder";
export {
	signatureOf,
	toPlain,
	toPlainTable,
	wire,
	wireEquals,
	type PlainValue,
	type PropertyTable,
	type ReplyValue,
	type Tagged,
	type WireSignature,
	type WireValue,
} from "./wire";
