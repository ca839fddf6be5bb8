export type {
	ArgumentDescription,
	BusObjectHandler,
	IBusTransport,
	InterfaceDescription,
	MemberDescription,
	MethodCall,
	VariantArgument,
} from "./IBusTransport";
export type { IIconResolver } from "./IIconResolver";
export type { IPlayerHost } from "./IPlayerHost";
