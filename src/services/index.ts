/**
 * Services re-exports
 */

export { BusNameUnavailableError, type BusConnection, DbusTransport } from "./DbusTransport";
export { decodeArgument, encodeReplyValue } from "./dbusCodec";
export type { ErrorContext } from "./ErrorHandler";
export {
	createErrorHandler,
	ErrorCategory,
	ErrorHandler,
	ErrorSeverity,
	getErrorHandler,
} from "./ErrorHandler";
export { defaultIconSearchPaths, IconThemeService } from "./IconThemeService";
export { buildIntrospectionXml, renderIntrospection } from "./introspectionXml";
