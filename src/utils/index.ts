export {
	Logger,
	getLogger,
	configureLogger,
	type LoggerConfig,
} from "./Logger";
export { LogWriter, getLogWriter, resetLogWriter } from "./LogWriter";
export { clampUnit, toHostVolume, toProtocolVolume } from "./volume";
