export {
	calculateLayout,
	cleanupTerminal,
	enterFullscreen,
	ESCAPE_SEQUENCES,
	getTerminalSize,
	moveTo,
} from "./terminal";
export {
	Logger,
	getLogger,
	type LoggerConfig,
} from "./Logger";
export { LogLevel } from "../config/logging";
export { LogWriter, getLogWriter } from "./LogWriter";
export { getBackoffDelay, sleep } from "./backoff";
export { decodeHtmlEntities, displayTime, truncate } from "./format";
export { runProcess, type ProcessResult, type ProcessRunner } from "./process";
