export * from "./constants";
export { colors, getColorScheme, plainColors } from "./colors";
export { getLoggingConfig, LogLevel, parseLogLevel, type LoggingConfig } from "./logging";
