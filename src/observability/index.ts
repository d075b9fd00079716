export type { Logger, LogLevel, LogContext } from "./logging";
export { LOG_LEVELS, ConsoleLogger, NoopLogger, logOperation, logError } from "./logging";
