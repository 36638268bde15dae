export { Logger, logger, type LogLevel, type LoggerOptions } from "./logger";
