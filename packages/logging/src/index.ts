/**
 * @speech-gateway/logging — structured JSON logging.
 */

export { Logger, createRootLogger, type LogLevel, type LoggerOptions } from "./logger.js";
