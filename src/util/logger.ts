import {
  createLogger,
  format,
  isLogLevelName,
  logdataLimiter,
} from "./coreLogger";

const consoleFormat = format.printf(
  ({ level, message, timestamp, contextInfo, data, stack }) => {
    const context = contextInfo === undefined ? "" : ` [${String(contextInfo)}]`;
    const payload = data === undefined ? "" : ` ${logdataLimiter(data)}`;
    const trace = stack === undefined ? "" : `\n${String(stack)}`;
    return `${String(timestamp)} ${level}${context}: ${String(message)}${payload}${trace}`;
  },
);

let loggingEnabled = false;

const logLevel = process.env["LOG_LEVEL"] ? process.env["LOG_LEVEL"] : "debug";
export const logger = createLogger(consoleFormat, logLevel, process.env["NO_COLOR"]);
// silent until a caller opts in
logger.disableAll();

export function enableLogging(): void {
  const level = logLevel.toLowerCase();
  // createLogger has already rejected unknown levels
  if (isLogLevelName(level)) {
    logger.setLevel(level);
  }
  loggingEnabled = true;
}

export function disableLogging(): void {
  logger.disableAll();
  loggingEnabled = false;
}

export function isLoggingEnabled(): boolean {
  return loggingEnabled;
}

export default logger;
export { logdataLimiter };
