import { Format, format } from "logform";
import truncate from "json-truncate";
import loglevel from "loglevel";
import { MESSAGE, LEVEL } from "triple-beam";

export type LogMetadata = {
  contextInfo?: string;
  data?: unknown;
  stack?: string;
};

// wrapping logger type to prepare for future backend logging swaps
export interface CommonLogger extends loglevel.Logger {}

// These are loglevel's levels
const levelNames = ["trace", "debug", "info", "warn", "error", "silent"] as const;
export type LogLevelName = (typeof levelNames)[number];

export function isLogLevelName(level: string): level is LogLevelName {
  return (levelNames as readonly string[]).includes(level);
}

export const createLogger = (
  consoleFormatLogger: Format,
  logLevel: string,
  noColor?: string,
): CommonLogger => {
  /* Expose winston-style interface to the logger */
  // generate fresh logger
  const logger = loglevel.getLogger(Symbol());
  // remember default log method generator
  const originalFactory = logger.methodFactory;

  // configure colorizer
  const colorizer = format.colorize({
    colors: {
      error: "red",
      debug: "blue",
      warn: "yellow",
      info: "green",
      trace: "magenta",
    },
  });

  // generate new logging methods
  logger.methodFactory = function (methodName, level, loggerName) {
    // remember default log method
    const rawMethod = originalFactory(methodName, level, loggerName);

    // create formatter with logform
    const thisFormat = noColor
      ? format.combine(
          format.splat(),
          format.timestamp(),
          format.errors({ stack: true }),
          consoleFormatLogger,
        )
      : format.combine(
          colorizer,
          format.splat(),
          format.timestamp(),
          format.errors({ stack: true }),
          consoleFormatLogger,
        );

    // generate actual logging method
    return function (message: unknown, metadata?: LogMetadata) {
      // send log info to formatter
      const formatted = thisFormat.transform({
        // convert to logLevel string, since that is what logform expects
        level: methodName,
        [LEVEL]: methodName,
        message,
        ...metadata,
      });

      if (typeof formatted !== "boolean") {
        // retrieve formatted message, send to raw method
        rawMethod(String(formatted[MESSAGE]));
      }
    };
  };

  const normalized = logLevel.toLowerCase();
  if (!isLogLevelName(normalized)) {
    throw Error(`Unknown logLevel: ${logLevel}`);
  }
  // simultaneously set logger level & apply new methodFactory.
  logger.setLevel(normalized);
  return logger;
};

// Large payloads (tick maps, position lists) are truncated before they reach the console
export const logdataLimiter = (data: unknown): string => {
  return JSON.stringify(truncate(data, { maxDepth: 3, replace: "[Truncated]" }));
};

export { format };

export default createLogger;
