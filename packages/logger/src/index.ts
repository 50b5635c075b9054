import pino, {
  type DestinationStream,
  type Logger,
  type LoggerOptions,
} from "pino";
import { getBatchId } from "./context.js";

export type { Logger } from "pino";

export {
  type BatchContext,
  getBatchId,
  runWithBatchId,
} from "./context.js";

export interface LoggerConfig {
  /** Service name for log identification */
  service: string;
  /** Log level (default: "info") */
  level?: string;
  /** App version for log metadata */
  version?: string;
  /** Environment name (default: "development") */
  environment?: string;
  /** Enable pretty printing (default: false in production) */
  pretty?: boolean;
  /** Write to stderr instead of stdout, leaving stdout for command output */
  stderr?: boolean;
  /** Explicit destination; JSON is written to it and pretty is ignored */
  stream?: DestinationStream;
  /** Custom message format for pretty printing */
  messageFormat?: string;
  /** Fields to ignore in pretty output */
  ignoreFields?: string;
}

/**
 * Creates a configured Pino logger instance
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    service,
    level = "info",
    version = "0.1.0",
    environment = "development",
    pretty = environment !== "production",
    stderr = false,
    stream,
    messageFormat = "[{module}] {msg}",
    ignoreFields = "pid,hostname,service,version,environment",
  } = config;

  const base = {
    service,
    version,
    environment,
  };

  const options: LoggerOptions = {
    level,
    // Mixin automatically adds batchId from AsyncLocalStorage to every log entry
    mixin() {
      const batchId = getBatchId();
      return batchId ? { batchId } : {};
    },
    formatters: {
      level: (label) => ({ level: label }),
      log: (object) => ({
        ...object,
        ...base,
      }),
    },
  };

  if (stream) {
    return pino(options, stream);
  }

  if (pretty) {
    return pino(
      options,
      pino.transport({
        target: "pino-pretty",
        options: {
          destination: stderr ? 2 : 1,
          colorize: true,
          translateTime: "SYS:standard",
          messageFormat,
          ignore: ignoreFields,
        },
      }),
    );
  }

  return pino(options, stderr ? process.stderr : process.stdout);
}

/**
 * Creates a child logger with an additional context field
 * @param parent - The parent logger instance
 * @param name - The name/module identifier for this child logger
 * @param contextKey - The key to use for the context (default: "module")
 */
export function createChildLogger(
  parent: Logger,
  name: string,
  contextKey = "module",
): Logger {
  return parent.child({ [contextKey]: name });
}

/**
 * Creates a pre-configured logger factory for a specific service
 * Returns a function that creates child loggers with consistent configuration
 */
export function createLoggerFactory(config: LoggerConfig) {
  const rootLogger = createLogger(config);
  const contextKey = config.messageFormat?.includes("{provider}")
    ? "provider"
    : "module";

  return {
    logger: rootLogger,
    createChildLogger: (name: string) =>
      createChildLogger(rootLogger, name, contextKey),
  };
}
