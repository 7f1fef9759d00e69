import pino, { Logger, LoggerOptions } from "pino";
import { getStage, isLocal, isProduction, isTest } from "./env";

/**
 * Centralized structured logger for both local runs and AWS Lambda.
 * - Local/dev: pretty-printed logs for readability
 * - Lambda/prod: JSON logs for CloudWatch
 * - Jest: silent unless LOG_LEVEL says otherwise
 */
function resolveLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (isTest()) return "silent";
  return isProduction() ? "info" : "debug";
}

const baseOptions: LoggerOptions = {
  level: resolveLevel(),
  base: {
    service: "activity-stats-job",
    stage: getStage(),
  },
  redact: {
    paths: ["*.password", "*.secret", "*.token", "*.apiKey"],
    remove: true,
  },
  messageKey: "message",
  timestamp: pino.stdTimeFunctions.isoTime,
};

const transport =
  isLocal() && !isProduction() && !isTest()
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          singleLine: false,
          ignore: "pid,hostname",
        },
      }
    : undefined;

const rootLogger: Logger = pino({ ...baseOptions, transport });

export type { Logger };

/**
 * Returns a child logger with module-scoped bindings.
 */
export function getLogger(moduleName?: string): Logger {
  if (!moduleName) return rootLogger;
  return rootLogger.child({ module: moduleName });
}

/**
 * Returns a child logger augmented with the Lambda request context and the
 * trigger event's correlation id.
 */
export function withRequestContext(
  moduleName: string | undefined,
  request: {
    correlationId: string;
    awsRequestId?: string;
    functionName?: string;
    functionVersion?: string;
  }
): Logger {
  return getLogger(moduleName).child({
    correlationId: request.correlationId,
    requestId: request.awsRequestId,
    functionName: request.functionName,
    functionVersion: request.functionVersion,
  });
}
