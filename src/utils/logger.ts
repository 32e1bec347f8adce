import winston from 'winston';

import type { LoggingConfig } from './types.js';

const { combine, timestamp, printf, colorize, json, errors } = winston.format;

// Custom log format for development (human-readable)
const devFormat = printf(({ level, message, timestamp, ...metadata }) => {
  let msg = `${timestamp} [${level}]: ${message}`;

  if (Object.keys(metadata).length > 0) {
    // Filter out Symbol properties that Winston adds
    const cleanMetadata: Record<string, unknown> = {};
    for (const key of Object.keys(metadata)) {
      if (!key.startsWith('Symbol')) {
        cleanMetadata[key] = metadata[key];
      }
    }
    if (Object.keys(cleanMetadata).length > 0) {
      msg += ` ${JSON.stringify(cleanMetadata)}`;
    }
  }

  return msg;
});

// Determine log level from environment
const getLogLevel = (): string => {
  const envLevel = process.env['LOG_LEVEL'];
  if (envLevel) {
    return envLevel.toLowerCase();
  }
  switch (process.env['NODE_ENV']) {
    case 'production':
      return 'info';
    case 'test':
      return 'warn';
    default:
      return 'debug';
  }
};

const jsonFormat = (): winston.Logform.Format =>
  combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }), errors({ stack: true }), json());

const prettyFormat = (): winston.Logform.Format =>
  combine(colorize({ all: true }), timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }), errors({ stack: true }), devFormat);

// Determine log format from environment
const getLogFormat = (): winston.Logform.Format => {
  const format = process.env['LOG_FORMAT'];
  const isDev = process.env['NODE_ENV'] !== 'production';

  if (format === 'json' || !isDev) {
    return jsonFormat();
  }

  return prettyFormat();
};

const getFileTransports = (logFilePath: string): winston.transport[] => [
  new winston.transports.File({
    filename: logFilePath,
    maxsize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
    tailable: true,
  }),
  // Separate error log file
  new winston.transports.File({
    filename: logFilePath.replace('.log', '.error.log'),
    level: 'error',
    maxsize: 10 * 1024 * 1024,
    maxFiles: 5,
    tailable: true,
  }),
];

// Create transports array
const getTransports = (): winston.transport[] => {
  const transports: winston.transport[] = [new winston.transports.Console()];

  if (process.env['LOG_FILE_ENABLED'] === 'true') {
    transports.push(...getFileTransports(process.env['LOG_FILE_PATH'] ?? './logs/prism.log'));
  }

  return transports;
};

const logger = winston.createLogger({
  level: getLogLevel(),
  format: getLogFormat(),
  transports: getTransports(),
  exitOnError: false,
});

let fileTransportsAttached = process.env['LOG_FILE_ENABLED'] === 'true';

/**
 * Apply the logging section of the loaded configuration
 */
export const configureLogger = (config: LoggingConfig): void => {
  logger.level = config.level;
  logger.format = config.format === 'json' ? jsonFormat() : prettyFormat();

  if (config.fileEnabled && !fileTransportsAttached) {
    for (const transport of getFileTransports(config.filePath)) {
      logger.add(transport);
    }
    fileTransportsAttached = true;
  }
};

// Request logger for HTTP requests
export interface RequestLogData {
  requestId: string;
  method: string;
  path: string;
  statusCode?: number;
  responseTimeMs?: number;
  ipAddress?: string;
  userAgent?: string;
  error?: string;
}

export const logRequest = (data: RequestLogData): void => {
  const level = data.statusCode
    ? data.statusCode >= 500
      ? 'error'
      : data.statusCode >= 400
        ? 'warn'
        : 'info'
    : 'info';

  logger.log(level, `${data.method} ${data.path}`, {
    type: 'request',
    ...data,
  });
};

// Pipeline stage logger
export interface PipelineLogData {
  runId: string;
  stage: 'parse' | 'policy' | 'denied' | 'compile' | 'execute' | 'error' | 'postprocess' | 'done';
  role?: string;
  decision?: string;
  sqlHash?: string;
  rowCount?: number;
  durationMs?: number;
  error?: string;
}

export const logPipeline = (data: PipelineLogData): void => {
  const level = data.stage === 'error' ? 'warn' : data.stage === 'done' || data.stage === 'denied' ? 'info' : 'debug';

  logger.log(level, `Pipeline ${data.stage}`, {
    type: 'pipeline',
    ...data,
  });
};

// Config logger
export const logConfig = (message: string, data?: Record<string, unknown>): void => {
  logger.info(message, {
    type: 'config',
    ...data,
  });
};

// Startup/shutdown logger
export const logLifecycle = (
  event: 'startup' | 'shutdown' | 'ready' | 'error',
  message: string,
  data?: Record<string, unknown>
): void => {
  const level = event === 'error' ? 'error' : 'info';

  logger.log(level, `[${event.toUpperCase()}] ${message}`, {
    type: 'lifecycle',
    event,
    ...data,
  });
};

export default logger;
