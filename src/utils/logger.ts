import winston from 'winston';

export interface LoggerOptions {
  level?: string | undefined;
  name: string;
  logFile?: string | undefined;
  silent?: boolean | undefined;
}

// Console output goes to stderr so stdout stays reserved for JSON results
const ALL_LEVELS = Object.keys(winston.config.npm.levels);

function buildTransports(logFile: string | undefined): winston.transport[] {
  const transports: winston.transport[] = [
    new winston.transports.Console({ stderrLevels: ALL_LEVELS }),
  ];

  if (logFile) {
    transports.push(
      new winston.transports.File({
        filename: logFile,
        maxsize: 10485760, // 10MB
        maxFiles: 5,
      })
    );
  }

  return transports;
}

export function createLogger(options: LoggerOptions): winston.Logger {
  const { level = 'info', name, logFile, silent = false } = options;

  return winston.createLogger({
    level,
    silent,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
        return `${timestamp} ${level.toUpperCase()} [${name}] ${message}${metaStr}`;
      })
    ),
    transports: buildTransports(logFile),
  });
}

export function createJobLogger(jobId: string, options: Omit<LoggerOptions, 'name'> = {}): winston.Logger {
  const { level = 'info', logFile, silent = false } = options;

  return winston.createLogger({
    level,
    silent,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.printf(({ timestamp, level, message, url, error }) => {
        const urlTag = typeof url === 'string' ? ` [${url}]` : '';
        const errorTag = typeof error === 'string' ? ` ERROR: ${error}` : '';
        return `${timestamp} ${level.toUpperCase()} [${jobId}]${urlTag} ${message}${errorTag}`;
      })
    ),
    defaultMeta: { jobId },
    transports: buildTransports(logFile),
  });
}
