import winston from 'winston';

export type Logger = winston.Logger;

// The slice of a logger that status reporting needs
export type DiagnosticLogger = Pick<winston.Logger, 'info'>;

export interface LoggerOptions {
  level?: string;
  name: string;
  logFile?: string | undefined;
}

const ALL_LEVELS = Object.keys(winston.config.npm.levels);

export function createLogger(options: LoggerOptions): winston.Logger {
  const { level = 'info', name, logFile } = options;

  // stdout is reserved for scan results
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

  return winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
        return `${String(timestamp)} ${level.toUpperCase()} [${name}] ${String(message)}${metaStr}`;
      })
    ),
    transports,
  });
}

/**
 * Logger for the periodic stats and loop progress lines:
 * `[YYYY-MM-DD HH:mm:ss]\t<message>` on stderr.
 */
export function createDiagnosticLogger(transports?: winston.transport[]): winston.Logger {
  return winston.createLogger({
    level: 'info',
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format.printf(({ timestamp, message }) => `[${String(timestamp)}]\t${String(message)}`)
    ),
    transports: transports ?? [new winston.transports.Console({ stderrLevels: ALL_LEVELS })],
  });
}
