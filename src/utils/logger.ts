import winston from 'winston';
import path from 'path';

/**
 * Logger Configuration
 *
 * One winston root per process. Components log through child loggers so the
 * file transports (logs/combined.log, logs/error.log) are opened once.
 * LOG_FILES=false keeps output on the console only.
 */

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, component, ...metadata }) => {
    const scope = component ? ` [${component}]` : '';
    const rest = Object.keys(metadata).length > 0 ? ` ${JSON.stringify(metadata)}` : '';
    return `${timestamp}${scope} ${level}: ${message}${rest}`;
  })
);

const MAX_LOG_FILE_BYTES = 5 * 1024 * 1024;

function buildTransports(): winston.transport[] {
  const transports: winston.transport[] = [new winston.transports.Console({ format: consoleFormat })];

  if ((process.env.LOG_FILES || 'true').toLowerCase() === 'false') {
    return transports;
  }

  const logDir = path.join(process.cwd(), 'logs');
  transports.push(
    new winston.transports.File({
      filename: path.join(logDir, 'combined.log'),
      maxsize: MAX_LOG_FILE_BYTES,
      maxFiles: 5,
    }),
    new winston.transports.File({
      filename: path.join(logDir, 'error.log'),
      level: 'error',
      maxsize: MAX_LOG_FILE_BYTES,
      maxFiles: 5,
    })
  );
  return transports;
}

let root: winston.Logger | undefined;

function rootLogger(): winston.Logger {
  if (!root) {
    root = winston.createLogger({
      level: process.env.LOG_LEVEL || 'info',
      format: logFormat,
      transports: buildTransports(),
    });
  }
  return root;
}

/**
 * Logger for one component, e.g. 'ConceptExtractor:roles'
 */
export function createLogger(component: string): winston.Logger {
  return rootLogger().child({ component });
}

/**
 * Default logger instance
 */
export const logger = createLogger('App');

/**
 * Component logger that stamps every line with a fixed context
 * (case, session, concept) and flattens thrown values into metadata.
 */
export class JobLogger {
  private logger: winston.Logger;

  constructor(
    private readonly component: string,
    private readonly context: Record<string, unknown> = {}
  ) {
    this.logger = createLogger(component);
  }

  /**
   * Same component, extra context fields
   */
  withContext(context: Record<string, unknown>): JobLogger {
    return new JobLogger(this.component, { ...this.context, ...context });
  }

  info(message: string, metadata?: object) {
    this.logger.info(message, { ...this.context, ...metadata });
  }

  warn(message: string, metadata?: object) {
    this.logger.warn(message, { ...this.context, ...metadata });
  }

  debug(message: string, metadata?: object) {
    this.logger.debug(message, { ...this.context, ...metadata });
  }

  error(message: string, error?: unknown, metadata?: object) {
    this.logger.error(message, {
      ...this.context,
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
      ...metadata,
    });
  }
}
