import chalk from 'chalk';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  FATAL = 4
}

export interface LogContext {
  requestId?: string;
  pageUrl?: string;
  url?: string;
  strategy?: string;
  serverIndex?: number;
  duration?: number;
  timeoutMs?: number;
  cacheKey?: string;
  cacheHit?: boolean;
  operation?: string;
  statusCode?: number;
  bytesRead?: number;
  [key: string]: unknown;
}

const LEVEL_NAMES = ['DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL'] as const;

function parseLevel(value: string | undefined): LogLevel | null {
  const index = LEVEL_NAMES.findIndex((name) => name === value?.trim().toUpperCase());
  return index >= 0 ? index : null;
}

function errorCode(error: Error): unknown {
  return 'code' in error ? error.code : undefined;
}

class Logger {
  private static instance: Logger;
  private logLevel: LogLevel = LogLevel.INFO;
  private silent = false;

  private constructor() {
    const envLevel = parseLevel(process.env.LOG_LEVEL);
    if (envLevel !== null) {
      this.logLevel = envLevel;
    } else if (process.env.NODE_ENV === 'test') {
      // Test runs stay quiet unless a level is asked for explicitly
      this.silent = true;
    } else if (process.env.NODE_ENV !== 'production') {
      this.logLevel = LogLevel.DEBUG;
    }
  }

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  public setLevel(level: LogLevel): void {
    this.logLevel = level;
    this.silent = false;
  }

  private shouldLog(level: LogLevel): boolean {
    return !this.silent && level >= this.logLevel;
  }

  private log(level: LogLevel, message: string, context?: LogContext, source?: string, error?: Error) {
    if (!this.shouldLog(level)) return;

    const timestamp = new Date().toISOString();
    const levelName = LEVEL_NAMES[level];
    const sourceName = source || 'RESOLVER';

    if (process.env.NODE_ENV === 'production') {
      const logEntry = {
        timestamp,
        level: levelName,
        source: sourceName,
        message,
        ...context,
        error: error ? {
          message: error.message,
          name: error.name,
          stack: error.stack,
          code: errorCode(error)
        } : undefined
      };
      console.log(JSON.stringify(logEntry));
      return;
    }

    const colorMap = {
      [LogLevel.DEBUG]: chalk.gray,
      [LogLevel.INFO]: chalk.blue,
      [LogLevel.WARN]: chalk.yellow,
      [LogLevel.ERROR]: chalk.red,
      [LogLevel.FATAL]: chalk.bgRed.white
    };

    const color = colorMap[level];
    const timeStr = chalk.gray(`[${timestamp.slice(11, 19)}]`);
    const sourceStr = chalk.bold(sourceName.padEnd(10));
    const levelStr = color(levelName.padEnd(5));

    console.log(`${timeStr} ${levelStr} ${chalk.cyan(sourceStr)} ${message}`);

    if (context && Object.keys(context).length > 0) {
      console.log(chalk.gray('  Context:'), JSON.stringify(context, null, 2).split('\n').join('\n  '));
    }

    if (error) {
      console.log(chalk.red('  Error:'), error.message);
      if (error.stack) {
        console.log(chalk.gray(error.stack.split('\n').slice(1, 4).join('\n')));
      }
    }
  }

  public debug(message: string, context?: LogContext, source?: string) {
    this.log(LogLevel.DEBUG, message, context, source);
  }

  public info(message: string, context?: LogContext, source?: string) {
    this.log(LogLevel.INFO, message, context, source);
  }

  public warn(message: string, context?: LogContext, source?: string) {
    this.log(LogLevel.WARN, message, context, source);
  }

  public error(message: string, error?: Error, context?: LogContext, source?: string) {
    this.log(LogLevel.ERROR, message, context, source, error);
  }

  public fatal(message: string, error?: Error, context?: LogContext, source?: string) {
    this.log(LogLevel.FATAL, message, context, source, error);
  }

  // Specialized logging methods
  public apiRequest(method: string, path: string, context?: LogContext) {
    this.info(`${method} ${path}`, context, 'API');
  }

  public apiResponse(statusCode: number, context?: LogContext) {
    this.info(`Response ${statusCode}`, context, 'API');
  }

  public cacheHit(key: string, context?: LogContext) {
    this.debug(`Cache hit: ${key}`, context, 'CACHE');
  }

  public cacheMiss(key: string, context?: LogContext) {
    this.debug(`Cache miss: ${key}`, context, 'CACHE');
  }

  public securityRejected(url: string, reason: string, context?: LogContext) {
    this.warn(`Rejected ${url}: ${reason}`, context, 'SECURITY');
  }

  public fetchTruncated(url: string, maxBytes: number, context?: LogContext) {
    this.warn(`Response truncated at ${maxBytes} bytes: ${url}`, context, 'FETCH');
  }

  public requestTimeout(operation: string, timeout: number, context?: LogContext) {
    this.warn(`Request timeout: ${operation} (${timeout}ms)`, context, 'TIMEOUT');
  }

  public matcherTimeout(pattern: string, timeout: number, context?: LogContext) {
    this.warn(`Pattern ${pattern} exceeded ${timeout}ms, treated as no match`, context, 'MATCHER');
  }

  public raceWon(serverIndex: number, duration: number, context?: LogContext) {
    this.info(`Mirror ${serverIndex} won in ${duration}ms`, context, 'RACE');
  }

  public strategyResult(strategy: string, count: number, context?: LogContext) {
    this.debug(`${strategy} produced ${count} candidate(s)`, context, 'EXTRACT');
  }

  public parsingError(operation: string, error: Error, context?: LogContext) {
    this.error(`Parsing error: ${operation} - ${error.message}`, error, context, 'PARSING');
  }

  public performance(operation: string, duration: number, context?: LogContext) {
    this.debug(`Performance: ${operation} ${duration}ms`, context, 'PERF');
  }

  public slowOperation(operation: string, duration: number, threshold: number, context?: LogContext) {
    this.warn(`Slow operation: ${operation} took ${duration}ms (threshold: ${threshold}ms)`, context, 'PERF');
  }
}

export const logger = Logger.getInstance();

// Request context helper
export function createRequestContext(req: {
  id?: string;
  headers?: Record<string, string | string[] | undefined>;
  ip?: string;
  method?: string;
  path?: string;
}): LogContext {
  const getHeader = (key: string): string | undefined => {
    const val = req.headers?.[key];
    if (!val) return undefined;
    if (Array.isArray(val)) return val[0];
    return val;
  };

  return {
    requestId: req.id || getHeader('x-request-id'),
    ip: req.ip,
    userAgent: getHeader('user-agent'),
    method: req.method,
    path: req.path
  };
}

export class PerformanceTimer {
  private start: number;
  private operation: string;
  private context?: LogContext;
  private threshold: number;

  constructor(operation: string, context?: LogContext, threshold?: number) {
    this.operation = operation;
    this.context = context;
    this.start = Date.now();
    this.threshold = threshold || 2000;
  }

  public end(additionalContext?: LogContext) {
    const duration = Date.now() - this.start;
    const finalContext = { ...this.context, ...additionalContext, duration };

    logger.performance(this.operation, duration, finalContext);

    if (duration > this.threshold) {
      logger.slowOperation(this.operation, duration, this.threshold, finalContext);
    }

    return duration;
  }
}
