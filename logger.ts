import pino from 'pino';
import * as config from './config.js';

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

// Create the base logger instance
const baseLogger = config.log_pretty
  ? pino({
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'yyyy-mm-dd HH:MM:ss.l',
          ignore: 'pid,hostname',
        }
      },
      level: config.log_level
    })
  : pino({ level: config.log_level });

// Also write to file using a separate logger instance
const fileLogger = config.log_file !== ''
  ? pino({ level: config.log_level }, pino.destination(config.log_file))
  : undefined;

// Helper function to extract filename from full path
function getFileName(filePath: string): string {
  return filePath.split(/[\\/]/).pop() || filePath;
}

// Function to change log level at runtime
function setLogLevel(level: LogLevel): void {
  baseLogger.level = level;
  if (fileLogger) fileLogger.level = level;
}

// Create a wrapper that adds filename to log messages
function createLogger(fileName: string) {
  const shortFileName = getFileName(fileName);

  const formatArgs = (args: unknown[]) => args.map(arg => {
    if (arg instanceof Error) return arg.stack ?? arg.message;
    return typeof arg === 'object' ? "\n" + JSON.stringify(arg, null, 2) : String(arg);
  });

  const write = (level: Exclude<LogLevel, 'silent'>, message: string, args: unknown[]) => {
    const msg = args.length > 0 ? `[${shortFileName}] ${message} ${formatArgs(args).join(' ')}` : `[${shortFileName}] ${message}`;
    baseLogger[level](msg);
    fileLogger?.[level](msg);
  };

  return {
    setLogLevel,
    info: (message: string, ...args: unknown[]) => write('info', message, args),
    error: (message: string, ...args: unknown[]) => write('error', message, args),
    warn: (message: string, ...args: unknown[]) => write('warn', message, args),
    debug: (message: string, ...args: unknown[]) => write('debug', message, args),
    trace: (message: string, ...args: unknown[]) => write('trace', message, args),
    fatal: (message: string, ...args: unknown[]) => write('fatal', message, args),
  };
}

export type Logger = ReturnType<typeof createLogger>;

export { createLogger, setLogLevel };
