import { createLogger, format, transports } from 'winston';
import type { Format, TransformableInfo } from 'logform';
import DailyRotateFile from 'winston-daily-rotate-file';
import type TransportStream from 'winston-transport';
import type { Logger, LoggerFactory } from 'global-logger-factory';
import { setGlobalLoggerFactory, WinstonLogger } from 'global-logger-factory';
import { logContext } from './LogContext';

export interface ConfigurableLoggerOptions {
  /** Rotating log file pattern; without it only the console is written. */
  fileName?: string;
  maxSize?: string;
  maxFiles?: string;
  /** Print the bare class name instead of the full label. */
  showLocation?: boolean;
}

export class ConfigurableLoggerFactory implements LoggerFactory {
  private readonly level: string;
  private readonly showLocation: boolean;
  private readonly fileTransport?: DailyRotateFile;

  public constructor(level: string, options: ConfigurableLoggerOptions = {}) {
    this.level = level;
    this.showLocation = options.showLocation ?? false;
    if (options.fileName) {
      this.fileTransport = new DailyRotateFile({
        filename: options.fileName,
        datePattern: 'YYYY-MM-DD',
        maxSize: options.maxSize ?? '10m',
        maxFiles: options.maxFiles ?? '14d',
      });
      // One transport is shared by every logger
      this.fileTransport.setMaxListeners(Infinity);
    }
  }

  public createLogger(label: string): Logger {
    return new WinstonLogger(createLogger({
      level: this.level,
      format: this.getFormat(label),
      transports: this.createTransports(label),
    }));
  }

  protected createTransports(label: string): TransportStream[] {
    const consoleTransport = new transports.Console({
      format: format.combine(
        format.colorize(),
        this.getFormat(label),
      ),
    });
    return this.fileTransport ? [ consoleTransport, this.fileTransport ] : [ consoleTransport ];
  }

  protected getFormat(label: string): Format {
    return format.combine(
      format.label({ label }),
      format.timestamp(),
      format((info) => {
        const store = logContext.getStore();
        if (store?.chunkId) {
          info.chunkId = store.chunkId;
        }
        return info;
      })(),
      format.printf(({ level, message, label: infoLabel, timestamp, chunkId }: TransformableInfo): string => {
        const chunkInfo = typeof chunkId === 'string' ? ` [Chunk:${chunkId}]` : '';
        return `${String(timestamp)}${chunkInfo} [${this.displayLabel(infoLabel)}] ${level}: ${String(message)}`;
      }),
    );
  }

  private displayLabel(label: unknown): string {
    const text = typeof label === 'string' ? label : '';
    if (this.showLocation && text) {
      const className = text.split('/').pop();
      if (className && className !== 'Object') {
        return className;
      }
    }
    return text;
  }
}

export interface LoggingConfig {
  logLevel: string;
  logFile?: string;
  showLocation?: boolean;
}

/**
 * Installs a {@link ConfigurableLoggerFactory} as the global logger factory.
 */
export function initLogging(config: LoggingConfig): ConfigurableLoggerFactory {
  const factory = new ConfigurableLoggerFactory(config.logLevel, {
    fileName: config.logFile,
    showLocation: config.showLocation,
  });
  setGlobalLoggerFactory(factory);
  return factory;
}
