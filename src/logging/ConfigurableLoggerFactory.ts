import { createLogger, format, transports } from 'winston';
import type { Format, TransformableInfo } from 'logform';
import DailyRotateFile from 'winston-daily-rotate-file';
import type TransportStream from 'winston-transport';
import type { Logger, LoggerFactory } from 'global-logger-factory';
import { WinstonLogger } from 'global-logger-factory';
import { logContext } from './LogContext';

export interface ConfigurableLoggerOptions {
  /** Rotated log file pattern, e.g. `logs/startgate-%DATE%.log`. Console only when omitted. */
  fileName?: string;
  maxSize?: string;
  maxFiles?: string;
  /** Replaces the console transport, mainly for tests. */
  transports?: TransportStream[];
}

export class ConfigurableLoggerFactory implements LoggerFactory {
  private readonly level: string;
  private readonly fileTransport?: DailyRotateFile;
  private readonly customTransports?: TransportStream[];

  public constructor(level: string, options: ConfigurableLoggerOptions = {}) {
    this.level = level;
    this.customTransports = options.transports;
    if (options.fileName) {
      this.fileTransport = new DailyRotateFile({
        filename: options.fileName,
        datePattern: 'YYYY-MM-DD',
        maxSize: options.maxSize ?? '10m',
        maxFiles: options.maxFiles ?? '14d',
      });
      // Shared by every logger the factory creates
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
    const result: TransportStream[] = this.customTransports ? [ ...this.customTransports ] : [
      new transports.Console({
        format: format.combine(
          format.colorize(),
          this.getFormat(label),
        ),
      }),
    ];
    if (this.fileTransport) {
      result.push(this.fileTransport);
    }
    return result;
  }

  protected getFormat(label: string): Format {
    return format.combine(
      format.label({ label }),
      format.timestamp(),
      format((info) => {
        const store = logContext.getStore();
        if (store?.runId) {
          info.runId = store.runId;
        }
        return info;
      })(),
      format.printf(
        ({ level, message, label: labelInner, timestamp, runId }: TransformableInfo): string => {
          const runInfo = typeof runId === 'string' ? ` [run:${runId}]` : '';
          return `${String(timestamp)}${runInfo} [${String(labelInner)}] {${process.pid}} ${level}: ${String(message)}`;
        },
      ),
    );
  }
}
