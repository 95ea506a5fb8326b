import { Injectable, LoggerService } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import pino, { Logger } from 'pino';
import { AppConfig } from '../../config/configuration';

/**
 * Application logger backed by pino. Installed with `app.useLogger`, so every
 * Nest `Logger` instance writes through it with its own context. Services that
 * inject it directly take a {@link child} bound to their own context.
 */
@Injectable()
export class PinoLoggerService implements LoggerService {
  private readonly logger: Logger;
  private context?: string;

  constructor(private readonly configService: ConfigService<AppConfig, true>) {
    const logLevel = this.configService.get('logLevel', { infer: true }) || 'info';
    const nodeEnv = this.configService.get('nodeEnv', { infer: true });

    this.logger = pino({
      level: logLevel,
      ...(nodeEnv === 'development' && {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        },
      }),
      formatters: {
        level: (label) => ({ level: label }),
      },
      base: {
        service: 'task-asset-sync',
        env: nodeEnv,
      },
    });
  }

  child(context: string): PinoLoggerService {
    const childLogger: PinoLoggerService = Object.create(this);
    childLogger.context = context;
    return childLogger;
  }

  private formatMessage(
    message: string,
    context?: string,
  ): { msg: string; context?: string } {
    return {
      msg: message,
      context: context || this.context,
    };
  }

  log(message: string, context?: string): void {
    this.logger.info(this.formatMessage(message, context));
  }

  info(message: string): void;
  info(obj: Record<string, unknown>, message: string): void;
  info(objOrMessage: Record<string, unknown> | string, message?: string): void {
    if (typeof objOrMessage === 'string') {
      this.logger.info(this.formatMessage(objOrMessage));
    } else {
      this.logger.info({ ...objOrMessage, context: this.context }, message || '');
    }
  }

  error(
    message: string | Record<string, unknown>,
    trace?: string,
    context?: string,
  ): void {
    if (typeof message === 'object') {
      this.logger.error({ ...message, context: this.context }, trace || '');
    } else {
      this.logger.error({ trace, context: context || this.context }, message);
    }
  }

  warn(message: string | Record<string, unknown>, context?: string): void {
    if (typeof message === 'object') {
      this.logger.warn({ ...message, context: this.context }, context || '');
    } else {
      this.logger.warn(this.formatMessage(message, context));
    }
  }

  debug(message: string | Record<string, unknown>, context?: string): void {
    if (typeof message === 'object') {
      this.logger.debug({ ...message, context: this.context }, context || '');
    } else {
      this.logger.debug(this.formatMessage(message, context));
    }
  }

  verbose(message: string, context?: string): void {
    this.logger.trace(this.formatMessage(message, context));
  }

  fatal(message: string, context?: string): void {
    this.logger.fatal(this.formatMessage(message, context));
  }

  /**
   * Flush buffered lines before the process exits.
   */
  flush(): void {
    this.logger.flush();
  }
}
