/**
 * @fileoverview Application logger built on pino. Exposes MCP-style severity
 * methods (`notice`, `warning`, `crit`) mapped onto pino levels and writes JSON
 * lines to stderr, since stdout carries the MCP stdio transport.
 * @module src/utils/internal/logger
 */
import pino, { type LevelWithSilent, type Logger as PinoLogger } from 'pino';

import { config, type ConfigLogLevel } from '@/config/index.js';

/**
 * Structured fields attached to a log line.
 */
export type LogContext = Record<string, unknown>;

const PINO_LEVELS: Record<ConfigLogLevel, LevelWithSilent> = {
  debug: 'debug',
  info: 'info',
  notice: 'info',
  warning: 'warn',
  error: 'error',
  crit: 'fatal',
  silent: 'silent',
};

export class Logger {
  private static instance: Logger | undefined;
  private readonly pinoLogger: PinoLogger;

  private constructor(level: ConfigLogLevel) {
    this.pinoLogger = pino(
      {
        name: config.mcpServerName,
        level: PINO_LEVELS[level],
        base: { env: config.environment },
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination(2),
    );
  }

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger(config.logLevel);
    }
    return Logger.instance;
  }

  public debug(msg: string, context?: LogContext): void {
    this.pinoLogger.debug(context ?? {}, msg);
  }

  public info(msg: string, context?: LogContext): void {
    this.pinoLogger.info(context ?? {}, msg);
  }

  public notice(msg: string, context?: LogContext): void {
    this.pinoLogger.info({ ...context, severity: 'notice' }, msg);
  }

  public warning(msg: string, context?: LogContext): void {
    this.pinoLogger.warn(context ?? {}, msg);
  }

  /**
   * Logs an error. An `Error` passed as `error` is serialized under `err` so
   * pino keeps its stack.
   */
  public error(msg: string, context?: LogContext, error?: unknown): void {
    const fields = error === undefined ? { ...context } : { ...context, err: error };
    this.pinoLogger.error(fields, msg);
  }

  public crit(msg: string, context?: LogContext, error?: unknown): void {
    const fields = error === undefined ? { ...context } : { ...context, err: error };
    this.pinoLogger.fatal(fields, msg);
  }
}

export const logger = Logger.getInstance();
