import pino from 'pino'
import { getLedgerEnv } from '../env'

/**
 * LoggerProvider is a class that provides logging functionality.
 * It is a wrapper around the pino logger.
 * The pino instance is created on first use so the level is read from the
 * validated environment rather than at import time.
 */
export class LoggerProvider {
  private instance: pino.Logger | undefined

  private get pino(): pino.Logger {
    if (!this.instance) {
      this.instance = pino(
        {
          level: getLedgerEnv().LOG_LEVEL,
        },
        pino.multistream([
          { level: 'error', stream: process.stderr },
          { level: 'fatal', stream: process.stderr },
          { level: 'debug', stream: process.stdout },
        ]),
      )
    }
    return this.instance
  }

  get level(): string {
    return this.pino.level
  }

  info(message: string, context?: Record<string, unknown>) {
    this.pino.info(context ?? {}, message)
  }

  debug(message: string, context?: Record<string, unknown>) {
    this.pino.debug(context ?? {}, message)
  }

  warn(message: string, context?: Record<string, unknown>) {
    this.pino.warn(context ?? {}, message)
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>) {
    this.pino.error({ err: error, ...context }, message)
  }
}

export const logger = new LoggerProvider()
