import pino, { type Logger } from 'pino'

const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined

export const logger = pino({
  level: isTest ? 'silent' : (process.env.TIDEMARK_LOG_LEVEL ?? process.env.LOG_LEVEL ?? 'info'),
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: label => {
      return { level: label }
    },
  },
  base: {
    service: 'tidemark',
  },
})

export type { Logger }

export const createModuleLogger = (module: string): Logger => {
  return logger.child({ module })
}

/** Logs a failure with its stack when it is an Error, or the raw value otherwise. */
export const logError = (log: Logger, message: string, error: unknown): void => {
  if (error instanceof Error) {
    log.error({ err: error }, message)
  } else {
    log.error({ error }, message)
  }
}
