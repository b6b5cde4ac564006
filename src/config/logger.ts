import { pino, type Logger } from 'pino'
import type { Config } from './index.js'

export type { Logger }

const LOGGER_NAME = 'goldenseed-api'

export function createLogger(config: Pick<Config, 'logLevel' | 'nodeEnv'>): Logger {
  return pino({
    name: LOGGER_NAME,
    level: config.logLevel,
    base: { env: config.nodeEnv },
    redact: ['req.headers.authorization'],
  })
}

/** For reporting before configuration has loaded. */
export function createBootLogger(): Logger {
  return pino({ name: LOGGER_NAME })
}
