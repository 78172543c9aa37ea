import pino from 'pino'
import type { ResolvedConfig } from '../config/schema.js'

export type Logger = pino.Logger

export function createLogger(config: Pick<ResolvedConfig, 'serviceName' | 'logLevel' | 'logPretty'>): Logger {
    return pino({
        name: config.serviceName,
        level: config.logLevel,
        transport: config.logPretty ? { target: 'pino-pretty', options: { colorize: true } } : undefined,
    })
}

export function createSilentLogger(): Logger {
    return pino({ level: 'silent' })
}
