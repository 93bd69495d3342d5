// src/logging/logger.ts
import path from 'node:path'
import * as winston from 'winston'
import { formatFileStamp, formatTimestamp } from '@/utils/time.js'

/** What components log through; `console` satisfies it, so does a winston logger. */
export interface Logger {
    debug(message: string, meta?: object): void
    info(message: string, meta?: object): void
    warn(message: string, meta?: object): void
    error(message: string, meta?: object): void
}

export interface RunLoggerOptions {
    logsDir: string
    level: string
    now?: Date
}

const lineFormat = winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : ''
    return `${String(timestamp)} - ${level.toUpperCase()} - ${String(message)}${extra}`
})

/** `<UTC timestamp> - LEVEL - message {meta}` */
export function runLogFormat(clock: () => Date = () => new Date()) {
    return winston.format.combine(
        winston.format.timestamp({ format: () => formatTimestamp(clock()) }),
        lineFormat
    )
}

/**
 * One log file per run, named after its start time, plus console output.
 */
export function createRunLogger(opts: RunLoggerOptions): winston.Logger {
    const file = path.join(opts.logsDir, `${formatFileStamp(opts.now ?? new Date())}.log`)

    return winston.createLogger({
        level: opts.level,
        format: runLogFormat(),
        transports: [
            new winston.transports.Console(),
            new winston.transports.File({ filename: file }),
        ],
    })
}
