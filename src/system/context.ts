// src/system/context.ts
import path from 'node:path'
import type { Logger } from '@/logging/logger.js'
import type { MonitorConfig } from '@/config/monitor-config.js'

export interface RunPaths {
    dbFile: string
    imagesDir: string
    logsDir: string
}

export interface RunContext {
    config: MonitorConfig
    paths: RunPaths
    logger: Logger
    env: NodeJS.ProcessEnv
    now: () => Date
}

export function runPaths(dataDir: string): RunPaths {
    return {
        dbFile: path.join(dataDir, 'db', 'service-status.db'),
        imagesDir: path.join(dataDir, 'images'),
        logsDir: path.join(dataDir, 'logs'),
    }
}
