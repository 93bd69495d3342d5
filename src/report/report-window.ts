// src/report/report-window.ts
import type { Logger } from '@/logging/logger.js'
import type { TimeRange } from '@/storage/status-store.js'
import { DAY_MS, endOfUtcDay, formatTimestamp, startOfUtcDay } from '@/utils/time.js'

export interface ReportWindowConfig {
    fromDaysAgo: number
    toDaysAgo: number
}

export const FALLBACK_REPORT_WINDOW: ReportWindowConfig = { fromDaysAgo: 1, toDaysAgo: 1 }

function isValid(w: ReportWindowConfig) {
    return (
        Number.isInteger(w.fromDaysAgo) &&
        Number.isInteger(w.toDaysAgo) &&
        w.toDaysAgo >= 0 &&
        w.fromDaysAgo >= w.toDaysAgo
    )
}

/**
 * Whole UTC days from `fromDaysAgo` 00:00:00 to `toDaysAgo` 23:59:59.
 * A misconfigured window falls back to the previous calendar day.
 */
export function resolveReportWindow(
    now: Date,
    window: ReportWindowConfig,
    logger: Logger = console
): TimeRange {
    let w = window
    if (!isValid(w)) {
        logger.warn('[report] invalid report window, defaulting to 1 day ago', { ...window })
        w = FALLBACK_REPORT_WINDOW
    }

    const t = now.getTime()
    return {
        from: formatTimestamp(startOfUtcDay(t - w.fromDaysAgo * DAY_MS)),
        to: formatTimestamp(endOfUtcDay(t - w.toDaysAgo * DAY_MS)),
    }
}
