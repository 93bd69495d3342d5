// src/health/severity-map.ts
import type { SeverityEntry } from '@/types/health.js'
import { ConfigurationError } from '@/errors/monitor-errors.js'

/** Statuses scoring at or above this count as OK ("degraded but serving" included). */
export const DEFAULT_OK_THRESHOLD = 9

export const EMPTY_STATUS = ''

export interface SeverityTick {
    score: number
    label: string
    statuses: string[]
}

/**
 * Ordered raw status -> severity score (higher = healthier).
 * Declared order is kept; it drives the chart y-axis.
 */
export class SeverityMap {
    readonly entries: readonly SeverityEntry[]
    private readonly scores: ReadonlyMap<string, number>

    constructor(
        entries: readonly SeverityEntry[],
        readonly okThreshold: number = DEFAULT_OK_THRESHOLD
    ) {
        const scores = new Map<string, number>()
        for (const e of entries) {
            if (!Number.isInteger(e.score)) {
                throw new ConfigurationError(`status [${e.status}] has non-integer score ${e.score}`)
            }
            if (scores.has(e.status)) {
                throw new ConfigurationError(`status [${e.status}] is declared more than once`)
            }
            scores.set(e.status, e.score)
        }

        const emptyScore = scores.get(EMPTY_STATUS)
        if (emptyScore !== undefined && emptyScore !== 0) {
            throw new ConfigurationError(`empty status must score 0, got ${emptyScore}`)
        }

        const ordered = entries.map((e) => Object.freeze({ status: e.status, score: e.score }))
        if (emptyScore === undefined) {
            ordered.push(Object.freeze({ status: EMPTY_STATUS, score: 0 }))
            scores.set(EMPTY_STATUS, 0)
        }

        this.entries = Object.freeze(ordered)
        this.scores = scores
    }

    scoreOf(status: string): number {
        return this.scores.get(status) ?? 0
    }

    isHealthy(status: string): boolean {
        return this.scoreOf(status) >= this.okThreshold
    }

    /**
     * One tick per distinct score, first-declared first. Statuses sharing a
     * score are listed together in the label.
     */
    ticks(): SeverityTick[] {
        const byScore = new Map<number, SeverityTick>()
        for (const { status, score } of this.entries) {
            const tick = byScore.get(score)
            if (tick) {
                tick.statuses.push(status)
            } else {
                byScore.set(score, { score, label: '', statuses: [status] })
            }
        }

        return Array.from(byScore.values()).map((t) => ({
            ...t,
            label: t.statuses.map((s) => (s === EMPTY_STATUS ? '(empty)' : s)).join(' / '),
        }))
    }
}
