import { describe, expect, it } from 'vitest'
import { summarizeHealth } from './aggregate.js'
import { SeverityMap } from './severity-map.js'
import { DataIntegrityError } from '@/errors/monitor-errors.js'
import { STATUSES } from '@/test-support/fixtures.js'

const severity = new SeverityMap(STATUSES)

const pts = (...statuses: string[]) =>
    statuses.map((status, i) => ({ timestamp: `2026-10-01 00:${String(i).padStart(2, '0')}:00`, status }))

describe('summarizeHealth', () => {
    it('counts statuses at or above the threshold as healthy', () => {
        const res = summarizeHealth(pts('serviceOperational', 'serviceInterruption', 'resolved'), severity)
        expect(res.ok).toBe(true)
        if (!res.ok) return
        expect(res.value.total).toBe(3)
        expect(res.value.healthyPercent).toBeCloseTo(66.6667, 3)
    })

    it('reports each observed status share in order of first occurrence', () => {
        const res = summarizeHealth(pts('investigating', 'serviceOperational', 'investigating', ''), severity)
        if (!res.ok) throw res.error
        expect(res.value.distribution).toEqual([
            { status: 'investigating', occurrences: 2, percent: 50 },
            { status: 'serviceOperational', occurrences: 1, percent: 25 },
            { status: '', occurrences: 1, percent: 25 },
        ])
        expect(res.value.healthyPercent).toBe(25)
    })

    it('keeps the distribution summing to 100', () => {
        const res = summarizeHealth(
            pts('resolved', 'investigating', 'investigating', 'serviceInterruption', 'nonsense', 'resolved', 'serviceOperational'),
            severity
        )
        if (!res.ok) throw res.error
        const sum = res.value.distribution.reduce((acc, s) => acc + s.percent, 0)
        expect(Math.abs(sum - 100)).toBeLessThan(0.01)
    })

    it('treats unknown statuses as unhealthy', () => {
        const res = summarizeHealth(pts('mystery', 'mystery'), severity)
        if (!res.ok) throw res.error
        expect(res.value.healthyPercent).toBe(0)
    })

    it('fails on an empty dataset', () => {
        const res = summarizeHealth([], severity, 'alpha/Intune')
        expect(res.ok).toBe(false)
        if (res.ok) return
        expect(res.error).toBeInstanceOf(DataIntegrityError)
        expect(res.error.message).toBe('no status records to analyze for alpha/Intune')
    })
})
