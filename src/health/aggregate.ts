// src/health/aggregate.ts
import type { HealthSummary, StatusPoint, StatusShare } from '@/types/health.js'
import { DataIntegrityError } from '@/errors/monitor-errors.js'
import { err, ok, type Result } from '@/types/result.js'
import type { SeverityMap } from './severity-map.js'

/**
 * Healthy share and per-status distribution over one service's records.
 * Values are left unrounded; formatting belongs to the report.
 */
export function summarizeHealth(
    points: readonly StatusPoint[],
    severity: SeverityMap,
    scope = 'service'
): Result<HealthSummary, DataIntegrityError> {
    const total = points.length
    if (total === 0) {
        return err(DataIntegrityError.emptyDataset(scope))
    }

    let healthy = 0
    const counts = new Map<string, number>()

    for (const p of points) {
        if (severity.isHealthy(p.status)) healthy++
        counts.set(p.status, (counts.get(p.status) ?? 0) + 1)
    }

    const distribution: StatusShare[] = Array.from(counts, ([status, occurrences]) => ({
        status,
        occurrences,
        percent: (occurrences / total) * 100,
    }))

    return ok({
        total,
        healthyPercent: (healthy / total) * 100,
        distribution,
    })
}
