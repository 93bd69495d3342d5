// src/ingest/ingestion.ts
import type { StatusRecord } from '@/types/health.js'
import type { Logger } from '@/logging/logger.js'
import type { StatusStore } from '@/storage/status-store.js'
import { DAY_MS, formatTimestamp } from '@/utils/time.js'

export interface TenantBatch {
    tenant: string
    records: readonly StatusRecord[]
}

export interface IngestionOptions {
    retentionDays: number
    now?: () => Date
    logger?: Logger
}

export interface IngestionSummary {
    stored: Record<string, number>
    failedTenants: string[]
    /** null when pruning did not run or failed */
    pruned: number | null
}

export function retentionCutoff(now: Date, retentionDays: number) {
    return formatTimestamp(new Date(now.getTime() - retentionDays * DAY_MS))
}

/**
 * Stores each tenant batch in its own transaction, then prunes records older
 * than the retention window once something was stored.
 */
export function ingestBatches(
    batches: readonly TenantBatch[],
    store: StatusStore,
    opts: IngestionOptions
): IngestionSummary {
    const logger = opts.logger ?? console
    const summary: IngestionSummary = { stored: {}, failedTenants: [], pruned: null }

    for (const batch of batches) {
        if (batch.records.length === 0) {
            logger.warn('[ingest] no records to store', { tenant: batch.tenant })
            continue
        }

        const res = store.insertMany(batch.records)
        if (!res.ok) {
            logger.error('[ingest] cannot store batch', { tenant: batch.tenant, error: res.error.message })
            summary.failedTenants.push(batch.tenant)
            continue
        }

        summary.stored[batch.tenant] = res.value
        logger.info('[ingest] batch stored', { tenant: batch.tenant, records: res.value })
    }

    if (Object.keys(summary.stored).length === 0) {
        logger.warn('[ingest] no health data saved, skipping retention')
        return summary
    }

    const cutoff = retentionCutoff(opts.now?.() ?? new Date(), opts.retentionDays)
    const pruned = store.deleteBefore(cutoff)
    if (pruned.ok) {
        summary.pruned = pruned.value
        logger.info(`[ingest] ${pruned.value} records older than ${opts.retentionDays} days removed`, { cutoff })
    } else {
        logger.error('[ingest] cannot delete outdated records', { error: pruned.error.message })
    }

    return summary
}
