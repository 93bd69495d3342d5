import type { RunContext } from '../context.js'
import { StatusStore } from '@/storage/status-store.js'
import { pollTenants, type PollerDeps } from '@/poller/poller.js'
import { ingestBatches, type IngestionSummary, type TenantBatch } from '@/ingest/ingestion.js'

export interface ScanOverrides {
    store?: StatusStore
    poll?: typeof pollTenants
    pollerDeps?: Partial<PollerDeps>
}

/**
 * Scan mode
 * polls every configured tenant once, stores the snapshot, prunes old rows
 */
export async function runScan(ctx: RunContext, overrides: ScanOverrides = {}): Promise<IngestionSummary | null> {
    const { config, logger } = ctx

    if (config.tenants.length === 0) {
        logger.warn('[scan] no tenants configured, nothing to poll')
        return null
    }

    const poll = overrides.poll ?? pollTenants
    const outcomes = await poll({
        tenants: config.tenants,
        identity: config.identity,
        endpoint: config.healthEndpoint,
        http: { timeoutMs: config.timeoutMs },
        env: ctx.env,
        now: ctx.now,
        logger,
        ...overrides.pollerDeps,
    })

    const batches: TenantBatch[] = outcomes.flatMap((o) =>
        o.result.ok ? [{ tenant: o.tenant, records: o.result.value }] : []
    )

    const store = overrides.store ?? new StatusStore(ctx.paths.dbFile)
    try {
        return ingestBatches(batches, store, {
            retentionDays: config.retentionDays,
            now: ctx.now,
            logger,
        })
    } finally {
        if (!overrides.store) store.close()
    }
}
