// src/poller/health-client.ts
import { z } from 'zod'
import type { StatusRecord, TenantConfig } from '@/types/health.js'
import { TransientRemoteError, describeError } from '@/errors/monitor-errors.js'
import { fetchJson, HttpStatusError, type HttpOptions } from '@/infra/fetch.js'
import { err, ok, type Result } from '@/types/result.js'
import { formatTimestamp } from '@/utils/time.js'
import type { Logger } from '@/logging/logger.js'

// items are checked one by one, after the service filter
const healthOverviewSchema = z.object({
    value: z.array(z.unknown()),
})

const itemIdSchema = z.object({ id: z.string() })

const healthItemSchema = z.object({
    id: z.string(),
    service: z.string(),
    status: z
        .string()
        .nullish()
        .transform((s) => s ?? ''),
})

export interface FetchHealthOptions {
    endpoint: string
    http: HttpOptions
    now?: () => Date
    logger?: Logger
}

/**
 * One GET against the health overview. Items outside the tenant's monitored
 * services are dropped unread; a malformed monitored item is logged and
 * dropped. Every record of the call shares one timestamp.
 */
export async function fetchHealth(
    tenant: Pick<TenantConfig, 'name' | 'services'>,
    token: string,
    opts: FetchHealthOptions
): Promise<Result<StatusRecord[], TransientRemoteError>> {
    const timestamp = formatTimestamp(opts.now?.() ?? new Date())

    let json: unknown
    try {
        json = await fetchJson(
            opts.endpoint,
            {
                method: 'GET',
                headers: {
                    Authorization: `Bearer ${token}`,
                    'Content-Type': 'application/json',
                },
            },
            opts.http
        )
    } catch (e) {
        const status = e instanceof HttpStatusError ? e.status : undefined
        return err(
            new TransientRemoteError(`health request failed: ${describeError(e)}`, status, { cause: e })
        )
    }

    const parsed = healthOverviewSchema.safeParse(json)
    if (!parsed.success) {
        return err(new TransientRemoteError(`unexpected health response: ${parsed.error.issues[0]?.message ?? 'invalid'}`))
    }

    const logger = opts.logger ?? console
    const monitored = new Set(tenant.services)
    const records: StatusRecord[] = []

    for (const raw of parsed.data.value) {
        const ref = itemIdSchema.safeParse(raw)
        if (!ref.success || !monitored.has(ref.data.id)) continue

        const item = healthItemSchema.safeParse(raw)
        if (!item.success) {
            logger.warn('[health] malformed item dropped', {
                tenant: tenant.name,
                id: ref.data.id,
                error: item.error.issues[0]?.message ?? 'invalid',
            })
            continue
        }

        records.push({ tenant: tenant.name, timestamp, service: item.data.service, status: item.data.status })
    }

    return ok(records)
}
