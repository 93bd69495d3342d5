// src/poller/poller.ts
import type { StatusRecord, TenantConfig } from '@/types/health.js'
import type { Logger } from '@/logging/logger.js'
import type { HttpOptions } from '@/infra/fetch.js'
import { MonitorError, TransientRemoteError, describeError } from '@/errors/monitor-errors.js'
import { err, type Result } from '@/types/result.js'
import { resolveCredentials } from '@/auth/credentials.js'
import { acquireToken, type IdentityOptions } from '@/auth/token-client.js'
import { fetchHealth } from './health-client.js'

export interface TenantPollOutcome {
    tenant: string
    result: Result<StatusRecord[], MonitorError>
}

export interface PollerDeps {
    tenants: readonly TenantConfig[]
    identity: IdentityOptions
    endpoint: string
    http: HttpOptions
    env?: NodeJS.ProcessEnv
    now?: () => Date
    logger?: Logger
    /* seams for tests */
    authenticate?: typeof acquireToken
    fetch?: typeof fetchHealth
}

async function pollTenant(tenant: TenantConfig, deps: PollerDeps): Promise<TenantPollOutcome> {
    const logger = deps.logger ?? console
    const authenticate = deps.authenticate ?? acquireToken
    const fetch = deps.fetch ?? fetchHealth

    const credentials = resolveCredentials(tenant, deps.env)
    if (!credentials.ok) {
        logger.warn('[poller] credentials unavailable, skipping tenant', {
            tenant: tenant.name,
            error: credentials.error.message,
        })
        return { tenant: tenant.name, result: credentials }
    }

    const token = await authenticate(credentials.value, deps.identity, deps.http)
    if (!token.ok) {
        logger.warn('[poller] authentication failed, skipping tenant', {
            tenant: tenant.name,
            error: token.error.message,
        })
        return { tenant: tenant.name, result: token }
    }
    logger.info('[poller] token obtained', { tenant: tenant.name })

    const records = await fetch(tenant, token.value, {
        endpoint: deps.endpoint,
        http: deps.http,
        now: deps.now,
        logger,
    })
    if (!records.ok) {
        logger.warn('[poller] health fetch failed', { tenant: tenant.name, error: records.error.message })
        return { tenant: tenant.name, result: records }
    }

    for (const r of records.value) {
        logger.info(`[poller] ${r.service}: ${r.status || '(empty)'}`, { tenant: tenant.name })
    }

    return { tenant: tenant.name, result: records }
}

/**
 * Polls every tenant in order. A tenant's failure is logged and returned in
 * its outcome; it never stops the others.
 */
export async function pollTenants(deps: PollerDeps): Promise<TenantPollOutcome[]> {
    const logger = deps.logger ?? console
    const outcomes: TenantPollOutcome[] = []

    for (const tenant of deps.tenants) {
        logger.info('[poller] polling tenant', { tenant: tenant.name, services: tenant.services })
        try {
            outcomes.push(await pollTenant(tenant, deps))
        } catch (e) {
            logger.error('[poller] unexpected failure', { tenant: tenant.name, error: describeError(e) })
            outcomes.push({
                tenant: tenant.name,
                result: err(new TransientRemoteError(`poll failed: ${describeError(e)}`, undefined, { cause: e })),
            })
        }
    }

    return outcomes
}
