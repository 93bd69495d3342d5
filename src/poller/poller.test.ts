import { describe, expect, it, vi } from 'vitest'
import { pollTenants, type PollerDeps } from './poller.js'
import type { acquireToken } from '@/auth/token-client.js'
import type { fetchHealth } from './health-client.js'
import { ConfigurationError, TransientRemoteError } from '@/errors/monitor-errors.js'
import { err, ok } from '@/types/result.js'
import { record, silentLogger, tenant } from '@/test-support/fixtures.js'

const env = {
    CRED_ALPHA: 'dir-a;client-a;test-secret',
    CRED_BROKEN: 'dir-b;client-b',
    CRED_GAMMA: 'dir-g;client-g;test-secret',
    CRED_DELTA: 'dir-d;client-d;test-secret',
}

function harness() {
    const authenticate = vi.fn<typeof acquireToken>(async (credentials) =>
        credentials.directoryId === 'dir-g'
            ? err(new TransientRemoteError('authentication failed: invalid client secret', 401))
            : ok(`token-${credentials.directoryId}`)
    )
    const fetch = vi.fn<typeof fetchHealth>(async (t, token) => {
        if (t.name === 'delta') throw new Error('socket closed')
        return ok([record(t.name, '2026-10-02 08:30:05', 'Microsoft Intune', `ok-with-${token}`)])
    })
    const logger = silentLogger()
    const deps: PollerDeps = {
        tenants: [tenant('alpha'), tenant('broken'), tenant('gamma'), tenant('delta')],
        identity: { authority: 'https://login.example.test', scope: 'scope' },
        endpoint: 'https://health.example.test/v1/healthOverviews',
        http: { timeoutMs: 1000 },
        env,
        logger,
        authenticate,
        fetch,
    }
    return { deps, authenticate, fetch, logger }
}

describe('pollTenants', () => {
    it('isolates every tenant failure from the others', async () => {
        const { deps } = harness()
        const outcomes = await pollTenants(deps)

        expect(outcomes.map((o) => [o.tenant, o.result.ok])).toEqual([
            ['alpha', true],
            ['broken', false],
            ['gamma', false],
            ['delta', false],
        ])
    })

    it('skips a malformed credential without authenticating', async () => {
        const { deps, authenticate } = harness()
        const outcomes = await pollTenants(deps)

        const broken = outcomes[1]?.result
        expect(broken?.ok).toBe(false)
        if (!broken || broken.ok) return
        expect(broken.error).toBeInstanceOf(ConfigurationError)
        expect(authenticate.mock.calls.map(([c]) => c.directoryId)).toEqual(['dir-a', 'dir-g', 'dir-d'])
    })

    it('does not fetch for a tenant that failed authentication', async () => {
        const { deps, fetch } = harness()
        await pollTenants(deps)

        expect(fetch.mock.calls.map(([t, token]) => [t.name, token])).toEqual([
            ['alpha', 'token-dir-a'],
            ['delta', 'token-dir-d'],
        ])
    })

    it('turns an unexpected throw into a failed outcome', async () => {
        const { deps, logger } = harness()
        const outcomes = await pollTenants(deps)

        const delta = outcomes[3]?.result
        if (!delta || delta.ok) throw new Error('expected failure')
        expect(delta.error.message).toBe('poll failed: socket closed')
        expect(logger.error).toHaveBeenCalledWith('[poller] unexpected failure', {
            tenant: 'delta',
            error: 'socket closed',
        })
    })

    it('returns the fetched records for healthy tenants', async () => {
        const { deps } = harness()
        const [alpha] = await pollTenants(deps)

        expect(alpha?.result).toEqual({
            ok: true,
            value: [record('alpha', '2026-10-02 08:30:05', 'Microsoft Intune', 'ok-with-token-dir-a')],
        })
    })
})
