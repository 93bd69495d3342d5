import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { runScan } from './scan.js'
import { StatusStore } from '@/storage/status-store.js'
import type { pollTenants } from '@/poller/poller.js'
import { TransientRemoteError } from '@/errors/monitor-errors.js'
import { err, ok } from '@/types/result.js'
import { record, testConfig, testContext } from '@/test-support/fixtures.js'

describe('runScan', () => {
    let store: StatusStore

    beforeEach(() => {
        store = new StatusStore(':memory:')
    })

    afterEach(() => {
        store.close()
    })

    it('stores successful tenants and prunes outdated records', async () => {
        store.insertMany([record('alpha', '2026-09-01 00:00:00', 'Intune', 'serviceOperational')])
        const poll = vi.fn<typeof pollTenants>(async () => [
            {
                tenant: 'alpha',
                result: ok([
                    record('alpha', '2026-10-18 12:00:00', 'Intune', 'serviceOperational'),
                    record('alpha', '2026-10-18 12:00:00', 'Exchange', 'investigating'),
                ]),
            },
            { tenant: 'beta', result: err(new TransientRemoteError('health request failed: 503', 503)) },
        ])

        const summary = await runScan(testContext(), { store, poll })

        expect(summary).toEqual({ stored: { alpha: 2 }, failedTenants: [], pruned: 1 })
        expect(store.count()).toBe(2)
    })

    it('passes configuration to the poller', async () => {
        const poll = vi.fn<typeof pollTenants>(async () => [])
        const ctx = testContext({ env: { CRED_ALPHA: 'dir;client;test-secret' } })

        await runScan(ctx, { store, poll })

        const deps = poll.mock.calls[0][0]
        expect(deps.tenants.map((t) => t.name)).toEqual(['alpha', 'beta'])
        expect(deps.endpoint).toBe('https://health.example.test/v1/healthOverviews')
        expect(deps.http).toEqual({ timeoutMs: 10_000 })
        expect(deps.env).toEqual({ CRED_ALPHA: 'dir;client;test-secret' })
    })

    it('skips retention when nothing was polled', async () => {
        store.insertMany([record('alpha', '2026-09-01 00:00:00', 'Intune', 'serviceOperational')])
        const poll = vi.fn<typeof pollTenants>(async () => [
            { tenant: 'alpha', result: err(new TransientRemoteError('health request failed: timeout')) },
        ])

        const summary = await runScan(testContext(), { store, poll })

        expect(summary?.pruned).toBeNull()
        expect(store.count()).toBe(1)
    })

    it('does nothing without tenants', async () => {
        const poll = vi.fn<typeof pollTenants>(async () => [])
        const ctx = testContext({ config: testConfig({ tenants: [] }) })

        await expect(runScan(ctx, { store, poll })).resolves.toBeNull()
        expect(poll).not.toHaveBeenCalled()
        expect(ctx.logger.warn).toHaveBeenCalledWith('[scan] no tenants configured, nothing to poll')
    })
})
