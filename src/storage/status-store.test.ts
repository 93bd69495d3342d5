import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { StatusStore } from './status-store.js'
import { record } from '@/test-support/fixtures.js'

describe('StatusStore', () => {
    let store: StatusStore

    beforeEach(() => {
        store = new StatusStore(':memory:')
    })

    afterEach(() => {
        store.close()
    })

    it('inserts a batch and reads it back in time order', () => {
        const res = store.insertMany([
            record('alpha', '2026-10-01 12:00:00', 'Intune', 'investigating'),
            record('alpha', '2026-10-01 06:00:00', 'Intune', 'serviceOperational'),
            record('beta', '2026-10-01 09:00:00', 'Intune', ''),
        ])
        expect(res).toEqual({ ok: true, value: 3 })

        const rows = store.selectRange({ from: '2026-10-01 00:00:00', to: '2026-10-01 23:59:59' })
        expect(rows.ok && rows.value.map((r) => r.timestamp)).toEqual([
            '2026-10-01 06:00:00',
            '2026-10-01 09:00:00',
            '2026-10-01 12:00:00',
        ])
    })

    it('filters by tenant and includes both range bounds', () => {
        store.insertMany([
            record('alpha', '2026-10-01 00:00:00', 'Intune', 'resolved'),
            record('alpha', '2026-10-01 23:59:59', 'Intune', 'resolved'),
            record('alpha', '2026-10-02 00:00:00', 'Intune', 'resolved'),
            record('beta', '2026-10-01 10:00:00', 'Intune', 'resolved'),
        ])

        const rows = store.selectRange({ from: '2026-10-01 00:00:00', to: '2026-10-01 23:59:59' }, 'alpha')
        expect(rows).toEqual({
            ok: true,
            value: [
                record('alpha', '2026-10-01 00:00:00', 'Intune', 'resolved'),
                record('alpha', '2026-10-01 23:59:59', 'Intune', 'resolved'),
            ],
        })
    })

    it('deletes strictly before the cutoff', () => {
        store.insertMany([
            record('alpha', '2026-09-01 10:00:00', 'Intune', 'resolved'),
            record('alpha', '2026-09-02 10:00:00', 'Intune', 'resolved'),
            record('alpha', '2026-09-03 10:00:00', 'Intune', 'resolved'),
        ])

        expect(store.deleteBefore('2026-09-02 10:00:00')).toEqual({ ok: true, value: 1 })
        expect(store.count()).toBe(2)
    })

    it('reports failures after close instead of throwing', () => {
        store.close()

        const insert = store.insertMany([record('alpha', '2026-10-01 00:00:00', 'Intune', 'resolved')])
        const select = store.selectRange({ from: '2026-10-01 00:00:00', to: '2026-10-02 00:00:00' })
        const prune = store.deleteBefore('2026-10-01 00:00:00')

        expect([insert.ok, select.ok, prune.ok]).toEqual([false, false, false])
        if (!select.ok) expect(select.error.message.startsWith('select failed:')).toBe(true)
        store = new StatusStore(':memory:')
    })
})
