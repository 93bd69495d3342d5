import { describe, expect, it } from 'vitest'
import { fileURLToPath } from 'node:url'
import { buildStepChartSvg, escapeXml, LABEL_CHAR_PX, wrapTickLabel } from './step-chart.js'
import { SeverityMap } from '@/health/severity-map.js'
import { loadMonitorConfig } from '@/config/monitor-config.js'
import { STATUSES } from '@/test-support/fixtures.js'

const severity = new SeverityMap(STATUSES)

function pathNumbers(svg: string) {
    const d = /class="status-line" d="([^"]+)"/.exec(svg)?.[1] ?? ''
    return (d.match(/-?\d+(?:\.\d+)?/g) ?? []).map(Number)
}

describe('buildStepChartSvg', () => {
    it('holds each status until the next observation', () => {
        const svg = buildStepChartSvg(
            [
                { timestamp: '2026-10-01 00:00:00', status: 'serviceOperational' },
                { timestamp: '2026-10-01 06:00:00', status: 'serviceInterruption' },
            ],
            severity
        )
        const [x0, y0, x1, yHold, x1Again, y1] = pathNumbers(svg)

        expect(svg).toContain('<path class="status-line" d="M')
        expect(yHold).toBe(y0)
        expect(x1Again).toBe(x1)
        expect(x1).toBeGreaterThan(x0)
        // lower score sits lower on the chart
        expect(y1).toBeGreaterThan(y0)
    })

    it('labels y ticks in declared order', () => {
        const svg = buildStepChartSvg([{ timestamp: '2026-10-01 00:00:00', status: 'resolved' }], severity)
        const order = [
            '>serviceOperational</tspan>',
            '>serviceRestored / resolved /</tspan>',
            '>serviceDegradation</tspan>',
            '>investigating</tspan>',
            '>serviceInterruption</tspan>',
            '>(empty)</tspan>',
        ].map((label) => svg.indexOf(label))

        expect(order.every((i) => i >= 0)).toBe(true)
        expect([...order].sort((a, b) => a - b)).toEqual(order)
    })

    it('draws one marker per observation and the title', () => {
        const svg = buildStepChartSvg(
            [
                { timestamp: '2026-10-01 00:00:00', status: 'resolved' },
                { timestamp: '2026-10-01 01:00:00', status: 'resolved' },
                { timestamp: '2026-10-01 02:00:00', status: 'investigating' },
            ],
            severity,
            { title: 'Intune & Co' }
        )
        expect(svg.match(/<circle /g)).toHaveLength(3)
        expect(svg).toContain('>Intune &amp; Co</text>')
    })
})

describe('y tick labels', () => {
    function tickLabels(svg: string) {
        return [...svg.matchAll(/<text class="tick-y" x="([\d.]+)"[^>]*>(.*?)<\/text>/g)].map((m) => ({
            x: Number(m[1]),
            lines: [...m[2].matchAll(/<tspan [^>]*>([^<]*)<\/tspan>/g)].map((t) => t[1]),
        }))
    }

    it('fit left of the plot with the bundled status configuration', () => {
        const file = fileURLToPath(new URL('../../config/monitor.json', import.meta.url))
        const bundled = loadMonitorConfig(file).severity
        const svg = buildStepChartSvg([{ timestamp: '2026-10-01 00:00:00', status: 'resolved' }], bundled)
        const labels = tickLabels(svg)

        expect(labels).toHaveLength(bundled.ticks().length)
        for (const { x, lines } of labels) {
            for (const line of lines) {
                expect(line.length * LABEL_CHAR_PX).toBeLessThanOrEqual(x)
            }
        }

        const shown = labels.flatMap((l) => l.lines).join(' ')
        for (const { status } of bundled.entries) {
            expect(shown).toContain(status === '' ? '(empty)' : status)
        }
        // the plot keeps most of the width
        expect(labels[0].x).toBeLessThan(300)
    })

    it('wrap statuses sharing a score', () => {
        expect(wrapTickLabel(['serviceRestored', 'falsePositive', 'postIncidentReviewPublished', 'resolved'])).toEqual([
            'serviceRestored / falsePositive /',
            'postIncidentReviewPublished / resolved',
        ])
        expect(wrapTickLabel(['investigating', ''])).toEqual(['investigating / (empty)'])
        expect(wrapTickLabel(['a'.repeat(50), 'b'])).toEqual([`${'a'.repeat(50)} /`, 'b'])
    })
})

describe('escapeXml', () => {
    it('escapes markup characters', () => {
        expect(escapeXml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&apos;&amp;&apos;&lt;/a&gt;')
    })
})
