// src/chart/step-chart.ts
import { curveStepAfter, line, scaleLinear, scaleUtc, utcFormat } from 'd3'
import type { StatusPoint } from '@/types/health.js'
import { EMPTY_STATUS, type SeverityMap } from '@/health/severity-map.js'
import { parseTimestamp } from '@/utils/time.js'

export interface StepChartOptions {
    width?: number
    height?: number
    title?: string
}

interface PlotPoint {
    at: Date
    score: number
}

const FONT = `Consolas, 'Courier New', monospace`
const LINE_COLOR = 'steelblue'
export const LABEL_CHAR_PX = 6.2
const LABEL_LINE_PX = 11
const LABEL_MAX_CHARS = 40
const HOUR_MS = 60 * 60_000

export function escapeXml(s: string) {
    return s
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&apos;')
}

/**
 * Statuses sharing a score, packed into lines of at most `max` characters.
 * A status longer than that keeps a line of its own.
 */
export function wrapTickLabel(statuses: readonly string[], max = LABEL_MAX_CHARS): string[] {
    const lines: string[] = []
    let current = ''
    for (const s of statuses) {
        const name = s === EMPTY_STATUS ? '(empty)' : s
        if (current && current.length + 3 + name.length > max) {
            lines.push(`${current} /`)
            current = name
        } else {
            current = current ? `${current} / ${name}` : name
        }
    }
    if (current) lines.push(current)
    return lines
}

/**
 * Status over time as a step-after line: a status holds until the next
 * observation. y is the severity score, ticks labelled in declared order.
 */
export function buildStepChartSvg(
    points: readonly StatusPoint[],
    severity: SeverityMap,
    opts: StepChartOptions = {}
): string {
    const width = opts.width ?? 1000
    const height = opts.height ?? 400

    const data: PlotPoint[] = points.map((p) => ({
        at: parseTimestamp(p.timestamp),
        score: severity.scoreOf(p.status),
    }))

    const ticks = severity.ticks().map((t) => ({ score: t.score, lines: wrapTickLabel(t.statuses) }))
    const longest = Math.max(0, ...ticks.flatMap((t) => t.lines.map((l) => l.length)))
    const margin = {
        top: opts.title ? 32 : 16,
        right: 24,
        bottom: 36,
        left: Math.ceil(longest * LABEL_CHAR_PX) + 16,
    }

    const first = data[0]?.at.getTime() ?? 0
    const last = data[data.length - 1]?.at.getTime() ?? 0
    // a single observation still needs a visible time span
    const [x0, x1] = first === last ? [first - HOUR_MS, last + HOUR_MS] : [first, last]

    const x = scaleUtc()
        .domain([new Date(x0), new Date(x1)])
        .range([margin.left, width - margin.right])

    const scores = ticks.map((t) => t.score)
    const y = scaleLinear()
        .domain([Math.min(0, ...scores), Math.max(1, ...scores)])
        .range([height - margin.bottom, margin.top])

    const path = line<PlotPoint>()
        .x((d) => x(d.at))
        .y((d) => y(d.score))
        .curve(curveStepAfter)(data)

    const fmt = utcFormat('%m-%d %H:%M')
    const out: string[] = []

    out.push(
        `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" font-family="${FONT}" font-size="10">`,
        `<rect width="${width}" height="${height}" fill="white"/>`
    )

    if (opts.title) {
        out.push(
            `<text x="${margin.left}" y="20" font-size="13">${escapeXml(opts.title)}</text>`
        )
    }

    const labelX = margin.left - 6
    for (const t of ticks) {
        const ty = y(t.score)
        // lines centred on the grid line
        const spans = t.lines.map((l, i) => {
            const ly = ty + (i - (t.lines.length - 1) / 2) * LABEL_LINE_PX
            return `<tspan x="${labelX}" y="${ly}">${escapeXml(l)}</tspan>`
        })
        out.push(
            `<line class="grid-y" x1="${margin.left}" x2="${width - margin.right}" y1="${ty}" y2="${ty}" stroke="#999" stroke-dasharray="4 4" stroke-opacity="0.5"/>`,
            `<text class="tick-y" x="${labelX}" y="${ty}" text-anchor="end" dominant-baseline="middle">${spans.join('')}</text>`
        )
    }

    for (const tx of x.ticks(6)) {
        const px = x(tx)
        out.push(
            `<line class="grid-x" x1="${px}" x2="${px}" y1="${margin.top}" y2="${height - margin.bottom}" stroke="#999" stroke-dasharray="4 4" stroke-opacity="0.5"/>`,
            `<text class="tick-x" x="${px}" y="${height - margin.bottom + 16}" text-anchor="middle">${fmt(tx)}</text>`
        )
    }

    if (path) {
        out.push(`<path class="status-line" d="${path}" fill="none" stroke="${LINE_COLOR}" stroke-width="1"/>`)
    }

    for (const d of data) {
        out.push(`<circle cx="${x(d.at)}" cy="${y(d.score)}" r="2" fill="${LINE_COLOR}"/>`)
    }

    out.push('</svg>')
    return out.join('\n')
}
