// src/report/report-html.ts
import type { ServiceReport, TenantReport } from '@/types/health.js'
import { bandOf, DEFAULT_HEALTH_BANDS, type HealthBand, type HealthBands } from '@/health/health-band.js'

const FONT_STYLE = `font-family: 'Courier New', monospace; font-size: 14px;`
const TABLE_OPEN = `<table style="width: 800px; border-collapse: collapse; border-spacing: 0cm; ${FONT_STYLE}" cellpadding="5"><tbody>`
const TABLE_CLOSE = '</tbody></table>'
const ROW_BORDER = 'border-bottom: 2px solid black; '

const BAND_STYLE: Record<HealthBand, { color: string; background: string }> = {
    good: { color: '#041200', background: '#d9f7d9' },
    warning: { color: '#2b0000', background: '#fff8d9' },
    critical: { color: '#2b0000', background: '#ffd9d9' },
}

export function escapeHtml(s: string) {
    return s
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#39;')
}

export function formatPercent(p: number) {
    return `${p.toFixed(2)}%`
}

function sectionTitle(title: string) {
    const style = `text-align: left; height: 24px; ${ROW_BORDER}font-size: 18px; color: #003780; `
    return `<tr><td style="${style}"><strong>${escapeHtml(title)}</strong></td></tr>`
}

function healthRow(percent: number, bands: HealthBands) {
    const band = BAND_STYLE[bandOf(percent, bands)]
    const style = `text-align: left; height: 24px; background-color: ${band.background}; ${ROW_BORDER}font-size: 18px; color: ${band.color}; `
    return `<tr><td style="${style}"><strong>${formatPercent(percent)}</strong></td></tr>`
}

function imageRow(contentId: string) {
    return `<tr><td style="width: 800px; text-align: center;"><img src="cid:${escapeHtml(contentId)}"></td></tr>`
}

function stateRow(content: string) {
    return `<tr><td style="text-align: left;">${content}</td></tr>`
}

function serviceSection(report: ServiceReport, bands: HealthBands) {
    let html = TABLE_OPEN
    html += sectionTitle(`⚙️ ${report.service}`)
    html += healthRow(report.summary.healthyPercent, bands)

    if (report.chart) {
        html += imageRow(report.chart.contentId)
    }

    if (report.summary.distribution.length > 0) {
        html += stateRow('<strong>Service health states occurrence:</strong>')
        for (const share of report.summary.distribution) {
            const label = share.status === '' ? '(empty)' : share.status
            html += stateRow(`${escapeHtml(label)}: ${formatPercent(share.percent)}`)
        }
    }

    return html + TABLE_CLOSE + '<br />'
}

/**
 * Report body for one tenant. Charts are referenced by content id so the
 * mail can carry them as inline attachments.
 */
export function renderReportHtml(report: TenantReport, bands: HealthBands = DEFAULT_HEALTH_BANDS) {
    return TABLE_OPEN + report.services.map((s) => serviceSection(s, bands)).join('') + TABLE_CLOSE
}
