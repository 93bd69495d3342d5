import type { RunContext } from '../context.js'
import { StatusStore } from '@/storage/status-store.js'
import { ChartRenderer } from '@/chart/chart-renderer.js'
import { ReportMailer, buildReportMessage } from '@/mail/report-mailer.js'
import { assembleReports, type ReportAbortStage } from '@/report/report-assembler.js'
import { resolveReportWindow } from '@/report/report-window.js'
import { findTenant } from '@/config/monitor-config.js'

export interface ReportOverrides {
    store?: StatusStore
    charts?: Pick<ChartRenderer, 'render'>
    mailer?: Pick<ReportMailer, 'send'>
}

export type ReportOutcome =
    | { status: 'aborted'; stage: ReportAbortStage }
    | { status: 'dispatched'; sent: string[]; failed: string[]; skipped: string[] }

/**
 * Report mode
 * QueryData -> FormatByService -> Analyze -> AssembleBody -> Dispatch
 */
export async function runReport(
    ctx: RunContext,
    customer: string,
    overrides: ReportOverrides = {}
): Promise<ReportOutcome> {
    const { config, logger } = ctx
    const now = ctx.now()

    const store = overrides.store ?? new StatusStore(ctx.paths.dbFile)
    const charts =
        overrides.charts ??
        new ChartRenderer({ imagesDir: ctx.paths.imagesDir, severity: config.severity, now: ctx.now, logger })

    try {
        const assembled = await assembleReports(customer, {
            store,
            severity: config.severity,
            charts,
            window: resolveReportWindow(now, config.reportWindow, logger),
            logger,
        })
        if (!assembled.ok) {
            const { stage, message } = assembled.error
            logger.warn('[report] report aborted, no email sent', { stage, message })
            return { status: 'aborted', stage: assembled.error.stage }
        }

        const mailer = overrides.mailer ?? ReportMailer.smtp(config.mail, logger)
        const outcome = { status: 'dispatched' as const, sent: [] as string[], failed: [] as string[], skipped: [] as string[] }

        try {
            for (const report of assembled.value) {
                const tenant = findTenant(config, report.tenant)
                if (!tenant) {
                    logger.warn('[report] tenant has data but no configuration, skipping', { tenant: report.tenant })
                    outcome.skipped.push(report.tenant)
                    continue
                }

                const message = buildReportMessage(report, tenant, config.mail, config.healthBands, now)
                const sent = await mailer.send(message)
                if (sent.ok) {
                    outcome.sent.push(report.tenant)
                } else {
                    outcome.failed.push(report.tenant)
                }
            }
        } finally {
            if (!overrides.mailer && mailer instanceof ReportMailer) mailer.close()
        }

        return outcome
    } finally {
        if (!overrides.store) store.close()
    }
}
