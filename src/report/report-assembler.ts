// src/report/report-assembler.ts
import type { ServiceReport, StatusPoint, StatusRecord, TenantReport } from '@/types/health.js'
import type { Logger } from '@/logging/logger.js'
import type { StatusStore, TimeRange } from '@/storage/status-store.js'
import type { SeverityMap } from '@/health/severity-map.js'
import type { ChartRenderer } from '@/chart/chart-renderer.js'
import { summarizeHealth } from '@/health/aggregate.js'
import { err, ok, type Result } from '@/types/result.js'
import { MonitorError } from '@/errors/monitor-errors.js'

export const ALL_CUSTOMERS = 'all'

export type ReportAbortStage = 'query' | 'no-data' | 'analysis'

export interface ReportAbort {
    stage: ReportAbortStage
    message: string
    cause?: MonitorError
}

export interface AssembleDeps {
    store: StatusStore
    severity: SeverityMap
    charts: Pick<ChartRenderer, 'render'>
    window: TimeRange
    logger?: Logger
}

/** tenant -> service -> time-ordered points */
export type GroupedStatuses = Map<string, Map<string, StatusPoint[]>>

export function groupByService(records: readonly StatusRecord[]): GroupedStatuses {
    const grouped: GroupedStatuses = new Map()

    for (const r of records) {
        let services = grouped.get(r.tenant)
        if (!services) {
            services = new Map()
            grouped.set(r.tenant, services)
        }
        let points = services.get(r.service)
        if (!points) {
            points = []
            services.set(r.service, points)
        }
        points.push({ timestamp: r.timestamp, status: r.status })
    }

    for (const services of grouped.values()) {
        for (const points of services.values()) {
            // stable, so same-second rows keep insertion order
            points.sort((a, b) => (a.timestamp < b.timestamp ? -1 : a.timestamp > b.timestamp ? 1 : 0))
        }
    }

    return grouped
}

async function analyzeTenant(
    tenant: string,
    services: Map<string, StatusPoint[]>,
    deps: AssembleDeps,
    logger: Logger
): Promise<ServiceReport[]> {
    const reports: ServiceReport[] = []

    for (const [service, points] of services) {
        const summary = summarizeHealth(points, deps.severity, `${tenant}/${service}`)
        if (!summary.ok) {
            logger.warn('[report] skipping service', { tenant, service, error: summary.error.message })
            continue
        }

        const chart = await deps.charts.render(tenant, service, points)
        if (!chart.ok) {
            logger.warn('[report] no chart available, summary only', { tenant, service })
        }

        reports.push({
            service,
            summary: summary.value,
            ...(chart.ok ? { chart: chart.value } : {}),
        })
    }

    return reports
}

/**
 * QueryData -> FormatByService -> Analyze. Each stage aborts on empty or
 * failed input, so later stages never see it.
 */
export async function assembleReports(
    customer: string,
    deps: AssembleDeps
): Promise<Result<TenantReport[], ReportAbort>> {
    const logger = deps.logger ?? console
    const tenant = customer === ALL_CUSTOMERS ? undefined : customer

    logger.info('[report] querying report data', { customer, ...deps.window })
    const rows = deps.store.selectRange(deps.window, tenant)
    if (!rows.ok) {
        logger.error('[report] cannot obtain report data', { error: rows.error.message })
        return err({ stage: 'query', message: rows.error.message, cause: rows.error })
    }
    if (rows.value.length === 0) {
        logger.warn(`[report] no data for [${customer}] customer(s) in report window`)
        return err({ stage: 'no-data', message: `no data for [${customer}]` })
    }

    const grouped = groupByService(rows.value)
    const reports: TenantReport[] = []

    for (const [name, services] of grouped) {
        logger.info('[report] analyzing tenant', { tenant: name, services: services.size })
        const serviceReports = await analyzeTenant(name, services, deps, logger)
        if (serviceReports.length === 0) {
            logger.warn('[report] no usable service results, dropping tenant', { tenant: name })
            continue
        }
        reports.push({ tenant: name, services: serviceReports })
    }

    if (reports.length === 0) {
        return err({ stage: 'analysis', message: 'no tenant produced a usable service result' })
    }

    return ok(reports)
}
