// src/config/monitor-config.ts
import fs from 'node:fs'
import { z } from 'zod'
import type { TenantConfig } from '@/types/health.js'
import { ConfigurationError, describeError } from '@/errors/monitor-errors.js'
import { DEFAULT_OK_THRESHOLD, SeverityMap } from '@/health/severity-map.js'
import { DEFAULT_HEALTH_BANDS, type HealthBands } from '@/health/health-band.js'
import type { ReportWindowConfig } from '@/report/report-window.js'
import type { IdentityOptions } from '@/auth/token-client.js'
import type { MailConfig } from '@/mail/report-mailer.js'

const tenantSchema = z.object({
    name: z.string().min(1).transform((s) => s.toLowerCase()),
    credentialVariable: z.string().min(1),
    services: z.array(z.string().min(1)).nonempty(),
    mailTo: z.string().min(1),
    mailCc: z.string().default(''),
})

export const monitorConfigSchema = z
    .object({
        identity: z.object({
            authority: z.string().url(),
            scope: z.string().min(1),
        }),
        health: z.object({
            endpoint: z.string().url(),
        }),
        http: z.object({ timeoutMs: z.number().int().positive() }).default({ timeoutMs: 10_000 }),
        okThreshold: z.number().int().default(DEFAULT_OK_THRESHOLD),
        healthBands: z
            .object({ good: z.number().min(0).max(100), warning: z.number().min(0).max(100) })
            .refine((b) => b.good >= b.warning, { message: 'good band must not be below warning band' })
            .default(DEFAULT_HEALTH_BANDS),
        statuses: z.array(z.object({ status: z.string(), score: z.number().int() })).nonempty(),
        retentionDays: z.number().int().positive().default(30),
        // validated later so a bad window degrades to the fallback instead of failing startup
        reportWindow: z
            .object({ fromDaysAgo: z.number(), toDaysAgo: z.number() })
            .default({ fromDaysAgo: 11, toDaysAgo: 1 }),
        tenants: z.array(tenantSchema),
        mail: z.object({
            host: z.string().min(1),
            port: z.number().int().positive(),
            secure: z.boolean().default(false),
            from: z.string().min(1),
            subject: z.string().default('Service health report'),
            signature: z.string().default(''),
        }),
    })
    .superRefine((c, ctx) => {
        const seen = new Set<string>()
        for (const t of c.tenants) {
            if (seen.has(t.name)) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate tenant [${t.name}]` })
            }
            seen.add(t.name)
        }
    })

export interface MonitorConfig {
    readonly identity: Readonly<IdentityOptions>
    readonly healthEndpoint: string
    readonly timeoutMs: number
    readonly severity: SeverityMap
    readonly healthBands: Readonly<HealthBands>
    readonly retentionDays: number
    readonly reportWindow: Readonly<ReportWindowConfig>
    readonly tenants: readonly TenantConfig[]
    readonly mail: Readonly<MailConfig>
}

export function parseMonitorConfig(input: unknown): MonitorConfig {
    const parsed = monitorConfigSchema.safeParse(input)
    if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        throw new ConfigurationError(`invalid monitor configuration: ${issues.join('; ')}`)
    }

    const c = parsed.data
    return Object.freeze({
        identity: Object.freeze({ ...c.identity }),
        healthEndpoint: c.health.endpoint,
        timeoutMs: c.http.timeoutMs,
        severity: new SeverityMap(c.statuses, c.okThreshold),
        healthBands: Object.freeze({ ...c.healthBands }),
        retentionDays: c.retentionDays,
        reportWindow: Object.freeze({ ...c.reportWindow }),
        tenants: Object.freeze(
            c.tenants.map((t) => Object.freeze({ ...t, services: Object.freeze([...t.services]) }))
        ),
        mail: Object.freeze({ ...c.mail }),
    })
}

export function loadMonitorConfig(file: string): MonitorConfig {
    let raw: unknown
    try {
        raw = JSON.parse(fs.readFileSync(file, 'utf8'))
    } catch (e) {
        throw new ConfigurationError(`cannot read monitor configuration [${file}]: ${describeError(e)}`, { cause: e })
    }
    return parseMonitorConfig(raw)
}

export function findTenant(config: MonitorConfig, name: string): TenantConfig | undefined {
    const wanted = name.toLowerCase()
    return config.tenants.find((t) => t.name === wanted)
}
