// shared test data
import type { SeverityEntry, StatusRecord, TenantConfig } from '@/types/health.js'
import type { Logger } from '@/logging/logger.js'
import type { MonitorConfig } from '@/config/monitor-config.js'
import { parseMonitorConfig } from '@/config/monitor-config.js'
import { runPaths, type RunContext } from '@/system/context.js'
import { vi, type Mock } from 'vitest'

export const STATUSES: SeverityEntry[] = [
    { status: 'serviceOperational', score: 10 },
    { status: 'serviceRestored', score: 9 },
    { status: 'resolved', score: 9 },
    { status: 'serviceDegradation', score: 9 },
    { status: 'investigating', score: 8 },
    { status: 'serviceInterruption', score: 4 },
    { status: '', score: 0 },
]

export function silentLogger(): Logger & Record<keyof Logger, Mock> {
    return {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    }
}

export function tenant(name: string, overrides: Partial<TenantConfig> = {}): TenantConfig {
    return {
        name,
        credentialVariable: `CRED_${name.toUpperCase()}`,
        services: ['Intune', 'Exchange'],
        mailTo: `${name}@example.com`,
        mailCc: '',
        ...overrides,
    }
}

export function record(tenantName: string, timestamp: string, service: string, status: string): StatusRecord {
    return { tenant: tenantName, timestamp, service, status }
}

export function testConfig(overrides: Record<string, unknown> = {}): MonitorConfig {
    return parseMonitorConfig({
        identity: { authority: 'https://login.example.test', scope: 'https://health.example.test/.default' },
        health: { endpoint: 'https://health.example.test/v1/healthOverviews' },
        statuses: STATUSES,
        tenants: [tenant('alpha'), tenant('beta')],
        mail: { host: 'smtp.example.test', port: 25, from: 'monitor@example.com' },
        ...overrides,
    })
}

export function testContext(overrides: Partial<Omit<RunContext, 'logger'>> = {}): RunContext & { logger: ReturnType<typeof silentLogger> } {
    return {
        config: testConfig(),
        paths: runPaths('/tmp/service-health-monitor-test'),
        env: {},
        now: () => new Date('2026-10-18T12:00:00Z'),
        ...overrides,
        logger: silentLogger(),
    }
}
