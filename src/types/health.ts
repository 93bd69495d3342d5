// src/types/health.ts

/** One polled status of one service for one tenant. `timestamp` is UTC `YYYY-MM-DD HH:MM:SS`. */
export interface StatusRecord {
    readonly tenant: string
    readonly timestamp: string
    readonly service: string
    readonly status: string
}

export interface StatusPoint {
    readonly timestamp: string
    readonly status: string
}

export interface SeverityEntry {
    readonly status: string
    readonly score: number
}

export interface StatusShare {
    readonly status: string
    readonly occurrences: number
    readonly percent: number // 0 ~ 100
}

export interface HealthSummary {
    readonly total: number
    readonly healthyPercent: number // 0 ~ 100, unrounded
    readonly distribution: readonly StatusShare[]
}

export interface TenantConfig {
    readonly name: string
    /** env variable holding `directoryId;clientId;secret` */
    readonly credentialVariable: string
    readonly services: readonly string[]
    readonly mailTo: string
    readonly mailCc: string
}

export interface ChartArtifact {
    readonly path: string
    readonly contentId: string
}

export interface ServiceReport {
    readonly service: string
    readonly summary: HealthSummary
    readonly chart?: ChartArtifact
}

export interface TenantReport {
    readonly tenant: string
    readonly services: readonly ServiceReport[]
}
